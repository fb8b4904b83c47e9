/**
 * Tests for StudentController.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { StudentController, createStudentController } from './StudentController.js';
import { createStudentStore } from '../store/InMemoryStudentStore.js';
import type { OperationFailure, OperationResult } from './types.js';
import type { StudentInput, StudentRecord, StudentUpdate } from '../types/StudentRecord.js';

function unwrap<T>(result: OperationResult<T>): T {
  if (!result.success) {
    throw new Error(`Expected success, got: ${result.message}`);
  }
  return result.value;
}

function failure<T>(result: OperationResult<T>): OperationFailure {
  if (result.success) {
    throw new Error(`Expected failure, got: ${result.message}`);
  }
  return result;
}

const SAMPLES: StudentInput[] = [
  { id: 'STU001', name: 'John Doe', email: 'john.doe@email.com', age: 20, major: 'Computer Science', gpa: 3.8 },
  { id: 'STU002', name: 'Jane Smith', email: 'jane.smith@email.com', age: 19, major: 'Mathematics', gpa: 3.9 },
  { id: 'STU003', name: 'Mike Johnson', email: 'mike.johnson@email.com', age: 21, major: 'Physics', gpa: 3.5 },
  { id: 'STU004', name: 'Sarah Wilson', email: 'sarah.wilson@email.com', age: 20, major: 'Computer Science', gpa: 3.7 },
  { id: 'STU005', name: 'David Brown', email: 'david.brown@email.com', age: 22, major: 'Engineering', gpa: 3.6 },
];

const JOHN = SAMPLES[0] ?? {};
const MIKE = SAMPLES[2] ?? {};

function importRow(index: number, overrides: Partial<StudentRecord> = {}): StudentRecord {
  return {
    id: `IMP${String(index).padStart(3, '0')}`,
    name: `Student ${String.fromCharCode(65 + index)}`,
    email: `imp${index}@example.com`,
    age: 20,
    major: 'Biology',
    gpa: 3,
    createdAt: '2023-09-01 08:00:00',
    updatedAt: '2023-10-01 08:00:00',
    ...overrides,
  };
}

describe('StudentController', () => {
  let now: Date;
  let controller: StudentController;
  
  beforeEach(() => {
    now = new Date(2024, 0, 15, 9, 0, 0);
    controller = createStudentController({ clock: () => now });
  });
  
  describe('create', () => {
    it('stores a valid student', () => {
      const result = controller.create(JOHN);
      
      expect(result.success).toBe(true);
      expect(result.message).toBe('Student John Doe (ID: STU001) created successfully!');
      expect(unwrap(result).createdAt).toBe('2024-01-15 09:00:00');
      expect(unwrap(controller.readAll())).toHaveLength(1);
    });
    
    it('can be read back unchanged', () => {
      const created = unwrap(controller.create(JOHN));
      
      expect(unwrap(controller.readById('STU001'))).toEqual(created);
    });
    
    it('rejects a duplicate id and keeps the original', () => {
      const original = unwrap(controller.create(JOHN));
      const result = failure(controller.create({ ...MIKE, id: 'STU001' }));
      
      expect(result.error.kind).toBe('validation');
      expect(result.message).toBe('Validation failed:\n- Student ID already exists');
      expect(unwrap(controller.readAll())).toEqual([original]);
    });
    
    it('reports every failed field at once', () => {
      const result = failure(controller.create({
        id: 'S1',
        name: 'J',
        email: 'bad',
        age: 15,
        major: 'M',
        gpa: 4.5,
      }));
      
      expect(result.error.details).toEqual([
        'Student ID must be at least 3 characters long',
        'Name must be at least 2 characters long',
        'Invalid email format',
        'Age must be between 16 and 100',
        'Major must be at least 2 characters long',
        'GPA must be between 0.0 and 4.0',
      ]);
      expect(result.message).toBe(
        'Validation failed:\n' +
        '- Student ID must be at least 3 characters long\n' +
        '- Name must be at least 2 characters long\n' +
        '- Invalid email format\n' +
        '- Age must be between 16 and 100\n' +
        '- Major must be at least 2 characters long\n' +
        '- GPA must be between 0.0 and 4.0',
      );
      expect(unwrap(controller.readAll())).toEqual([]);
    });
    
    it('treats missing fields as empty', () => {
      const result = failure(controller.create({ id: 'STU009' }));
      
      expect(result.error.details).toEqual([
        'Name cannot be empty',
        'Email cannot be empty',
        'Age must be between 16 and 100',
        'Major cannot be empty',
      ]);
    });
  });
  
  describe('readAll', () => {
    it('reports an empty collection as success', () => {
      const result = controller.readAll();
      
      expect(result).toEqual({ success: true, message: 'No students found in the system.', value: [] });
    });
    
    it('lists students in insertion order', () => {
      for (const sample of SAMPLES) controller.create(sample);
      
      const result = controller.readAll();
      
      expect(result.message).toBe('Found 5 student(s).');
      expect(unwrap(result).map(s => s.id)).toEqual(['STU001', 'STU002', 'STU003', 'STU004', 'STU005']);
    });
  });
  
  describe('readById', () => {
    beforeEach(() => {
      controller.create(JOHN);
    });
    
    it('finds a student', () => {
      const result = controller.readById('STU001');
      
      expect(result.message).toBe('Student found successfully.');
      expect(unwrap(result).name).toBe('John Doe');
    });
    
    it('treats an empty id as a bad request', () => {
      const result = failure(controller.readById(''));
      
      expect(result.error.kind).toBe('request');
      expect(result.message).toBe('Student ID cannot be empty.');
    });
    
    it('reports unknown ids as not found', () => {
      const result = failure(controller.readById('stu001'));
      
      expect(result.error.kind).toBe('not-found');
      expect(result.message).toBe("Student with ID 'stu001' not found.");
    });
  });
  
  describe('update', () => {
    beforeEach(() => {
      for (const sample of SAMPLES.slice(0, 3)) controller.create(sample);
      now = new Date(2024, 0, 20, 10, 30, 0);
    });
    
    it('merges the given fields and restamps updatedAt', () => {
      const result = controller.update('STU002', { major: 'Statistics', gpa: 4 });
      
      expect(result.message).toBe('Student Jane Smith (ID: STU002) updated successfully!');
      expect(unwrap(controller.readById('STU002')).serialize()).toEqual({
        id: 'STU002',
        name: 'Jane Smith',
        email: 'jane.smith@email.com',
        age: 19,
        major: 'Statistics',
        gpa: 4,
        createdAt: '2024-01-15 09:00:00',
        updatedAt: '2024-01-20 10:30:00',
      });
    });
    
    it('keeps the record at its position', () => {
      controller.update('STU002', { name: 'Janet Smith' });
      
      expect(unwrap(controller.readAll()).map(s => s.name)).toEqual([
        'John Doe',
        'Janet Smith',
        'Mike Johnson',
      ]);
    });
    
    it('ignores an attempt to change the id', () => {
      const updated = unwrap(controller.update('STU001', { id: 'NEW001', name: 'Johnny Doe' }));
      
      expect(updated.id).toBe('STU001');
      expect(unwrap(controller.readById('STU001')).name).toBe('Johnny Doe');
      expect(failure(controller.readById('NEW001')).error.kind).toBe('not-found');
    });
    
    it("does not flag the record's own id as a duplicate", () => {
      expect(controller.update('STU001', { age: 21 }).success).toBe(true);
    });
    
    it('restamps even when nothing changes', () => {
      const updated = unwrap(controller.update('STU001', {}));
      
      expect(updated.createdAt).toBe('2024-01-15 09:00:00');
      expect(updated.updatedAt).toBe('2024-01-20 10:30:00');
    });
    
    it('leaves the stored record untouched when validation fails', () => {
      const before = unwrap(controller.readById('STU001'));
      const result = failure(controller.update('STU001', { email: 'broken', gpa: 5 }));
      
      expect(result.message).toBe('Validation failed:\n- Invalid email format\n- GPA must be between 0.0 and 4.0');
      expect(unwrap(controller.readById('STU001'))).toEqual(before);
    });
    
    it('rejects a value of the wrong type instead of dropping it', () => {
      const before = unwrap(controller.readById('STU001'));
      const changes: StudentUpdate = {};
      Reflect.set(changes, 'age', 'abc');
      Reflect.set(changes, 'name', 42);
      
      const result = failure(controller.update('STU001', changes));
      
      expect(result.error.kind).toBe('validation');
      expect(result.message).toBe('Validation failed:\n- Name must be text\n- Age must be a whole number');
      expect(unwrap(controller.readById('STU001'))).toEqual(before);
    });
    
    it('rejects an empty id and an unknown id', () => {
      expect(failure(controller.update('', { age: 30 })).error.kind).toBe('request');
      expect(failure(controller.update('STU999', { age: 30 })).message).toBe("Student with ID 'STU999' not found.");
    });
  });
  
  describe('delete', () => {
    beforeEach(() => {
      for (const sample of SAMPLES.slice(0, 2)) controller.create(sample);
    });
    
    it('removes once, then reports not found', () => {
      const first = controller.delete('STU001');
      const second = failure(controller.delete('STU001'));
      
      expect(first.message).toBe('Student John Doe (ID: STU001) deleted successfully!');
      expect(unwrap(first).email).toBe('john.doe@email.com');
      expect(second.error.kind).toBe('not-found');
      expect(unwrap(controller.readAll()).map(s => s.id)).toEqual(['STU002']);
    });
    
    it('treats an empty id as a bad request', () => {
      expect(failure(controller.delete('')).message).toBe('Student ID cannot be empty.');
      expect(unwrap(controller.readAll())).toHaveLength(2);
    });
  });
  
  describe('search', () => {
    beforeEach(() => {
      for (const sample of SAMPLES) controller.create(sample);
    });
    
    it('matches case-insensitive substrings', () => {
      const result = controller.search('SCIENCE', 'major');
      
      expect(result.message).toBe("Found 2 student(s) matching 'SCIENCE' in major.");
      expect(unwrap(result).map(s => s.id)).toEqual(['STU001', 'STU004']);
    });
    
    it('matches anywhere in the value', () => {
      // "mathematics" and "physics" end in "cs"; "computer science" does not contain it
      expect(unwrap(controller.search('cs', 'major')).map(s => s.id)).toEqual(['STU002', 'STU003']);
    });
    
    it('defaults to searching names', () => {
      expect(unwrap(controller.search('jane')).map(s => s.id)).toEqual(['STU002']);
    });
    
    it('searches ids and emails', () => {
      expect(unwrap(controller.search('stu00', 'id'))).toHaveLength(5);
      expect(unwrap(controller.search('BROWN@', 'email')).map(s => s.id)).toEqual(['STU005']);
    });
    
    it('returns an empty success when nothing matches', () => {
      expect(controller.search('zzz', 'name')).toEqual({
        success: true,
        message: "No students found matching 'zzz' in name.",
        value: [],
      });
    });
    
    it('rejects an empty term', () => {
      const result = failure(controller.search('', 'name'));
      
      expect(result.error.kind).toBe('request');
      expect(result.message).toBe('Search term cannot be empty.');
    });
    
    it('rejects unsupported fields', () => {
      const result = failure(controller.search('3', 'gpa'));
      
      expect(result.error.kind).toBe('request');
      expect(result.message).toBe('Invalid search field. Valid fields: name, major, email, id');
    });
  });
  
  describe('statistics', () => {
    it('returns no payload for an empty collection', () => {
      expect(controller.statistics()).toEqual({
        success: true,
        message: 'No students in the system.',
        value: null,
      });
    });
    
    it('aggregates gpa, age and majors', () => {
      for (const sample of SAMPLES) controller.create(sample);
      
      const result = controller.statistics();
      
      expect(result.message).toBe('Statistics calculated successfully.');
      expect(unwrap(result)).toEqual({
        totalStudents: 5,
        averageGpa: 3.7,
        highestGpa: 3.9,
        lowestGpa: 3.5,
        averageAge: 20.4,
        majorDistribution: new Map([
          ['Computer Science', 2],
          ['Mathematics', 1],
          ['Physics', 1],
          ['Engineering', 1],
        ]),
      });
    });
    
    it('rounds exact halves to the even digit', () => {
      const rows: Array<[number, number]> = [[20, 3.0], [20, 3.5], [20, 3.0], [21, 3.0]];
      rows.forEach(([age, gpa], i) => {
        unwrap(controller.create({ ...JOHN, id: `AVG00${i}`, age, gpa }));
      });
      
      const stats = unwrap(controller.statistics());
      
      expect(stats?.averageAge).toBe(20.2);
      expect(stats?.averageGpa).toBe(3.12);
    });
    
    it('rounds an exact half up when the kept digit is odd', () => {
      const rows: Array<[number, number]> = [[20, 3.0], [21, 3.0], [21, 3.0], [21, 3.0]];
      rows.forEach(([age, gpa], i) => {
        unwrap(controller.create({ ...JOHN, id: `AVG00${i}`, age, gpa }));
      });
      
      expect(unwrap(controller.statistics())?.averageAge).toBe(20.8);
    });
  });
  
  describe('exportAll', () => {
    it('returns a copy of every row', () => {
      controller.create(JOHN);
      
      const result = controller.exportAll();
      const rows = unwrap(result);
      const first = rows[0];
      if (first) first.name = 'Tampered';
      rows.push(importRow(1));
      
      expect(result.message).toBe('Exported 1 student records.');
      expect(unwrap(controller.readById('STU001')).name).toBe('John Doe');
      expect(unwrap(controller.readAll())).toHaveLength(1);
    });
  });
  
  describe('importAll', () => {
    beforeEach(() => {
      controller.create(JOHN);
      controller.create(MIKE);
    });
    
    it('replaces the collection and keeps timestamps', () => {
      const rows = [importRow(1), importRow(2)];
      const result = controller.importAll(rows);
      
      expect(result).toEqual({
        success: true,
        message: 'Successfully imported 2 student records.',
        value: 2,
      });
      expect(unwrap(controller.exportAll())).toEqual(rows);
    });
    
    it('rejects the whole batch when one row is invalid', () => {
      const before = unwrap(controller.exportAll());
      const rows = Array.from({ length: 10 }, (_, i) => importRow(i + 1));
      rows.splice(5, 0, importRow(99, { name: 'Bad Row', email: 'not-an-email' }));
      
      const result = failure(controller.importAll(rows));
      
      expect(result.error.kind).toBe('validation');
      expect(result.message).toBe('Import failed due to validation errors:\nRow 6: Invalid email format');
      expect(unwrap(controller.exportAll())).toEqual(before);
    });
    
    it('checks ids against rows accepted earlier in the batch', () => {
      const result = failure(controller.importAll([importRow(1), importRow(2), importRow(1, { name: 'Other Name' })]));
      
      expect(result.error.details).toEqual(['Row 3: Student ID already exists']);
    });
    
    it('joins several errors of one row with commas', () => {
      const result = failure(controller.importAll([importRow(1, { age: 12, gpa: -1 })]));
      
      expect(result.error.details).toEqual([
        'Row 1: Age must be between 16 and 100, GPA must be between 0.0 and 4.0',
      ]);
    });
    
    it('does not compare against the collection being replaced', () => {
      const result = controller.importAll([importRow(1, { id: 'STU001' })]);
      
      expect(result.success).toBe(true);
      expect(unwrap(controller.readAll()).map(s => s.id)).toEqual(['STU001']);
    });
  });
  
  describe('isolation and failures', () => {
    it('keeps separate collections per controller', () => {
      const other = new StudentController();
      controller.create(JOHN);
      
      expect(unwrap(other.readAll())).toEqual([]);
    });
    
    it('uses an injected store', () => {
      const store = createStudentStore();
      const withStore = createStudentController({ store });
      
      withStore.create(JOHN);
      
      expect(store.ids()).toEqual(['STU001']);
    });
    
    it('turns store exceptions into internal failures', () => {
      const store = createStudentStore();
      vi.spyOn(store, 'append').mockImplementation(() => {
        throw new Error('store unavailable');
      });
      const broken = createStudentController({ store });
      
      const result = failure(broken.create(JOHN));
      
      expect(result.error).toEqual({ kind: 'internal', details: ['store unavailable'] });
      expect(result.message).toBe('Error creating student: store unavailable');
      expect(store.size()).toBe(0);
    });
  });
});
