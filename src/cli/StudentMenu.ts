/**
 * StudentMenu — Numbered text menu over a StudentController.
 *
 * The menu collects raw input, coerces numbers, asks for confirmation
 * before deleting and prints whatever the controller returns. It never
 * touches the collection itself.
 */

import type { StudentController } from '../controller/StudentController.js';
import type { SearchField } from '../controller/types.js';
import type { CliConfig } from '../config/types.js';
import type { StudentInput, StudentUpdate } from '../types/StudentRecord.js';
import type { MenuIO } from './io.js';
import {
  InputClosedError,
  askInteger,
  askNumber,
  askOptional,
  askOptionalInteger,
  askOptionalNumber,
  askRequired,
} from './prompts.js';
import { formatStatistics, formatStudentDetails, formatStudentTable, rule } from './render.js';

export interface StudentMenuOptions {
  controller: StudentController;
  io: MenuIO;
  config: CliConfig;
  /** Source of the "Load Sample Data" roster */
  loadSamples: () => Promise<StudentInput[]>;
}

const MENU_ENTRIES = [
  'Create New Student',
  'View All Students',
  'Search Student by ID',
  'Update Student Information',
  'Delete Student',
  'Search Students',
  'View Statistics',
  'Load Sample Data',
  'Exit',
] as const;

const SEARCH_CHOICES: Record<string, { label: string; field: SearchField }> = {
  '1': { label: 'Name', field: 'name' },
  '2': { label: 'Major', field: 'major' },
  '3': { label: 'Email', field: 'email' },
  '4': { label: 'Student ID', field: 'id' },
};

export class StudentMenu {
  private readonly controller: StudentController;
  private readonly io: MenuIO;
  private readonly config: CliConfig;
  private readonly loadSamples: () => Promise<StudentInput[]>;
  private running = false;

  constructor(options: StudentMenuOptions) {
    this.controller = options.controller;
    this.io = options.io;
    this.config = options.config;
    this.loadSamples = options.loadSamples;
  }

  /**
   * Show the menu until the user exits or input closes.
   */
  async run(): Promise<void> {
    this.running = true;

    while (this.running) {
      try {
        if (this.config.clearScreen) {
          this.io.clear();
        }
        this.showMenu();

        const choice = await askRequired(this.io, `Enter your choice (1-${MENU_ENTRIES.length}): `);
        await this.dispatch(choice);
      } catch (err) {
        if (err instanceof InputClosedError) {
          this.io.print();
          this.io.print('Input closed. Goodbye!');
          this.running = false;
        } else {
          this.io.print(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
          await this.pause();
        }
      }
    }
  }

  private showMenu(): void {
    this.io.print(rule(60, '='));
    this.io.print('                  STUDENT RECORDS');
    this.io.print(rule(60, '='));
    this.io.print();
    this.io.print('MAIN MENU:');
    MENU_ENTRIES.forEach((entry, i) => this.io.print(`${i + 1}. ${entry}`));
    this.io.print(rule(40));
  }

  private async dispatch(choice: string): Promise<void> {
    switch (choice) {
      case '1': return this.createStudent();
      case '2': return this.viewAll();
      case '3': return this.findById();
      case '4': return this.updateStudent();
      case '5': return this.deleteStudent();
      case '6': return this.searchStudents();
      case '7': return this.viewStatistics();
      case '8': return this.loadSampleData();
      case '9':
        this.io.print();
        this.io.print('Goodbye!');
        this.running = false;
        return;
      default:
        this.io.print(`Invalid choice. Please select a number from 1-${MENU_ENTRIES.length}.`);
        return this.pause();
    }
  }

  private title(text: string): void {
    this.io.print();
    this.io.print(rule(40, '='));
    this.io.print(text);
    this.io.print(rule(40, '='));
  }

  private printAll(lines: string[]): void {
    for (const line of lines) this.io.print(line);
  }

  private async pause(): Promise<void> {
    if (this.config.pauseAfterAction) {
      await this.io.ask('\nPress Enter to continue...');
    }
  }

  private async createStudent(): Promise<void> {
    this.title('CREATE NEW STUDENT');

    const input: StudentInput = {
      id: await askRequired(this.io, 'Enter Student ID: '),
      name: await askRequired(this.io, 'Enter Full Name: '),
      email: await askRequired(this.io, 'Enter Email Address: '),
      age: await askInteger(this.io, 'Enter Age: '),
      major: await askRequired(this.io, 'Enter Major/Field of Study: '),
      gpa: await askNumber(this.io, 'Enter GPA (0.0-4.0): '),
    };

    const result = this.controller.create(input);
    this.io.print();
    this.io.print(rule(40));
    if (result.success) {
      this.io.print('SUCCESS:');
      this.io.print(result.message);
      this.io.print();
      this.io.print('Student Details:');
      this.printAll(formatStudentDetails(result.value, { created: true }));
    } else {
      this.io.print('ERROR:');
      this.io.print(result.message);
    }
    await this.pause();
  }

  private async viewAll(): Promise<void> {
    this.title('ALL STUDENTS');

    const result = this.controller.readAll();
    this.io.print(result.message);
    if (result.success && result.value.length > 0) {
      this.printAll(formatStudentTable(result.value));
      this.io.print(`Total Students: ${result.value.length}`);
    }
    await this.pause();
  }

  private async findById(): Promise<void> {
    this.title('SEARCH STUDENT BY ID');

    const id = await askRequired(this.io, 'Enter Student ID to search: ');
    const result = this.controller.readById(id);
    this.io.print();
    if (result.success) {
      this.io.print('STUDENT FOUND:');
      this.printAll(formatStudentDetails(result.value, { created: true, updated: true }));
    } else {
      this.io.print(result.message);
    }
    await this.pause();
  }

  private async updateStudent(): Promise<void> {
    this.title('UPDATE STUDENT INFORMATION');

    const id = await askRequired(this.io, 'Enter Student ID to update: ');
    const found = this.controller.readById(id);
    if (!found.success) {
      this.io.print(found.message);
      return this.pause();
    }

    const current = found.value;
    this.io.print();
    this.io.print(`Current Information for ${current.name}:`);
    this.printAll(formatStudentDetails(current).slice(1));
    this.io.print();
    this.io.print('Enter new values (press Enter to keep current value):');

    const changes: StudentUpdate = {};
    const name = await askOptional(this.io, `New Name [${current.name}]: `);
    if (name !== undefined) changes.name = name;
    const email = await askOptional(this.io, `New Email [${current.email}]: `);
    if (email !== undefined) changes.email = email;
    const age = await askOptionalInteger(this.io, `New Age [${current.age}]: `);
    if (age !== undefined) changes.age = age;
    const major = await askOptional(this.io, `New Major [${current.major}]: `);
    if (major !== undefined) changes.major = major;
    const gpa = await askOptionalNumber(this.io, `New GPA [${current.gpa.toFixed(2)}]: `);
    if (gpa !== undefined) changes.gpa = gpa;

    if (Object.keys(changes).length === 0) {
      this.io.print('No changes made.');
      return this.pause();
    }

    const result = this.controller.update(id, changes);
    this.io.print();
    this.io.print(rule(40));
    if (result.success) {
      this.io.print('SUCCESS:');
      this.io.print(result.message);
      this.io.print();
      this.io.print('Updated Information:');
      this.printAll(formatStudentDetails(result.value, { updated: true }));
    } else {
      this.io.print('ERROR:');
      this.io.print(result.message);
    }
    await this.pause();
  }

  private async deleteStudent(): Promise<void> {
    this.title('DELETE STUDENT');

    const id = await askRequired(this.io, 'Enter Student ID to delete: ');
    const found = this.controller.readById(id);
    if (!found.success) {
      this.io.print(found.message);
      return this.pause();
    }

    if (this.config.confirmDelete) {
      this.io.print();
      this.io.print('Student to be deleted:');
      this.io.print(`ID: ${found.value.id}`);
      this.io.print(`Name: ${found.value.name}`);
      this.io.print(`Email: ${found.value.email}`);
      this.io.print(`Major: ${found.value.major}`);

      const answer = await askRequired(this.io, '\nAre you sure you want to delete this student? (yes/no): ');
      if (!['yes', 'y'].includes(answer.toLowerCase())) {
        this.io.print('Deletion cancelled.');
        return this.pause();
      }
    }

    const result = this.controller.delete(id);
    this.io.print();
    this.io.print(rule(40));
    this.io.print(result.success ? 'SUCCESS:' : 'ERROR:');
    this.io.print(result.message);
    await this.pause();
  }

  private async searchStudents(): Promise<void> {
    this.title('SEARCH STUDENTS');

    this.io.print('Search by:');
    for (const [key, choice] of Object.entries(SEARCH_CHOICES)) {
      this.io.print(`${key}. ${choice.label}`);
    }

    const picked = SEARCH_CHOICES[await askRequired(this.io, 'Enter your choice (1-4): ')];
    if (!picked) {
      this.io.print('Invalid choice.');
      return this.pause();
    }

    const term = await askRequired(this.io, `Enter search term for ${picked.field}: `);
    const result = this.controller.search(term, picked.field);
    this.io.print();
    this.io.print(result.message);
    if (result.success && result.value.length > 0) {
      this.printAll(formatStudentTable(result.value));
    }
    await this.pause();
  }

  private async viewStatistics(): Promise<void> {
    this.title('SYSTEM STATISTICS');

    const result = this.controller.statistics();
    if (result.success && result.value) {
      this.printAll(formatStatistics(result.value));
    } else {
      this.io.print(result.message);
    }
    await this.pause();
  }

  private async loadSampleData(): Promise<void> {
    this.title('LOAD SAMPLE DATA');

    const samples = await this.loadSamples();
    let loaded = 0;
    for (const sample of samples) {
      const result = this.controller.create(sample);
      if (result.success) {
        loaded++;
      } else {
        this.io.print(`Skipped ${sample.id ?? '(no id)'}: ${result.error.details.join(', ')}`);
      }
    }

    this.io.print(`Successfully loaded ${loaded} sample students.`);
    await this.pause();
  }
}
