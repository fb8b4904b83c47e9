/**
 * InMemoryStudentStore — Process-lifetime implementation of StudentStore.
 * 
 * Rows live in an array for the life of the process. Nothing is persisted.
 */

import type { StudentRecord, StudentStore, StudentStoreConfig } from './types.js';

function copyRow(row: StudentRecord): StudentRecord {
  return { ...row };
}

export class InMemoryStudentStore implements StudentStore {
  private rows: StudentRecord[];
  
  constructor(config: StudentStoreConfig = {}) {
    this.rows = (config.initialRows ?? []).map(copyRow);
  }
  
  list(): StudentRecord[] {
    return this.rows.map(copyRow);
  }
  
  size(): number {
    return this.rows.length;
  }
  
  ids(): string[] {
    return this.rows.map(row => row.id);
  }
  
  indexOf(id: string): number {
    return this.rows.findIndex(row => row.id === id);
  }
  
  at(index: number): StudentRecord | null {
    const row = this.rows[index];
    return row !== undefined ? copyRow(row) : null;
  }
  
  append(row: StudentRecord): void {
    this.rows.push(copyRow(row));
  }
  
  replaceAt(index: number, row: StudentRecord): void {
    if (index < 0 || index >= this.rows.length) {
      throw new RangeError(`No row at index ${index}`);
    }
    this.rows[index] = copyRow(row);
  }
  
  removeAt(index: number): StudentRecord | null {
    if (index < 0 || index >= this.rows.length) {
      return null;
    }
    const [removed] = this.rows.splice(index, 1);
    return removed ?? null;
  }
  
  replaceAll(rows: readonly StudentRecord[]): void {
    this.rows = rows.map(copyRow);
  }
}

/**
 * Create an empty (or pre-seeded) in-memory store.
 */
export function createStudentStore(config?: StudentStoreConfig): InMemoryStudentStore {
  return new InMemoryStudentStore(config);
}
