/**
 * Types for the Student Store.
 * 
 * The store owns the ordered collection of serialized students.
 * Insertion order is display order. It has NO validation logic;
 * the controller decides what may be written.
 */

import type { StudentRecord } from '../types/StudentRecord.js';

// Re-export for convenience
export type { StudentRecord };

/**
 * StudentStore interface.
 * 
 * Implementations copy rows on the way in and out so no caller ever holds
 * a reference into the live collection.
 */
export interface StudentStore {
  /**
   * Snapshot of all rows in insertion order.
   */
  list(): StudentRecord[];
  
  /**
   * Number of stored rows.
   */
  size(): number;
  
  /**
   * Ids of all rows in insertion order.
   */
  ids(): string[];
  
  /**
   * Position of the first row with this id, or -1.
   */
  indexOf(id: string): number;
  
  /**
   * Copy of the row at a position, or null when out of range.
   */
  at(index: number): StudentRecord | null;
  
  /**
   * Add a row at the end.
   */
  append(row: StudentRecord): void;
  
  /**
   * Replace the row at a position, keeping its place in the order.
   */
  replaceAt(index: number, row: StudentRecord): void;
  
  /**
   * Remove and return the row at a position.
   */
  removeAt(index: number): StudentRecord | null;
  
  /**
   * Replace the whole collection.
   */
  replaceAll(rows: readonly StudentRecord[]): void;
}

/**
 * Configuration for StudentStore.
 */
export interface StudentStoreConfig {
  /** Rows the store starts with (copied) */
  initialRows?: readonly StudentRecord[];
}
