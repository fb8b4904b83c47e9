/**
 * Plain-text rendering of students and statistics for the menu.
 */

import type { StudentRecord } from '../types/StudentRecord.js';
import type { StudentStatistics } from '../controller/types.js';

const RULE_WIDTH = 100;

const COLUMNS: Array<{ label: string; width: number; value: (s: StudentRecord) => string }> = [
  { label: 'ID', width: 10, value: s => s.id },
  { label: 'Name', width: 20, value: s => s.name },
  { label: 'Email', width: 25, value: s => s.email },
  { label: 'Age', width: 5, value: s => String(s.age) },
  { label: 'Major', width: 15, value: s => s.major },
  { label: 'GPA', width: 5, value: s => s.gpa.toFixed(2) },
];

export function rule(width: number, char = '-'): string {
  return char.repeat(width);
}

function row(cells: string[]): string {
  return cells
    .map((cell, i) => cell.padEnd(COLUMNS[i]?.width ?? 0))
    .join(' ')
    .trimEnd();
}

/**
 * Fixed-width table, header and rules included. Long values are not cut.
 */
export function formatStudentTable(students: readonly StudentRecord[]): string[] {
  return [
    rule(RULE_WIDTH),
    row(COLUMNS.map(c => c.label)),
    rule(RULE_WIDTH),
    ...students.map(s => row(COLUMNS.map(c => c.value(s)))),
    rule(RULE_WIDTH),
  ];
}

/**
 * Labelled field lines for a single student.
 */
export function formatStudentDetails(
  student: StudentRecord,
  timestamps: { created?: boolean; updated?: boolean } = {},
): string[] {
  const lines = [
    `ID: ${student.id}`,
    `Name: ${student.name}`,
    `Email: ${student.email}`,
    `Age: ${student.age}`,
    `Major: ${student.major}`,
    `GPA: ${student.gpa.toFixed(2)}`,
  ];
  if (timestamps.created) lines.push(`Created: ${student.createdAt}`);
  if (timestamps.updated) lines.push(`Last Updated: ${student.updatedAt}`);
  return lines;
}

/**
 * Statistics block with the share of each major.
 */
export function formatStatistics(stats: StudentStatistics): string[] {
  const lines = [
    `Total Students: ${stats.totalStudents}`,
    `Average GPA: ${stats.averageGpa}`,
    `Highest GPA: ${stats.highestGpa}`,
    `Lowest GPA: ${stats.lowestGpa}`,
    `Average Age: ${stats.averageAge} years`,
    '',
    'Major Distribution:',
    rule(30),
  ];
  for (const [major, count] of stats.majorDistribution) {
    const share = ((count / stats.totalStudents) * 100).toFixed(1);
    lines.push(`${major}: ${count} students (${share}%)`);
  }
  return lines;
}
