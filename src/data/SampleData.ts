/**
 * SampleData — Load the demo roster from YAML.
 *
 * The file holds a top-level `students` list. Rows are checked for shape
 * only (types and field names); the controller applies the real rules
 * when the rows are created.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'yaml';
import { z } from 'zod';
import type { StudentInput } from '../types/StudentRecord.js';

const SampleRowSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    name: z.string(),
    email: z.string(),
    age: z.number(),
    major: z.string(),
    gpa: z.number(),
  })
  .strict();

const SampleFileSchema = z.object({
  students: z.array(SampleRowSchema),
});

/**
 * Raised when a sample file cannot be read as a roster.
 */
export class SampleDataError extends Error {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(`Invalid sample data in ${source}: ${message}`);
    this.name = 'SampleDataError';
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse roster YAML text into create inputs.
 *
 * @param content - YAML text
 * @param source - Name used in error messages
 */
export function parseSampleData(content: string, source = 'sample data'): StudentInput[] {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new SampleDataError(err instanceof Error ? err.message : String(err), source);
  }

  const result = SampleFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new SampleDataError(describeIssues(result.error), source);
  }

  return result.data.students;
}

/**
 * Read and parse a roster file.
 */
export async function loadSampleData(path: string): Promise<StudentInput[]> {
  const content = await readFile(path, 'utf-8');
  return parseSampleData(content, path);
}
