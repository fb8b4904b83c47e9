/**
 * Prompt helpers: re-ask until the answer has the right shape.
 *
 * These only coerce raw text. Field rules (ranges, patterns) are left to
 * the controller so every error is reported together.
 */

import { z } from 'zod';
import type { MenuIO } from './io.js';

/**
 * Raised when input closes while a prompt is waiting.
 */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

const IntegerInput = z.coerce.number().int().finite();
const NumberInput = z.coerce.number().finite();

async function read(io: MenuIO, question: string): Promise<string> {
  const answer = await io.ask(question);
  if (answer === null) {
    throw new InputClosedError();
  }
  return answer.trim();
}

/**
 * Ask until a non-empty answer is given.
 */
export async function askRequired(io: MenuIO, question: string): Promise<string> {
  for (;;) {
    const answer = await read(io, question);
    if (answer) {
      return answer;
    }
    io.print('This field is required. Please enter a value.');
  }
}

/**
 * Ask once; an empty answer means "keep the current value".
 */
export async function askOptional(io: MenuIO, question: string): Promise<string | undefined> {
  const answer = await read(io, question);
  return answer || undefined;
}

function coerce(io: MenuIO, answer: string, schema: z.ZodNumber, hint: string): number | undefined {
  const parsed = schema.safeParse(answer);
  if (parsed.success) {
    return parsed.data;
  }
  io.print(`Invalid input. Please enter ${hint}.`);
  return undefined;
}

async function askRequiredNumeric(io: MenuIO, question: string, schema: z.ZodNumber, hint: string): Promise<number> {
  for (;;) {
    const value = coerce(io, await askRequired(io, question), schema, hint);
    if (value !== undefined) {
      return value;
    }
  }
}

async function askOptionalNumeric(
  io: MenuIO,
  question: string,
  schema: z.ZodNumber,
  hint: string,
): Promise<number | undefined> {
  for (;;) {
    const answer = await askOptional(io, question);
    if (answer === undefined) {
      return undefined;
    }
    const value = coerce(io, answer, schema, hint);
    if (value !== undefined) {
      return value;
    }
  }
}

export function askInteger(io: MenuIO, question: string): Promise<number> {
  return askRequiredNumeric(io, question, IntegerInput, 'a whole number');
}

export function askOptionalInteger(io: MenuIO, question: string): Promise<number | undefined> {
  return askOptionalNumeric(io, question, IntegerInput, 'a whole number');
}

export function askNumber(io: MenuIO, question: string): Promise<number> {
  return askRequiredNumeric(io, question, NumberInput, 'a number');
}

export function askOptionalNumber(io: MenuIO, question: string): Promise<number | undefined> {
  return askOptionalNumeric(io, question, NumberInput, 'a number');
}
