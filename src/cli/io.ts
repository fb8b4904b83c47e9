/**
 * Terminal I/O for the interactive menu.
 *
 * The menu only talks to a MenuIO, so tests can drive it with scripted
 * answers instead of a real terminal.
 */

import { createInterface } from 'node:readline';

export interface MenuIO {
  /** Ask a question; resolves to null once input has closed */
  ask(question: string): Promise<string | null>;
  /** Print one line (or a blank line) */
  print(text?: string): void;
  /** Clear the screen, where the output supports it */
  clear(): void;
}

export interface TerminalIO extends MenuIO {
  close(): void;
}

/**
 * MenuIO over stdin/stdout using readline.
 *
 * Ctrl+C or end of input closes the interface; pending and later
 * questions then resolve to null.
 */
export function createTerminalIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WriteStream = process.stdout,
): TerminalIO {
  const rl = createInterface({ input, output });
  const pending = new Set<(answer: string | null) => void>();
  let closed = false;

  rl.on('SIGINT', () => rl.close());
  rl.on('close', () => {
    closed = true;
    for (const resolve of pending) resolve(null);
    pending.clear();
  });

  return {
    ask(question: string): Promise<string | null> {
      if (closed) {
        return Promise.resolve(null);
      }
      return new Promise(resolve => {
        pending.add(resolve);
        rl.question(question, answer => {
          pending.delete(resolve);
          resolve(answer);
        });
      });
    },
    print(text = ''): void {
      console.log(text);
    },
    clear(): void {
      if (output.isTTY) {
        console.clear();
      }
    },
    close(): void {
      rl.close();
    },
  };
}
