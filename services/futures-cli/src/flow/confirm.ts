import { createInterface } from 'node:readline/promises';

/**
 * Thrown when the user presses Ctrl+C at a prompt.
 */
export class UserInterruptError extends Error {
  constructor() {
    super('Interrupted by user');
    this.name = 'UserInterruptError';
  }
}

export interface ConfirmationProvider {
  ask(question: string): Promise<string>;
}

export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === 'yes';
}

/**
 * `--yes`: answers every question affirmatively without reading input.
 */
export const autoConfirm: ConfirmationProvider = {
  async ask() {
    return 'yes';
  },
};

/**
 * Interactive prompt. End of input counts as an empty (declining) answer.
 */
export function createTerminalPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ConfirmationProvider {
  return {
    async ask(question: string) {
      const rl = createInterface({ input, output });

      try {
        return await new Promise<string>((resolve, reject) => {
          rl.once('SIGINT', () => reject(new UserInterruptError()));
          rl.once('close', () => resolve(''));
          rl.question(question).then(resolve, reject);
        });
      } finally {
        rl.close();
      }
    },
  };
}
