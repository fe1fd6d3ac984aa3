import type { Interface } from 'node:readline';
import { ArchiveError } from '../shared/errors.js';

/**
 * Ask one question and resolve with the trimmed answer. Rejects if the
 * interface closes first (stdin ended, Ctrl-D) so callers never wait forever.
 */
export function ask(rl: Interface, question: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const onClose = () => {
      reject(new ArchiveError('Input closed before an answer was given', 'INPUT_CLOSED', { question }));
    };
    rl.once('close', onClose);
    rl.question(question, (answer) => {
      rl.off('close', onClose);
      resolve(answer.trim());
    });
  });
}

/** Like ask, with an empty answer read as null. */
export async function askOptional(rl: Interface, question: string): Promise<string | null> {
  return (await ask(rl, question)) || null;
}
