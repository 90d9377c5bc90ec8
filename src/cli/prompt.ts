import * as readline from 'readline';
import { Checkpoint } from '../core/types/types';
import { ResumeDecision } from './orchestrator';

/**
 * Ask whether to resume a checkpoint. `n` declines, any other answer
 * resumes, and input ending without an answer yields 'ignore'.
 */
export function askResume(
  checkpoint: Checkpoint,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<ResumeDecision> {
  const rl = readline.createInterface({ input, output, terminal: false });

  return new Promise((resolve) => {
    let answered = false;

    rl.on('close', () => {
      if (!answered) {
        resolve('ignore');
      }
    });

    rl.question(`Resume from frame ${checkpoint.frame}? (Y/n): `, (answer) => {
      answered = true;
      rl.close();
      resolve(answer.trim().toLowerCase() === 'n' ? 'decline' : 'resume');
    });
  });
}
