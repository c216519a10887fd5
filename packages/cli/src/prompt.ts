/**
 * Confirmation Prompt
 *
 * Yes/no questions on the terminal. One readline interface serves every
 * question of a run: answers piped in ahead of time are queued and handed
 * out in order. Anything but y/yes counts as no, and so does running out
 * of input.
 */

import * as readline from 'readline';

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

export class ConfirmationPrompt {
  private readonly rl: readline.Interface;
  private readonly lines: string[] = [];
  private pending: ((line: string | null) => void) | null = null;
  private ended = false;

  constructor(streams: PromptStreams = { input: process.stdin, output: process.stdout }) {
    this.rl = readline.createInterface({
      input: streams.input,
      output: streams.output,
    });

    this.rl.on('line', (line) => {
      const resolve = this.pending;
      if (resolve) {
        this.pending = null;
        resolve(line);
      } else {
        this.lines.push(line);
      }
    });

    this.rl.on('close', () => {
      this.ended = true;
      const resolve = this.pending;
      this.pending = null;
      resolve?.(null);
    });
  }

  /**
   * Ask one question; resolves false once input has ended
   */
  async confirm(message: string): Promise<boolean> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      this.show(message);
      return isAffirmative(buffered);
    }
    if (this.ended) {
      return false;
    }

    this.show(message);
    const answer = await new Promise<string | null>((resolve) => {
      this.pending = resolve;
    });
    return answer !== null && isAffirmative(answer);
  }

  close(): void {
    if (!this.ended) {
      this.rl.close();
    }
  }

  private show(message: string): void {
    if (this.ended) return;
    this.rl.setPrompt(`${message} [y/N] `);
    this.rl.prompt();
  }
}
