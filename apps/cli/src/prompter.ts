/**
 * Line input for the interactive menu.
 *
 * ask() resolves with the next line typed, or null once input has ended
 * (Ctrl+D, a closed pipe).
 */

import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';

export interface Prompter {
  ask(question: string): Promise<string | null>;
  close(): void;
}

export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly pending: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private ended = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = createInterface({ input, output });

    // Lines can arrive before anyone asks (piped input), so queue them
    this.rl.on('line', (line: string) => {
      if (this.waiting) {
        this.settle(line);
      } else {
        this.pending.push(line);
      }
    });
    this.rl.on('close', () => {
      this.ended = true;
      this.settle(null);
    });
  }

  ask(question: string): Promise<string | null> {
    if (this.ended) {
      // readline refuses to prompt once closed; queued lines still get answered
      this.output.write(question);
    } else {
      this.rl.setPrompt(question);
      this.rl.prompt();
    }

    const next = this.pending.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.ended) return Promise.resolve(null);

    return new Promise(resolve => {
      this.waiting = resolve;
    });
  }

  close(): void {
    if (!this.ended) this.rl.close();
  }

  private settle(line: string | null): void {
    const resolve = this.waiting;
    this.waiting = null;
    resolve?.(line);
  }
}
