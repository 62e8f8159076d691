import { createInterface, type Interface } from 'node:readline';
import type { ConversationHistory, HumanChannel } from '@switchboard/agents';

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const GREEN = '\x1b[32m';

export interface ConsoleHumanChannelOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** ANSI colours; off for pipes and tests */
  color?: boolean;
}

interface Waiter {
  resolve: (line: string) => void;
  reject: (err: unknown) => void;
}

/**
 * HumanChannel over a terminal. Lines typed while nobody is waiting are
 * queued; blank lines are ignored.
 */
export class ConsoleHumanChannel implements HumanChannel {
  private readonly rl: Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly color: boolean;
  private readonly lines: string[] = [];
  private waiter: Waiter | undefined;
  private closed = false;
  private lastPrinted: string | undefined;

  constructor(opts: ConsoleHumanChannelOptions = {}) {
    const input = opts.input ?? process.stdin;
    this.output = opts.output ?? process.stdout;
    this.color = opts.color ?? true;
    this.rl = createInterface({ input, terminal: false });

    this.rl.on('line', (line) => {
      const waiter = this.waiter;
      if (waiter) {
        this.waiter = undefined;
        waiter.resolve(line);
      } else {
        this.lines.push(line);
      }
    });
    this.rl.on('close', () => {
      this.closed = true;
      const waiter = this.waiter;
      this.waiter = undefined;
      waiter?.reject(new Error('console input closed'));
    });
  }

  async waitForResponse(promptText: string, _history: ConversationHistory, signal?: AbortSignal): Promise<string> {
    // The prompt is usually the message that was just printed.
    if (promptText !== this.lastPrinted) {
      this.write(`${this.paint(promptText, CYAN)}\n`);
    }
    this.lastPrinted = undefined;

    for (;;) {
      this.write(this.paint('> ', GREEN));
      const line = (await this.nextLine(signal)).trim();
      if (line) return line;
    }
  }

  async printMessage(text: string, mimeType: string): Promise<void> {
    // text/plain carries status lines such as routing notices
    this.write(`${this.paint(text, mimeType === 'text/plain' ? DIM : CYAN)}\n`);
    this.lastPrinted = text;
  }

  close(): void {
    this.rl.close();
  }

  private async nextLine(signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    const queued = this.lines.shift();
    if (queued !== undefined) return queued;
    if (this.closed) throw new Error('console input closed');

    return new Promise<string>((resolve, reject) => {
      const onAbort = () => {
        this.waiter = undefined;
        reject(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = {
        resolve: (line) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(line);
        },
        reject: (err) => {
          signal?.removeEventListener('abort', onAbort);
          reject(err);
        },
      };
    });
  }

  private paint(text: string, code: string): string {
    return this.color ? `${code}${text}${RESET}` : text;
  }

  private write(text: string): void {
    this.output.write(text);
  }
}
