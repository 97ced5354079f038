/**
 * Menu input/output
 * The menu talks to the terminal only through MenuIO
 */
import * as readline from 'readline';

export interface MenuIO {
  write(text: string): void;
  /** Resolves to null once input has ended */
  question(prompt: string): Promise<string | null>;
  close(): void;
}

type LineWaiter = (line: string | null) => void;

/**
 * MenuIO over stdin/stdout.
 * Lines are queued as they arrive, so piped input that delivers many lines in
 * one chunk is answered line by line.
 */
export class ConsoleMenuIO implements MenuIO {
  private rl: readline.Interface;
  private output: NodeJS.WritableStream;
  private lines: string[] = [];
  private waiter: LineWaiter | null = null;
  private ended = false;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.output = output;
    // No terminal mode: the terminal echoes typed input itself
    this.rl = readline.createInterface({ input, terminal: false });

    this.rl.on('line', (line) => {
      const waiter = this.takeWaiter();
      if (waiter) {
        waiter(line);
      } else {
        this.lines.push(line);
      }
    });

    this.rl.on('close', () => {
      this.ended = true;
      this.takeWaiter()?.(null);
    });
  }

  public write(text: string): void {
    this.output.write(text);
  }

  public async question(prompt: string): Promise<string | null> {
    this.output.write(prompt);

    const queued = this.lines.shift();
    if (queued !== undefined) return queued;
    if (this.ended) return null;

    return new Promise<string | null>((resolve) => {
      this.waiter = resolve;
    });
  }

  public close(): void {
    this.rl.close();
  }

  private takeWaiter(): LineWaiter | null {
    const waiter = this.waiter;
    this.waiter = null;
    return waiter;
  }
}

const INTEGER_ANSWER = /^[+-]?\d+$/;

/**
 * Prompt helpers on top of MenuIO
 */
export class Prompter {
  constructor(private readonly io: MenuIO) {}

  public print(text: string): void {
    this.io.write(text);
  }

  /**
   * Ask for a line of text
   * @returns The trimmed answer, or null once input has ended
   */
  public async readLine(prompt: string): Promise<string | null> {
    const answer = await this.io.question(prompt);
    return answer === null ? null : answer.trim();
  }

  /**
   * Ask for an integer, asking again until one is given
   * @returns The number, or null once input has ended
   */
  public async readInt(prompt: string): Promise<number | null> {
    for (;;) {
      const answer = await this.readLine(prompt);
      if (answer === null) return null;

      if (INTEGER_ANSWER.test(answer)) {
        return Number(answer);
      }
      this.print('Invalid number. Try again.\n');
    }
  }
}
