import inquirer from 'inquirer';
import { createInterface, type Interface } from 'node:readline';

export interface InputProvider {
  /** Resolves to undefined once the input is closed. */
  readPassword(message: string): Promise<string | undefined>;
  readLine(message: string): Promise<string | undefined>;
  close(): void;
}

export interface OutputSink {
  write(line: string): void;
}

export class PromptInputProvider implements InputProvider {
  async readPassword(message: string): Promise<string | undefined> {
    // no mask: nothing is echoed while typing
    const { password } = await inquirer.prompt<{ password: string }>([
      { type: 'password', name: 'password', message },
    ]);
    return password;
  }

  async readLine(message: string): Promise<string | undefined> {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      { type: 'input', name: 'answer', message },
    ]);
    return answer;
  }

  close(): void {}
}

/** Reads one line per request from a stream; prompt messages are not shown. */
export class LineInputProvider implements InputProvider {
  private rl: Interface;
  private lines: AsyncIterator<string>;

  constructor(input: NodeJS.ReadableStream) {
    this.rl = createInterface({ input, terminal: false, crlfDelay: Infinity });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  private async next(): Promise<string | undefined> {
    const { value, done } = await this.lines.next();
    return done ? undefined : value;
  }

  readPassword(_message: string): Promise<string | undefined> {
    return this.next();
  }

  readLine(_message: string): Promise<string | undefined> {
    return this.next();
  }

  close(): void {
    this.rl.close();
  }
}
