import type { InputProvider, OutputSink } from './input.js';

export const SESSION_BANNER = [
  '--- Enhanced Password Strength Checker ---',
  'Checks for length, character types, sequences, and repetitions.',
  "Enter passwords to evaluate. Type 'n' when asked to continue to quit.",
] as const;

export interface SessionOptions {
  input: InputProvider;
  output: OutputSink;
  check: (password: string) => string;
  now?: () => Date;
}

export interface SessionSummary {
  evaluated: number;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function formatSessionEnd(at: Date): string {
  const day = at.toLocaleDateString('en-US', { weekday: 'long', year: 'numeric', month: 'long', day: 'numeric' });
  const time = at.toLocaleTimeString('en-US', { hour: '2-digit', minute: '2-digit', hour12: true });
  return `Session ended on ${day} at ${time}.`;
}

/**
 * Prompt/evaluate loop. Ends when the user answers "n...", when input closes,
 * or when a read fails.
 */
export async function runSession({ input, output, check, now = () => new Date() }: SessionOptions): Promise<SessionSummary> {
  SESSION_BANNER.forEach(line => output.write(line));

  let evaluated = 0;
  for (;;) {
    let password: string | undefined;
    try {
      password = await input.readPassword('Enter the password to evaluate');
    } catch (e) {
      output.write(`Error getting password input: ${errorMessage(e)}`);
      break;
    }
    if (password === undefined) break;
    if (!password) {
      output.write('No password entered. Please try again.');
      continue;
    }

    output.write(`Password Strength: ${check(password)}`);
    evaluated++;

    let another: string | undefined;
    try {
      another = await input.readLine('Check another password? (y/n)');
    } catch {
      // treated like closed input
      break;
    }
    if (another === undefined || another.trim().toLowerCase().startsWith('n')) break;
  }

  output.write('Exiting program.');
  output.write('---');
  output.write(formatSessionEnd(now()));
  return { evaluated };
}
