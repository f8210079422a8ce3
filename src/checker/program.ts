import { Command, InvalidArgumentError, Option } from 'commander';
import { createReadStream } from 'fs';
import log from 'loglevel';
import { createInterface } from 'node:readline';
import { ConfigError, DEFAULT_SCORING_CONFIG, loadScoringConfig, type ScoringConfig } from '../strength/config.js';
import { STRENGTH_TIERS, type StrengthTier } from '../strength/const.js';
import { createStrengthChecker, isStrengthTier } from '../strength/password-strength.js';
import { evaluateLines } from './batch.js';
import { isLogLevelName, LOG_LEVELS, readCheckerEnv, type LogLevelName } from './env.js';
import { LineInputProvider, PromptInputProvider, type InputProvider, type OutputSink } from './input.js';
import { errorMessage, runSession } from './session.js';

interface GlobalOptions {
  config?: string;
  logLevel?: LogLevelName;
}

export interface ProgramOptions {
  env: NodeJS.ProcessEnv;
  output: OutputSink;
  exit: (code: number) => void;
  stdin?: NodeJS.ReadableStream;
  /** Input for the interactive session; defaults to a prompt on a TTY and line reads otherwise. */
  createInput?: () => InputProvider;
  now?: () => Date;
}

function parseTier(value: string): StrengthTier {
  if (!isStrengthTier(value)) throw new InvalidArgumentError(`Expected one of: ${STRENGTH_TIERS.join(', ')}`);
  return value;
}

function parseLogLevel(value: string): LogLevelName {
  if (!isLogLevelName(value)) throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(', ')}`);
  return value;
}

export function createProgram({
  env,
  output,
  exit,
  stdin = process.stdin,
  createInput = () => (process.stdin.isTTY ? new PromptInputProvider() : new LineInputProvider(stdin)),
  now,
}: ProgramOptions): Command {
  const program = new Command();
  program
    .name('pwcheck')
    .description('Heuristic password strength checker')
    .version('0.1.0')
    .addOption(new Option('-c, --config <file>', 'scoring configuration (JSON overrides)'))
    .addOption(new Option('-L, --log-level <level>', `log level (${LOG_LEVELS.join(', ')})`).argParser(parseLogLevel));

  // Options win over PWCHECK_* variables; sets the log level as a side effect.
  async function prepare(): Promise<ScoringConfig> {
    const checkerEnv = readCheckerEnv(env);
    const opts = program.opts<GlobalOptions>();
    log.setLevel(opts.logLevel ?? checkerEnv.PWCHECK_LOG_LEVEL ?? 'info');

    const file = opts.config ?? checkerEnv.PWCHECK_CONFIG;
    if (!file) {
      log.debug('Using default scoring configuration');
      return DEFAULT_SCORING_CONFIG;
    }
    const config = await loadScoringConfig(file);
    log.debug('Loaded scoring configuration from', file);
    return config;
  }

  function guarded<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
    return async (...args) => {
      try {
        await action(...args);
      } catch (e) {
        log.error(e instanceof ConfigError ? e.message : `Unexpected error: ${errorMessage(e)}`);
        exit(1);
      }
    };
  }

  program
    .command('interactive', { isDefault: true })
    .description('evaluate passwords one at a time')
    .action(
      guarded(async () => {
        const config = await prepare();
        const input = createInput();
        try {
          const { evaluated } = await runSession({ input, output, check: createStrengthChecker(config), now });
          log.debug(`Evaluated ${evaluated} password(s)`);
        } finally {
          input.close();
        }
      }),
    );

  program
    .command('check')
    .description('evaluate one password per line from a file or stdin')
    .argument('[file]', 'file with one password per line (default: stdin)')
    .addOption(new Option('--min-tier <tier>', 'exit with code 2 if any password is below this tier').argParser(parseTier))
    .option('--json', 'print one JSON object per password')
    .action(
      guarded(async (file: string | undefined, opts: { minTier?: StrengthTier; json?: boolean }) => {
        const config = await prepare();
        const rl = createInterface({ input: file ? createReadStream(file) : stdin, crlfDelay: Infinity });
        let failures = 0;
        for await (const entry of evaluateLines(rl, { config, minimumTier: opts.minTier })) {
          if (!entry.passes) failures++;
          if (opts.json) {
            const { tier, score } = entry.result;
            output.write(JSON.stringify({ line: entry.line, tier, score, passes: entry.passes, feedback: entry.message }));
          } else {
            output.write(`${entry.line}: ${entry.message}`);
          }
        }
        if (failures > 0) {
          log.warn(`${failures} password(s) below ${opts.minTier}`);
          exit(2);
        }
      }),
    );

  return program;
}
