import type { ScoringConfig } from '../strength/config.js';
import type { StrengthTier } from '../strength/const.js';
import { evaluatePassword, formatFeedback, meetsTier, type EvaluationResult } from '../strength/password-strength.js';

export interface BatchEntry {
  line: number;
  result: EvaluationResult;
  message: string;
  passes: boolean;
}

export interface BatchOptions {
  config: ScoringConfig;
  minimumTier?: StrengthTier;
}

// Line numbers are 1-based and count skipped empty lines.
export async function* evaluateLines(lines: AsyncIterable<string>, { config, minimumTier }: BatchOptions): AsyncGenerator<BatchEntry> {
  let line = 0;
  for await (const password of lines) {
    line++;
    if (!password) continue;
    const result = evaluatePassword(password, config);
    yield {
      line,
      result,
      message: formatFeedback(result),
      passes: minimumTier === undefined || meetsTier(result.tier, minimumTier),
    };
  }
}
