import { readFile } from 'fs/promises';
import _ from 'lodash';
import { z } from 'zod';
import { DEFAULT_WINDOW_LENGTH } from './const.js';

export interface ScoringConfig {
  readonly minLength: number;
  readonly goodLength: number;
  readonly windowLength: number;
  readonly points: Readonly<{
    goodLength: number;
    minLength: number;
    lower: number;
    upper: number;
    digit: number;
    special: number;
  }>;
  readonly penalties: Readonly<{ sequence: number; repetition: number }>;
  readonly thresholds: Readonly<{ weak: number; moderate: number; strong: number; veryStrong: number }>;
}

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

function freezeConfig(config: ScoringConfig): ScoringConfig {
  return Object.freeze({
    ...config,
    points: Object.freeze({ ...config.points }),
    penalties: Object.freeze({ ...config.penalties }),
    thresholds: Object.freeze({ ...config.thresholds }),
  });
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = freezeConfig({
  minLength: 8,
  goodLength: 12,
  windowLength: DEFAULT_WINDOW_LENGTH,
  points: { goodLength: 2, minLength: 1, lower: 1, upper: 1, digit: 1, special: 2 },
  penalties: { sequence: 1, repetition: 1 },
  thresholds: { weak: 1, moderate: 3, strong: 4, veryStrong: 5 },
});

const count = z.number().int().nonnegative();
const positive = z.number().int().min(1);

const overridesSchema = z
  .object({
    minLength: positive,
    goodLength: positive,
    windowLength: positive,
    points: z
      .object({ goodLength: count, minLength: count, lower: count, upper: count, digit: count, special: count })
      .strict()
      .partial(),
    penalties: z.object({ sequence: count, repetition: count }).strict().partial(),
    thresholds: z.object({ weak: count, moderate: count, strong: count, veryStrong: count }).strict().partial(),
  })
  .strict()
  .partial();

export type ScoringOverrides = z.infer<typeof overridesSchema>;

export function parseScoringOverrides(raw: unknown): ScoringOverrides {
  const parsed = overridesSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ConfigError(`Invalid scoring configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}

function assertConsistent(config: ScoringConfig): void {
  if (config.goodLength < config.minLength) {
    throw new ConfigError(`goodLength (${config.goodLength}) must be at least minLength (${config.minLength})`);
  }
  const { weak, moderate, strong, veryStrong } = config.thresholds;
  if (!(weak < moderate && moderate < strong && strong < veryStrong)) {
    throw new ConfigError(
      `thresholds must be strictly increasing (weak=${weak}, moderate=${moderate}, strong=${strong}, veryStrong=${veryStrong})`,
    );
  }
}

/**
 * Deep-merges overrides over {@link DEFAULT_SCORING_CONFIG} and returns a frozen config.
 * Throws {@link ConfigError} when the merged values are inconsistent.
 */
export function defineScoringConfig(overrides: ScoringOverrides = {}): ScoringConfig {
  const merged: ScoringConfig = _.merge({}, DEFAULT_SCORING_CONFIG, parseScoringOverrides(overrides));
  assertConsistent(merged);
  return freezeConfig(merged);
}

export async function loadScoringConfig(file: string): Promise<ScoringConfig> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf8');
  } catch (e) {
    throw new ConfigError(`Cannot read scoring configuration ${file}`, { cause: e });
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Scoring configuration ${file} is not valid JSON`, { cause: e });
  }
  return defineScoringConfig(parseScoringOverrides(json));
}
