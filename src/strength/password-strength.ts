import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from './config.js';
import {
  CHARACTER_CLASSES,
  MISSING_LABELS,
  SPECIAL_CHARACTERS,
  STRENGTH_TIERS,
  WEAKNESS_LABELS,
  WEAKNESSES,
  type CharacterClass,
  type StrengthTier,
  type Weakness,
} from './const.js';
import { detectRepetitions, detectSequences } from './detectors.js';

export interface EvaluationResult {
  tier: StrengthTier;
  tooShort: boolean;
  length: number;
  /** Length settings of the config the result was scored with. */
  minLength: number;
  goodLength: number;
  baseScore: number;
  penalty: number;
  score: number;
  missing: CharacterClass[];
  weaknesses: Weakness[];
}

const CLASS_TESTS: Record<CharacterClass, (c: string) => boolean> = {
  lower: c => /\p{Lowercase}/u.test(c),
  upper: c => /\p{Uppercase}/u.test(c),
  digit: c => /\p{Nd}/u.test(c),
  special: c => SPECIAL_CHARACTERS.includes(c),
};

const DETECTORS: Record<Weakness, (password: string, length: number) => boolean> = {
  sequence: detectSequences,
  repetition: detectRepetitions,
};

export function classifyScore(score: number, thresholds: ScoringConfig['thresholds']): StrengthTier {
  if (score <= thresholds.weak) return 'Very Weak';
  if (score <= thresholds.moderate) return 'Weak';
  if (score <= thresholds.strong) return 'Moderate';
  if (score <= thresholds.veryStrong) return 'Strong';
  return 'Very Strong';
}

export function evaluatePassword(password: string, config: ScoringConfig = DEFAULT_SCORING_CONFIG): EvaluationResult {
  const chars = Array.from(password);
  const length = chars.length;
  const { minLength, goodLength } = config;

  if (length < minLength) {
    return {
      tier: 'Very Weak',
      tooShort: true,
      length,
      minLength,
      goodLength,
      baseScore: 0,
      penalty: 0,
      score: 0,
      missing: [],
      weaknesses: [],
    };
  }

  let baseScore = length >= goodLength ? config.points.goodLength : config.points.minLength;
  const missing: CharacterClass[] = [];
  for (const cls of CHARACTER_CLASSES) {
    if (chars.some(CLASS_TESTS[cls])) baseScore += config.points[cls];
    else missing.push(cls);
  }

  let penalty = 0;
  const weaknesses: Weakness[] = [];
  for (const weakness of WEAKNESSES) {
    if (DETECTORS[weakness](password, config.windowLength)) {
      penalty += config.penalties[weakness];
      weaknesses.push(weakness);
    }
  }

  const score = Math.max(0, baseScore - penalty);
  return {
    tier: classifyScore(score, config.thresholds),
    tooShort: false,
    length,
    minLength,
    goodLength,
    baseScore,
    penalty,
    score,
    missing,
    weaknesses,
  };
}

export function formatFeedback(result: EvaluationResult): string {
  if (result.tooShort) {
    return `Very Weak (Too Short - minimum ${result.minLength} characters recommended)`;
  }

  const details: string[] = [];
  if (result.missing.length) {
    details.push(`consider adding: ${result.missing.map(c => MISSING_LABELS[c]).join(', ')}`);
  }
  if (result.length < result.goodLength && result.tier !== 'Strong' && result.tier !== 'Very Strong') {
    details.push(`consider increasing length to ${result.goodLength}+ characters`);
  }
  if (result.weaknesses.length) {
    details.push(`avoid patterns like: ${result.weaknesses.map(w => WEAKNESS_LABELS[w]).join(', ')}`);
  }

  return details.length ? `${result.tier} (${details.join('; ')})` : result.tier;
}

/**
 * Evaluates a password and renders the tier with its feedback, e.g.
 * `Strong (avoid patterns like: contains sequences (like 'abc' or '123'))`.
 */
export function checkPasswordStrength(password: string, config: ScoringConfig = DEFAULT_SCORING_CONFIG): string {
  return formatFeedback(evaluatePassword(password, config));
}

export function createStrengthChecker(config: ScoringConfig): (password: string) => string {
  return password => checkPasswordStrength(password, config);
}

export function isStrengthTier(value: string): value is StrengthTier {
  return STRENGTH_TIERS.some(tier => tier === value);
}

export function meetsTier(tier: StrengthTier, minimum: StrengthTier): boolean {
  return STRENGTH_TIERS.indexOf(tier) >= STRENGTH_TIERS.indexOf(minimum);
}
