export {
  ConfigError,
  DEFAULT_SCORING_CONFIG,
  defineScoringConfig,
  loadScoringConfig,
  parseScoringOverrides,
  type ScoringConfig,
  type ScoringOverrides,
} from './strength/config.js';
export {
  STRENGTH_TIERS,
  CHARACTER_CLASSES,
  WEAKNESSES,
  type CharacterClass,
  type StrengthTier,
  type Weakness,
} from './strength/const.js';
export { detectRepetitions, detectSequences, digitValue } from './strength/detectors.js';
export {
  checkPasswordStrength,
  classifyScore,
  createStrengthChecker,
  evaluatePassword,
  formatFeedback,
  isStrengthTier,
  meetsTier,
  type EvaluationResult,
} from './strength/password-strength.js';
