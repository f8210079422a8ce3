export const STRENGTH_TIERS = ['Very Weak', 'Weak', 'Moderate', 'Strong', 'Very Strong'] as const;
export type StrengthTier = (typeof STRENGTH_TIERS)[number];

export const CHARACTER_CLASSES = ['lower', 'upper', 'digit', 'special'] as const;
export type CharacterClass = (typeof CHARACTER_CLASSES)[number];

export const WEAKNESSES = ['sequence', 'repetition'] as const;
export type Weakness = (typeof WEAKNESSES)[number];

export const MISSING_LABELS: Record<CharacterClass, string> = {
  lower: 'lowercase letters',
  upper: 'uppercase letters',
  digit: 'numbers',
  special: 'special characters (!@#...)',
};

export const WEAKNESS_LABELS: Record<Weakness, string> = {
  sequence: "contains sequences (like 'abc' or '123')",
  repetition: "contains repetitions (like 'aaa' or '111')",
};

// ASCII punctuation, 32 characters
export const SPECIAL_CHARACTERS = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';

export const DEFAULT_WINDOW_LENGTH = 3;
