import { describe, it, expect } from 'vitest';
import { defineScoringConfig } from '../../src/strength/config.js';
import {
  checkPasswordStrength,
  classifyScore,
  createStrengthChecker,
  evaluatePassword,
  formatFeedback,
  meetsTier,
} from '../../src/strength/password-strength.js';

const TOO_SHORT = 'Very Weak (Too Short - minimum 8 characters recommended)';

describe('evaluatePassword', () => {
  it('stops at the length gate for short passwords', () => {
    for (const pw of ['', 'short', 'Ab1!', 'Xy9$%^&']) {
      const result = evaluatePassword(pw);
      expect(result.tier).toBe('Very Weak');
      expect(result.tooShort).toBe(true);
      expect(checkPasswordStrength(pw)).toBe(TOO_SHORT);
    }
  });

  it('counts length in code points', () => {
    expect(evaluatePassword('😀'.repeat(7)).tooShort).toBe(true);
    const result = evaluatePassword('😀'.repeat(8));
    expect(result.tooShort).toBe(false);
    expect(result.length).toBe(8);
    expect(result.missing).toEqual(['lower', 'upper', 'digit', 'special']);
    expect(result.weaknesses).toEqual(['repetition']);
    expect(result.score).toBe(0);
  });

  it('scores a long lowercase password', () => {
    const result = evaluatePassword('alllowercase');
    expect(result.baseScore).toBe(3);
    expect(result.weaknesses).toEqual(['repetition']);
    expect(result.score).toBe(2);
    expect(result.tier).toBe('Weak');
    expect(result.missing).toEqual(['upper', 'digit', 'special']);
  });

  it('applies the sequence penalty', () => {
    const result = evaluatePassword('Abcdef1!');
    expect(result.baseScore).toBe(6);
    expect(result.penalty).toBe(1);
    expect(result.score).toBe(5);
    expect(result.tier).toBe('Strong');
  });

  it('applies the repetition penalty', () => {
    const result = evaluatePassword('aaaaaaaa');
    expect(result.baseScore).toBe(2);
    expect(result.weaknesses).toEqual(['repetition']);
    expect(result.score).toBe(1);
    expect(result.tier).toBe('Very Weak');
  });

  it('adds both penalties when both patterns appear', () => {
    const result = evaluatePassword('aaabcD1!');
    expect(result.baseScore).toBe(6);
    expect(result.penalty).toBe(2);
    expect(result.weaknesses).toEqual(['sequence', 'repetition']);
    expect(result.tier).toBe('Moderate');
  });

  it('never goes below zero', () => {
    const config = defineScoringConfig({ penalties: { sequence: 10 } });
    const result = evaluatePassword('abcdefgh', config);
    expect(result.baseScore).toBe(2);
    expect(result.score).toBe(0);
    expect(result.tier).toBe('Very Weak');
  });

  it('does not lower the score when more classes are present', () => {
    const scores = ['qwhtpzmk', 'QwhtpzmK', 'Qwhtpzm7', 'Qwhtpz7!'].map(pw => evaluatePassword(pw).score);
    expect(scores).toEqual([2, 3, 4, 6]);
  });

  it('counts decimal digits of any script', () => {
    const result = evaluatePassword('Passwort١٢٣!');
    expect(result.missing).toEqual([]);
    expect(result.baseScore).toBe(7);
    expect(result.weaknesses).toEqual(['sequence']);
    expect(result.score).toBe(6);
    expect(checkPasswordStrength('Passwort١٢٣!')).toBe("Very Strong (avoid patterns like: contains sequences (like 'abc' or '123'))");
  });

  it('recognises non-ASCII letter case', () => {
    const result = evaluatePassword('ÜBERGRÖSSE');
    expect(result.missing).toEqual(['lower', 'digit', 'special']);
    expect(result.tier).toBe('Weak');
  });

  it('returns the same result for the same input', () => {
    expect(evaluatePassword('Correct-Horse-7')).toEqual(evaluatePassword('Correct-Horse-7'));
  });
});

describe('checkPasswordStrength', () => {
  it('lists missing classes for a lowercase-only password', () => {
    expect(checkPasswordStrength('alllowercase')).toBe(
      "Weak (consider adding: uppercase letters, numbers, special characters (!@#...); avoid patterns like: contains repetitions (like 'aaa' or '111'))",
    );
  });

  it('omits the length hint for strong passwords', () => {
    expect(checkPasswordStrength('Abcdef1!')).toBe("Strong (avoid patterns like: contains sequences (like 'abc' or '123'))");
  });

  it('orders fragments as missing, length, weaknesses', () => {
    expect(checkPasswordStrength('aaaaaaaa')).toBe(
      "Very Weak (consider adding: uppercase letters, numbers, special characters (!@#...); consider increasing length to 12+ characters; avoid patterns like: contains repetitions (like 'aaa' or '111'))",
    );
    expect(checkPasswordStrength('password123')).toBe(
      "Weak (consider adding: uppercase letters, special characters (!@#...); consider increasing length to 12+ characters; avoid patterns like: contains sequences (like 'abc' or '123'))",
    );
    expect(checkPasswordStrength('aaabcD1!')).toBe(
      "Moderate (consider increasing length to 12+ characters; avoid patterns like: contains sequences (like 'abc' or '123'), contains repetitions (like 'aaa' or '111'))",
    );
  });

  it('prints the bare tier when nothing applies', () => {
    expect(checkPasswordStrength('Correct-Horse-7')).toBe('Very Strong');
    expect(checkPasswordStrength('Qwhtpz7!')).toBe('Very Strong');
  });

  it('uses the lengths of a custom config', () => {
    const check = createStrengthChecker(defineScoringConfig({ minLength: 4, goodLength: 6 }));
    expect(check('abc')).toBe('Very Weak (Too Short - minimum 4 characters recommended)');
    expect(check('short')).toBe(
      'Weak (consider adding: uppercase letters, numbers, special characters (!@#...); consider increasing length to 6+ characters)',
    );
  });
});

describe('formatFeedback', () => {
  it('uses the lengths the result was scored with', () => {
    const config = defineScoringConfig({ minLength: 10, goodLength: 16 });
    expect(formatFeedback(evaluatePassword('Abcdef1!', config))).toBe(
      'Very Weak (Too Short - minimum 10 characters recommended)',
    );
    expect(formatFeedback(evaluatePassword('qwhtpzmkxv', config))).toBe(
      'Weak (consider adding: uppercase letters, numbers, special characters (!@#...); consider increasing length to 16+ characters)',
    );
  });
});

describe('classifyScore', () => {
  const thresholds = { weak: 1, moderate: 3, strong: 4, veryStrong: 5 };

  it('maps scores onto tiers at the boundaries', () => {
    expect([0, 1, 2, 3, 4, 5, 6, 7].map(s => classifyScore(s, thresholds))).toEqual([
      'Very Weak',
      'Very Weak',
      'Weak',
      'Weak',
      'Moderate',
      'Strong',
      'Very Strong',
      'Very Strong',
    ]);
  });
});

describe('meetsTier', () => {
  it('compares tiers by order', () => {
    expect(meetsTier('Strong', 'Moderate')).toBe(true);
    expect(meetsTier('Moderate', 'Moderate')).toBe(true);
    expect(meetsTier('Weak', 'Moderate')).toBe(false);
  });
});
