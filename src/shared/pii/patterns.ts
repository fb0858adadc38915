import type { DetectionPattern } from '../types';

// Order matters: at a given start offset the earlier pattern wins.
export const CPF_PATTERNS: DetectionPattern[] = [
  {
    key: 'cpfPunctuated',
    regex: /(?<!\d)\d{3}\.\d{3}\.\d{3}-\d{2}(?!\d)/g
  },
  {
    key: 'cpfDigits',
    regex: /(?<!\d)\d{11}(?!\d)/g
  }
];
