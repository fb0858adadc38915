import type { CpfLocator, CpfMatch, DetectionPattern, DigitPosition } from '../types';
import { CPF_DIGIT_COUNT } from '../types';
import { CPF_PATTERNS } from './patterns';
import { isAsciiDigit } from './validators';

interface Candidate {
  match: CpfMatch;
  priority: number;
}

function collectDigitPositions(value: string, startOffset: number): DigitPosition[] {
  const positions: DigitPosition[] = [];

  for (let index = 0; index < value.length; index += 1) {
    if (isAsciiDigit(value[index])) {
      positions.push({ digitIndex: positions.length, offset: startOffset + index });
    }
  }

  return positions;
}

export function detectCpfMatches(text: string, patterns: DetectionPattern[]): CpfMatch[] {
  const candidates: Candidate[] = [];

  patterns.forEach((pattern, priority) => {
    const regex = new RegExp(pattern.regex.source, pattern.regex.flags.includes('g') ? pattern.regex.flags : `${pattern.regex.flags}g`);
    let match: RegExpExecArray | null;

    while ((match = regex.exec(text)) !== null) {
      const value = match[0];
      if (value.length === 0) {
        regex.lastIndex += 1;
        continue;
      }

      const digitPositions = collectDigitPositions(value, match.index);
      if (digitPositions.length !== CPF_DIGIT_COUNT) {
        continue;
      }

      candidates.push({
        priority,
        match: {
          patternKey: pattern.key,
          rawText: value,
          startOffset: match.index,
          endOffset: match.index + value.length,
          digitPositions
        }
      });
    }
  });

  const sorted = [...candidates].sort((left, right) => {
    if (left.match.startOffset !== right.match.startOffset) {
      return left.match.startOffset - right.match.startOffset;
    }
    return left.priority - right.priority;
  });

  const accepted: CpfMatch[] = [];
  let occupiedUntil = -1;

  for (const candidate of sorted) {
    if (candidate.match.startOffset < occupiedUntil) {
      continue;
    }
    accepted.push(candidate.match);
    occupiedUntil = candidate.match.endOffset;
  }

  return accepted;
}

class RegexCpfLocator implements CpfLocator {
  constructor(private readonly patterns: DetectionPattern[]) {}

  findCpfs(pageText: string): CpfMatch[] {
    return detectCpfMatches(pageText, this.patterns);
  }
}

export function createCpfLocator(patterns: DetectionPattern[] = CPF_PATTERNS): CpfLocator {
  return new RegexCpfLocator(patterns);
}
