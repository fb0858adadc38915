import assert from 'node:assert/strict';
import { createCpfLocator, detectCpfMatches } from '../src/shared/pii/detector';
import { CPF_PATTERNS } from '../src/shared/pii/patterns';
import { maskCpfDigits } from '../src/shared/pii/validators';
import type { CpfMatch } from '../src/shared/types';

interface Case {
  name: string;
  text: string;
  expected: string[];
}

const cases: Case[] = [
  {
    name: 'detects punctuated CPF after a label',
    text: 'CPF: 123.456.789-00',
    expected: ['123.456.789-00']
  },
  {
    name: 'detects unpunctuated CPF between words',
    text: 'CPF 12345678900 ativo',
    expected: ['12345678900']
  },
  {
    name: 'detects both forms in reading order',
    text: 'Titular 98765432100, dependente 111.222.333-44.',
    expected: ['98765432100', '111.222.333-44']
  },
  {
    name: 'detects CPF at the string edges',
    text: '12345678900',
    expected: ['12345678900']
  },
  {
    name: 'ignores 11 digits inside a 15-digit account number',
    text: 'Conta 123456789012345 encerrada',
    expected: []
  },
  {
    name: 'ignores a 12-digit run',
    text: 'Protocolo 123456789012',
    expected: []
  },
  {
    name: 'ignores punctuated shape glued to more digits',
    text: 'Ref 9123.456.789-00 e 123.456.789-001',
    expected: []
  },
  {
    name: 'ignores partial punctuation',
    text: 'Valor 123.456.78900',
    expected: []
  }
];

function assertDigitPositions(match: CpfMatch, text: string, caseName: string): void {
  assert.equal(match.digitPositions.length, 11, `[${caseName}] expected 11 digit positions`);
  match.digitPositions.forEach((position, index) => {
    assert.equal(position.digitIndex, index, `[${caseName}] digit index out of order`);
    assert.match(text[position.offset] ?? '', /\d/, `[${caseName}] offset ${position.offset} is not a digit`);
    const previous = match.digitPositions[index - 1];
    if (previous) {
      assert(position.offset > previous.offset, `[${caseName}] offsets must ascend`);
    }
  });
}

function runCase(testCase: Case): void {
  const matches = createCpfLocator().findCpfs(testCase.text);

  assert.deepEqual(
    matches.map((match) => match.rawText),
    testCase.expected,
    `[${testCase.name}] unexpected matches`
  );

  for (const match of matches) {
    assert.equal(testCase.text.slice(match.startOffset, match.endOffset), match.rawText);
    assertDigitPositions(match, testCase.text, testCase.name);
  }
}

function runPositionRegression(): void {
  const [match] = detectCpfMatches('CPF: 123.456.789-00', CPF_PATTERNS);
  assert(match, 'Expected a punctuated match');
  assert.equal(match.patternKey, 'cpfPunctuated');
  assert.equal(match.startOffset, 5);
  assert.equal(match.endOffset, 19);
  assert.deepEqual(
    match.digitPositions.map((position) => position.offset),
    [5, 6, 7, 9, 10, 11, 13, 14, 15, 17, 18]
  );
}

function runPriorityRegression(): void {
  const reversed = [...CPF_PATTERNS].reverse();
  const text = 'CPF 12345678900';
  const [byDefault] = detectCpfMatches(text, CPF_PATTERNS);
  const [byReversed] = detectCpfMatches(text, reversed);

  assert.equal(byDefault?.patternKey, 'cpfDigits');
  assert.equal(byReversed?.patternKey, 'cpfDigits');
  assert.equal(detectCpfMatches('CPF 123.456.789-00', reversed).length, 1);
}

function runDigitCountRegression(): void {
  const loose = [{ key: 'looseDigits', regex: /\d[\d.-]*\d/g }];
  assert.deepEqual(detectCpfMatches('Protocolo 1234.5678-90', loose), []);
  assert.deepEqual(
    detectCpfMatches('Doc 123.4567.890-1', loose).map((match) => match.rawText),
    ['123.4567.890-1']
  );
}

function runMaskRegression(): void {
  assert.equal(maskCpfDigits('123.456.789-00'), '***.456.789-**');
  assert.equal(maskCpfDigits('12345678900', '#'), '###456789##');
}

function main(): void {
  for (const testCase of cases) {
    runCase(testCase);
  }

  runPositionRegression();
  runPriorityRegression();
  runDigitCountRegression();
  runMaskRegression();

  console.log(`✅ CPF locator tests passed (${cases.length + 4} checks).`);
}

main();
