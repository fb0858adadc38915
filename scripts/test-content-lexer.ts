import assert from 'node:assert/strict';
import { parseToUnicodeCMap } from '../src/shared/file/content/cmap';
import { parseContentOperations, type Operand } from '../src/shared/file/content/lexer';
import { multiplyMatrix, translate } from '../src/shared/file/content/matrix';

const encoder = new TextEncoder();
const decoder = new TextDecoder('latin1');

function bytesOf(operand: Operand | undefined): string {
  assert.equal(operand?.type, 'string');
  return operand?.type === 'string' ? decoder.decode(operand.value) : '';
}

function runOperationTests(): void {
  const source = 'BT /F1 12 Tf 72 700 Td (Hello \\(world\\)\\101) Tj [<4142> -250 (C)] TJ ET';
  const operations = parseContentOperations(encoder.encode(source));

  assert.deepEqual(
    operations.map((operation) => operation.operator),
    ['BT', 'Tf', 'Td', 'Tj', 'TJ', 'ET']
  );

  const [, tf, td, tj, textArray] = operations;
  assert.deepEqual(tf?.operands, [{ type: 'name', value: 'F1' }, { type: 'number', value: 12 }]);
  assert.deepEqual(td?.operands, [{ type: 'number', value: 72 }, { type: 'number', value: 700 }]);
  assert.equal(bytesOf(tj?.operands[0]), 'Hello (world)A');

  const array = textArray?.operands[0];
  assert.equal(array?.type, 'array');
  if (array?.type === 'array') {
    assert.equal(bytesOf(array.value[0]), 'AB');
    assert.deepEqual(array.value[1], { type: 'number', value: -250 });
    assert.equal(bytesOf(array.value[2]), 'C');
  }

  assert(tj, 'Expected Tj operation');
  assert.equal(source.slice(tj.start, tj.end), '(Hello \\(world\\)\\101) Tj');
}

function runSkippingTests(): void {
  const source = [
    '% comment line',
    'q 1 0 0 1 10 20 cm',
    'BI /W 2 /H 1 /BPC 8 /CS /G ID \u0001Tj EI',
    '/P << /MCID 3 >> BDC',
    '/F#31 -.5 Tf',
    'Q'
  ].join('\n');
  const operations = parseContentOperations(encoder.encode(source));

  assert.deepEqual(
    operations.map((operation) => operation.operator),
    ['q', 'cm', 'BI', 'BDC', 'Tf', 'Q']
  );
  assert.deepEqual(operations[4]?.operands, [{ type: 'name', value: 'F1' }, { type: 'number', value: -0.5 }]);
}

function runCMapTests(): void {
  const cmap = [
    'begincmap',
    '2 beginbfchar',
    '<0003> <0020>',
    '<0011> <0031>',
    'endbfchar',
    '2 beginbfrange',
    '<0013> <0015> <0033>',
    '<0020> <0021> [<0041> <0042>]',
    'endbfrange',
    'endcmap'
  ].join('\n');
  const map = parseToUnicodeCMap(encoder.encode(cmap));

  assert.equal(map.get(0x03), ' ');
  assert.equal(map.get(0x11), '1');
  assert.equal(map.get(0x13), '3');
  assert.equal(map.get(0x15), '5');
  assert.equal(map.get(0x20), 'A');
  assert.equal(map.get(0x21), 'B');
  assert.equal(map.get(0x16), undefined);
}

function runMatrixTests(): void {
  const scaled = multiplyMatrix([2, 0, 0, 2, 0, 0], [1, 0, 0, 1, 10, 20]);
  assert.deepEqual(scaled, [2, 0, 0, 2, 10, 20]);
  assert.deepEqual(translate(5, 0, scaled), [2, 0, 0, 2, 20, 20]);
}

function main(): void {
  runOperationTests();
  runSkippingTests();
  runCMapTests();
  runMatrixTests();

  console.log('✅ Content lexer tests passed (4 checks).');
}

main();
