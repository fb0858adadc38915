import assert from 'node:assert/strict';
import path from 'node:path';
import {
  DEFAULT_INPUT_DIR,
  DEFAULT_OUTPUT_DIR,
  parseHexColor,
  parseMargin,
  parsePlaceholder,
  resolveBatchOptions
} from '../src/shared/config';
import { InvalidOptionError } from '../src/shared/errors';
import { createLogger, isLogLevel } from '../src/shared/logger';

function runDirectoryTests(): void {
  const cwd = path.resolve('/srv/redactor');

  assert.deepEqual(resolveBatchOptions({}, {}, cwd), {
    inputDir: path.join(cwd, DEFAULT_INPUT_DIR),
    outputDir: path.join(cwd, DEFAULT_OUTPUT_DIR)
  });

  assert.deepEqual(
    resolveBatchOptions({}, { CPF_REDACT_INPUT_DIR: 'in', CPF_REDACT_OUTPUT_DIR: '/tmp/out' }, cwd),
    { inputDir: path.join(cwd, 'in'), outputDir: path.resolve('/tmp/out') }
  );

  assert.deepEqual(
    resolveBatchOptions({ inputDir: 'cli-in' }, { CPF_REDACT_INPUT_DIR: 'env-in' }, cwd).inputDir,
    path.join(cwd, 'cli-in')
  );
}

function runParserTests(): void {
  assert.deepEqual(parseHexColor('#ff0000'), { red: 1, green: 0, blue: 0 });
  assert.deepEqual(parseHexColor('FFFFFF'), { red: 1, green: 1, blue: 1 });
  assert.throws(() => parseHexColor('red'), InvalidOptionError);
  assert.throws(() => parseHexColor('#fff'), InvalidOptionError);

  assert.equal(parseMargin('1.5'), 1.5);
  assert.equal(parseMargin('0'), 0);
  assert.throws(() => parseMargin('-1'), InvalidOptionError);
  assert.throws(() => parseMargin(''), InvalidOptionError);
  assert.throws(() => parseMargin('wide'), InvalidOptionError);

  assert.equal(parsePlaceholder('X'), 'X');
  assert.equal(parsePlaceholder('•'), '•');
  assert.throws(() => parsePlaceholder('XX'), InvalidOptionError);
  assert.throws(() => parsePlaceholder('█'), InvalidOptionError);
}

function runLoggerTests(): void {
  assert.equal(isLogLevel('debug'), true);
  assert.equal(isLogLevel('verbose'), false);

  const lines: string[] = [];
  const originalLog = console.log;
  const originalError = console.error;
  console.log = (line: string) => lines.push(`out ${line}`);
  console.error = (line: string) => lines.push(`err ${line}`);
  try {
    const logger = createLogger('cpf-redact', { level: 'info', format: 'json' }).child({ file: 'a.pdf' });
    logger.debug('hidden');
    logger.info('shown', { matches: 2 });
    logger.warn('careful');
  } finally {
    console.log = originalLog;
    console.error = originalError;
  }

  assert.equal(lines.length, 2);
  const [info = '', warn = ''] = lines;
  assert(info.startsWith('out '));
  const entry: unknown = JSON.parse(info.slice(4));
  assert.deepEqual(
    entry !== null && typeof entry === 'object'
      ? Object.fromEntries(Object.entries(entry).filter(([key]) => key !== 'ts'))
      : null,
    { level: 'info', service: 'cpf-redact', msg: 'shown', file: 'a.pdf', matches: 2 }
  );
  assert(warn.startsWith('err '));
}

function main(): void {
  runDirectoryTests();
  runParserTests();
  runLoggerTests();

  console.log('✅ Configuration tests passed (3 checks).');
}

main();
