import path from 'node:path';
import { Encodings } from '@pdf-lib/standard-fonts';
import { InvalidOptionError } from './errors';
import type { RgbColor } from './file/redaction/pdf/types';

export const DEFAULT_INPUT_DIR = 'data/input';
export const DEFAULT_OUTPUT_DIR = 'data/output';
export const INPUT_DIR_ENV = 'CPF_REDACT_INPUT_DIR';
export const OUTPUT_DIR_ENV = 'CPF_REDACT_OUTPUT_DIR';

export interface BatchOptions {
  inputDir: string;
  outputDir: string;
}

type Environment = Record<string, string | undefined>;

/** Explicit values win over the environment, which wins over the defaults. */
export function resolveBatchOptions(
  overrides: Partial<BatchOptions> = {},
  env: Environment = process.env,
  cwd: string = process.cwd()
): BatchOptions {
  const inputDir = overrides.inputDir || env[INPUT_DIR_ENV] || DEFAULT_INPUT_DIR;
  const outputDir = overrides.outputDir || env[OUTPUT_DIR_ENV] || DEFAULT_OUTPUT_DIR;
  return {
    inputDir: path.resolve(cwd, inputDir),
    outputDir: path.resolve(cwd, outputDir)
  };
}

export function parseHexColor(value: string): RgbColor {
  const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(value.trim());
  if (!match) {
    throw new InvalidOptionError('fill colour', `expected #rrggbb, received "${value}"`);
  }
  const [, red = '00', green = '00', blue = '00'] = match;
  return {
    red: Number.parseInt(red, 16) / 255,
    green: Number.parseInt(green, 16) / 255,
    blue: Number.parseInt(blue, 16) / 255
  };
}

export function parseMargin(value: string): number {
  const margin = Number(value);
  if (value.trim() === '' || !Number.isFinite(margin) || margin < 0) {
    throw new InvalidOptionError('margin', `expected a non-negative number of points, received "${value}"`);
  }
  return margin;
}

/** Single character the placeholder font (Helvetica, WinAnsi) can draw. */
export function parsePlaceholder(value: string): string {
  const chars = Array.from(value);
  const codePoint = value.codePointAt(0);
  if (chars.length !== 1 || codePoint === undefined || !Encodings.WinAnsi.canEncodeUnicodeCodePoint(codePoint)) {
    throw new InvalidOptionError('placeholder', `expected one WinAnsi character, received "${value}"`);
  }
  return value;
}
