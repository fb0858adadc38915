/**
 * ToUnicode CMap parsing (bfchar and bfrange sections).
 */

export type ToUnicodeMap = Map<number, string>;

function hexToUnicode(hex: string): string {
  const padded = hex.length % 4 === 0 ? hex : hex.padStart(Math.ceil(hex.length / 4) * 4, '0');
  const units: number[] = [];
  for (let index = 0; index < padded.length; index += 4) {
    units.push(Number.parseInt(padded.slice(index, index + 4), 16));
  }
  return String.fromCharCode(...units);
}

function hexTokens(section: string): string[] {
  return Array.from(section.matchAll(/<([0-9A-Fa-f\s]*)>|\[|\]/g), (token) =>
    token[1] === undefined ? token[0] : token[1].replace(/\s+/g, '')
  );
}

function parseBfChar(text: string, map: ToUnicodeMap): void {
  for (const section of text.matchAll(/beginbfchar([\s\S]*?)endbfchar/g)) {
    const tokens = hexTokens(section[1] ?? '');
    for (let index = 0; index + 1 < tokens.length; index += 2) {
      const source = tokens[index];
      const target = tokens[index + 1];
      if (source === undefined || target === undefined) continue;
      map.set(Number.parseInt(source, 16), hexToUnicode(target));
    }
  }
}

function parseBfRange(text: string, map: ToUnicodeMap): void {
  for (const section of text.matchAll(/beginbfrange([\s\S]*?)endbfrange/g)) {
    const tokens = hexTokens(section[1] ?? '');
    let index = 0;

    while (index + 2 < tokens.length) {
      const low = Number.parseInt(tokens[index] ?? '', 16);
      const high = Number.parseInt(tokens[index + 1] ?? '', 16);
      const target = tokens[index + 2];
      index += 3;

      if (Number.isNaN(low) || Number.isNaN(high) || target === undefined) {
        continue;
      }

      if (target === '[') {
        for (let code = low; index < tokens.length && tokens[index] !== ']'; code += 1, index += 1) {
          const entry = tokens[index];
          if (entry !== undefined && code <= high) {
            map.set(code, hexToUnicode(entry));
          }
        }
        index += 1;
        continue;
      }

      const base = hexToUnicode(target);
      const lastUnit = base.charCodeAt(base.length - 1);
      const prefix = base.slice(0, -1);
      for (let code = low; code <= high; code += 1) {
        map.set(code, prefix + String.fromCharCode(lastUnit + (code - low)));
      }
    }
  }
}

export function parseToUnicodeCMap(data: Uint8Array): ToUnicodeMap {
  const map: ToUnicodeMap = new Map();
  const text = Array.from(data, (byte) => String.fromCharCode(byte)).join('');

  parseBfChar(text, map);
  parseBfRange(text, map);

  return map;
}
