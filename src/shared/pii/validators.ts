export function isAsciiDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9';
}

/** CPF with the first three and last two digits replaced by `mask`. */
export function maskCpfDigits(value: string, mask = '*'): string {
  let digitIndex = 0;
  let output = '';

  for (const char of value) {
    if (!isAsciiDigit(char)) {
      output += char;
      continue;
    }
    output += digitIndex < 3 || digitIndex > 8 ? mask : char;
    digitIndex += 1;
  }

  return output;
}
