/**
 * 2D affine matrices in PDF order [a, b, c, d, e, f].
 */

export type Matrix = readonly [number, number, number, number, number, number];

export const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

/** result = a × b (apply a first, then b) */
export function multiplyMatrix(a: Matrix, b: Matrix): Matrix {
  return [
    a[0] * b[0] + a[1] * b[2],
    a[0] * b[1] + a[1] * b[3],
    a[2] * b[0] + a[3] * b[2],
    a[2] * b[1] + a[3] * b[3],
    a[4] * b[0] + a[5] * b[2] + b[4],
    a[4] * b[1] + a[5] * b[3] + b[5]
  ];
}

export function translate(tx: number, ty: number, m: Matrix): Matrix {
  return multiplyMatrix([1, 0, 0, 1, tx, ty], m);
}

export function applyToPoint(m: Matrix, x: number, y: number): { x: number; y: number } {
  return {
    x: x * m[0] + y * m[2] + m[4],
    y: x * m[1] + y * m[3] + m[5]
  };
}

export function matrixFromNumbers(values: readonly (number | null)[]): Matrix | null {
  if (values.length !== 6) {
    return null;
  }
  const [a, b, c, d, e, f] = values;
  if (a == null || b == null || c == null || d == null || e == null || f == null) {
    return null;
  }
  return [a, b, c, d, e, f];
}
