import { DecodeError } from "../errors.js";
import type { ErasureParams } from "../types.js";

// ---------- GF(2^8) arithmetic ----------
const GF_SIZE = 256;
const PRIMITIVE_POLY = 0x11d; // x^8 + x^4 + x^3 + x^2 + 1

const gfExp = new Uint8Array(GF_SIZE * 2);
const gfLog = new Uint8Array(GF_SIZE);
{
  let x = 1;
  for (let i = 0; i < GF_SIZE - 1; i++) {
    gfExp[i] = x;
    gfExp[i + GF_SIZE - 1] = x;
    gfLog[x] = i;
    x <<= 1;
    if (x >= GF_SIZE) x ^= PRIMITIVE_POLY;
  }
}

export function gfMul(a: number, b: number): number {
  if (a === 0 || b === 0) return 0;
  return gfExp[gfLog[a] + gfLog[b]];
}

export function gfInv(a: number): number {
  if (a === 0) throw new RangeError("Cannot invert zero in GF(256)");
  return gfExp[GF_SIZE - 1 - gfLog[a]];
}

export type Matrix = Uint8Array[];

/**
 * Generator row of shard `index`: a unit row for data shards, a Cauchy row
 * 1 / (x_j + y_c) with x_j = k + j and y_c = c for parity shard j. Every
 * k-row subset of the generator is invertible.
 */
export function generatorRow(index: number, params: ErasureParams): Uint8Array {
  const { dataShards } = params;
  const row = new Uint8Array(dataShards);
  if (index < dataShards) {
    row[index] = 1;
    return row;
  }
  for (let c = 0; c < dataShards; c++) {
    row[c] = gfInv(index ^ c);
  }
  return row;
}

/** Gauss-Jordan inverse of a square matrix; DecodeError when it is singular. */
export function invertMatrix(matrix: Matrix): Matrix {
  const n = matrix.length;
  const augmented = matrix.map((row, i) => {
    const wide = new Uint8Array(n * 2);
    wide.set(row);
    wide[n + i] = 1;
    return wide;
  });

  for (let col = 0; col < n; col++) {
    // 1) Bring a row with a non-zero pivot up
    let pivot = col;
    while (pivot < n && augmented[pivot][col] === 0) pivot++;
    if (pivot === n) {
      throw new DecodeError("Decoding matrix is singular");
    }
    [augmented[col], augmented[pivot]] = [augmented[pivot], augmented[col]];

    // 2) Scale the pivot row to 1
    const scale = gfInv(augmented[col][col]);
    for (let j = 0; j < n * 2; j++) {
      augmented[col][j] = gfMul(augmented[col][j], scale);
    }

    // 3) Clear the column everywhere else
    for (let row = 0; row < n; row++) {
      const factor = augmented[row][col];
      if (row === col || factor === 0) continue;
      for (let j = 0; j < n * 2; j++) {
        augmented[row][j] ^= gfMul(factor, augmented[col][j]);
      }
    }
  }

  return augmented.map((row) => row.slice(n));
}

/** out[r] = sum over c of coefficients[r][c] * inputs[c], byte by byte. */
export function combine(coefficients: Matrix, inputs: Uint8Array[], length: number): Buffer[] {
  return coefficients.map((row) => {
    const out = Buffer.alloc(length, 0);
    row.forEach((coeff, c) => {
      if (coeff === 0) return;
      const input = inputs[c];
      for (let i = 0; i < length; i++) {
        out[i] ^= gfMul(coeff, input[i]);
      }
    });
    return out;
  });
}

/** All n byte-wise shards from the k data pieces. */
export function encodeBytewise(data: Uint8Array[], params: ErasureParams, length: number): Buffer[] {
  const totalShards = params.dataShards + params.parityShards;
  const rows = Array.from({ length: totalShards }, (_, i) => generatorRow(i, params));
  return combine(rows, data, length);
}

/**
 * All n byte-wise shards from exactly k of them, given as parallel `indices`
 * and `pieces`.
 */
export function recoverBytewise(
  indices: number[],
  pieces: Uint8Array[],
  params: ErasureParams,
  length: number,
): Buffer[] {
  const inverse = invertMatrix(indices.map((index) => generatorRow(index, params)));
  const data = combine(inverse, pieces, length);
  return encodeBytewise(data, params, length);
}
