import { describe, expect, it } from "vitest";
import { DecodeError } from "../src/index.js";
import {
  combine,
  encodeBytewise,
  generatorRow,
  gfInv,
  gfMul,
  invertMatrix,
  recoverBytewise,
} from "../src/utils/galois.js";

const params = { dataShards: 4, parityShards: 2 };

describe("GF(256) arithmetic", () => {
  it("reduces by the 0x11d polynomial", () => {
    expect(gfMul(2, 128)).toBe(0x1d);
    expect(gfMul(3, 7)).toBe(9);
    expect(gfMul(0, 99)).toBe(0);
  });

  it("has an inverse for every non-zero element", () => {
    for (let a = 1; a < 256; a++) {
      expect(gfMul(a, gfInv(a))).toBe(1);
    }
    expect(() => gfInv(0)).toThrow(RangeError);
  });
});

describe("generator matrix", () => {
  it("is the identity on data shards", () => {
    expect(Array.from(generatorRow(2, params))).toEqual([0, 0, 1, 0]);
  });

  it("inverts for every choice of k rows", () => {
    const rows = [0, 1, 2, 3, 4, 5].map((i) => generatorRow(i, params));
    for (const drop of [[0, 1], [0, 4], [2, 3], [3, 5], [4, 5], [1, 5]]) {
      const chosen = rows.filter((_, i) => !drop.includes(i));
      const inverse = invertMatrix(chosen);
      const product = combine(inverse, chosen, 4);
      product.forEach((row, r) => {
        expect(Array.from(row)).toEqual([0, 1, 2, 3].map((c) => (c === r ? 1 : 0)));
      });
    }
  });

  it("reports a singular matrix as a decode error", () => {
    const row = generatorRow(0, params);
    const singular = [row, row, generatorRow(2, params), generatorRow(3, params)];
    expect(() => invertMatrix(singular)).toThrow(DecodeError);
  });
});

describe("byte-wise code", () => {
  it("encodes all-zero data to all-zero parity", () => {
    const zero = Buffer.alloc(3);
    const shards = encodeBytewise([zero, zero, zero, zero], params, 3);
    expect(shards[4].equals(zero)).toBe(true);
    expect(shards[5].equals(zero)).toBe(true);
  });

  it("recovers every shard from parity plus two data pieces", () => {
    const data = [
      Buffer.from([1, 2, 3]),
      Buffer.from([4, 5, 6]),
      Buffer.from([7, 8, 9]),
      Buffer.from([250, 251, 252]),
    ];
    const shards = encodeBytewise(data, params, 3);
    const survivors = [1, 3, 4, 5];
    const recovered = recoverBytewise(
      survivors,
      survivors.map((i) => shards[i]),
      params,
      3,
    );
    recovered.forEach((piece, i) => expect(piece.equals(shards[i])).toBe(true));
  });
});
