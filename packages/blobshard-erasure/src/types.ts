/**
 * ErasureParams: shape of a systematic (k, m) code.
 */
export interface ErasureParams {
  dataShards: number; // k: shards needed to reconstruct
  parityShards: number; // m: redundant shards
}

/**
 * Shard: one coded unit of a blob. Indices 0..k-1 are data, k..n-1 parity.
 */
export interface Shard {
  index: number;
  data: Buffer;
}

/**
 * PartialShards: whatever subset of a blob's shards is at hand, keyed by index.
 */
export type PartialShards = ReadonlyMap<number, Uint8Array>;
