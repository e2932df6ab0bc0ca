import { createRequire } from "module";
import type ReedSolomonModule from "@ronomon/reed-solomon";
import type { ErasureParams } from "../types.js";

// Native addon: only loadable through require
const cjsRequire = createRequire(import.meta.url);
const ReedSolomon: typeof ReedSolomonModule = cjsRequire("@ronomon/reed-solomon");

// The codec works on shards whose size is a multiple of this
export const CODEC_BLOCK = 8;

/** Opaque, reusable codec state for one (k, m) pair. */
export type CodecContext = Buffer;

export function createContext(params: ErasureParams): CodecContext {
  return ReedSolomon.create(params.dataShards, params.parityShards);
}

/**
 * Leading bytes of each shard that go through the native codec. The codec mixes
 * bytes within every 8-byte block, so shards cannot be padded out and trimmed
 * back; the remaining `shardLength % 8` bytes are coded byte-wise instead.
 */
export function codecLength(shardLength: number): number {
  return shardLength - (shardLength % CODEC_BLOCK);
}

/** Bit flags for a set of shard indices. */
export function shardMask(indices: Iterable<number>): number {
  let mask = 0;
  for (const index of indices) {
    mask |= 1 << index;
  }
  return mask;
}

/**
 * Compute every shard flagged in `targets` from the shards flagged in `sources`.
 * `dataBuffer` holds the k data slots and `parityBuffer` the m parity slots, each
 * `stride` bytes long (a multiple of 8); both are updated in place.
 */
export function runCodec(
  context: CodecContext,
  sources: number,
  targets: number,
  dataBuffer: Buffer,
  parityBuffer: Buffer,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    ReedSolomon.encode(
      context,
      sources,
      targets,
      dataBuffer,
      /* bufferOffset */ 0,
      dataBuffer.byteLength,
      parityBuffer,
      /* parityOffset */ 0,
      parityBuffer.byteLength,
      (err) => {
        if (err) reject(err);
        else resolve();
      },
    );
  });
}

/** Copy slot `index` back out of the codec buffers. */
export function readSlot(
  index: number,
  params: ErasureParams,
  stride: number,
  dataBuffer: Buffer,
  parityBuffer: Buffer,
): Buffer {
  const isParity = index >= params.dataShards;
  const source = isParity ? parityBuffer : dataBuffer;
  const start = (isParity ? index - params.dataShards : index) * stride;
  return Buffer.from(source.subarray(start, start + stride));
}

/** Copy `payload` into the slot of shard `index`. */
export function writeSlot(
  index: number,
  payload: Uint8Array,
  params: ErasureParams,
  stride: number,
  dataBuffer: Buffer,
  parityBuffer: Buffer,
): void {
  const isParity = index >= params.dataShards;
  const target = isParity ? parityBuffer : dataBuffer;
  target.set(payload, (isParity ? index - params.dataShards : index) * stride);
}
