import type { ErasureParams } from "../types.js";
import { padToMultiple } from "./padding.js";
import {
  type CodecContext,
  codecLength,
  createContext,
  readSlot,
  runCodec,
  shardMask,
  writeSlot,
} from "./codec.js";
import { encodeBytewise } from "./galois.js";

/**
 * Split `blob` into k data shards plus m Reed-Solomon parity shards.
 *
 * The blob is zero-padded to a multiple of k, so every one of the n returned
 * shards is `ceil(blob.length / k)` bytes long. Shard i for i < k is the i-th
 * slice of the padded blob, untouched.
 */
export async function encodeShards(
  blob: Uint8Array,
  params: ErasureParams,
  context: CodecContext = createContext(params),
): Promise<Buffer[]> {
  // 1) Zero-pad and cut the k data pieces
  const padded = padToMultiple(blob, params.dataShards);
  const shardLength = padded.length / params.dataShards;
  const data = Array.from({ length: params.dataShards }, (_, i) =>
    padded.subarray(i * shardLength, (i + 1) * shardLength),
  );
  const headLength = codecLength(shardLength);

  // 2) Native codec over the 8-byte aligned head of every shard
  const heads = await encodeHeads(data, params, headLength, context);

  // 3) Byte-wise code over the short tail
  const tails = encodeBytewise(
    data.map((piece) => piece.subarray(headLength)),
    params,
    shardLength - headLength,
  );

  return heads.map((head, i) => Buffer.concat([head, tails[i]]));
}

async function encodeHeads(
  data: Uint8Array[],
  params: ErasureParams,
  stride: number,
  context: CodecContext,
): Promise<Buffer[]> {
  const { dataShards, parityShards } = params;
  const totalShards = dataShards + parityShards;
  if (stride === 0) {
    return Array.from({ length: totalShards }, () => Buffer.alloc(0));
  }

  const dataBuffer = Buffer.alloc(stride * dataShards, 0);
  const parityBuffer = Buffer.alloc(stride * parityShards, 0);
  data.forEach((piece, i) => {
    writeSlot(i, piece.subarray(0, stride), params, stride, dataBuffer, parityBuffer);
  });

  // Data shards are the sources, parity shards the targets
  const dataIndices = Array.from({ length: dataShards }, (_, i) => i);
  const parityIndices = Array.from({ length: parityShards }, (_, j) => dataShards + j);
  await runCodec(
    context,
    shardMask(dataIndices),
    shardMask(parityIndices),
    dataBuffer,
    parityBuffer,
  );

  return Array.from({ length: totalShards }, (_, i) =>
    readSlot(i, params, stride, dataBuffer, parityBuffer),
  );
}
