import { DecodeError } from "../errors.js";
import type { ErasureParams, PartialShards } from "../types.js";
import {
  type CodecContext,
  codecLength,
  createContext,
  readSlot,
  runCodec,
  shardMask,
  writeSlot,
} from "./codec.js";
import { recoverBytewise } from "./galois.js";

/**
 * Recover all n shards of a blob from any k (or more) of them.
 *
 * Rejects with DecodeError when fewer than k distinct indices are present, when
 * an index falls outside 0..n-1, when the payloads differ in length, or when the
 * codec itself fails.
 */
export async function reconstructShards(
  partial: PartialShards,
  params: ErasureParams,
  context: CodecContext = createContext(params),
): Promise<Buffer[]> {
  const { dataShards, parityShards } = params;
  const totalShards = dataShards + parityShards;

  // 1) Validate what we were handed
  const present = [...partial.entries()].sort((a, b) => a[0] - b[0]);
  for (const [index] of present) {
    if (!Number.isInteger(index) || index < 0 || index >= totalShards) {
      throw new DecodeError(`Shard index ${index} is outside 0..${totalShards - 1}`);
    }
  }
  if (present.length < dataShards) {
    throw new DecodeError(
      `Need ${dataShards} distinct shards to reconstruct, have ${present.length}`,
    );
  }
  const lengths = new Set(present.map(([, payload]) => payload.byteLength));
  if (lengths.size !== 1) {
    throw new DecodeError(`Shards disagree on length: ${[...lengths].join(", ")}`);
  }
  const [shardLength] = lengths;
  const headLength = codecLength(shardLength);

  // 2) Decode from exactly k sources, lowest indices first
  const sources = present.slice(0, dataShards);
  const sourceIndices = sources.map(([index]) => index);

  let heads: Buffer[];
  try {
    heads = await recoverHeads(sources, params, headLength, context);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DecodeError(`Reed-Solomon decode failed: ${reason}`, { cause: err });
  }
  const tails = recoverBytewise(
    sourceIndices,
    sources.map(([, payload]) => payload.subarray(headLength)),
    params,
    shardLength - headLength,
  );

  // 3) Hand back all n shards at their real length
  return heads.map((head, i) => Buffer.concat([head, tails[i]]));
}

async function recoverHeads(
  sources: [number, Uint8Array][],
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
  for (const [index, payload] of sources) {
    writeSlot(index, payload.subarray(0, stride), params, stride, dataBuffer, parityBuffer);
  }

  // Recompute every slot that is not a source
  const sourceIndices = sources.map(([index]) => index);
  const targets = Array.from({ length: totalShards }, (_, i) => i).filter(
    (i) => !sourceIndices.includes(i),
  );
  await runCodec(context, shardMask(sourceIndices), shardMask(targets), dataBuffer, parityBuffer);

  return Array.from({ length: totalShards }, (_, i) =>
    readSlot(i, params, stride, dataBuffer, parityBuffer),
  );
}

/**
 * Reconstruct, concatenate the k data shards in index order and drop the
 * zero padding by truncating to `originalLength`.
 */
export async function reconstructBlob(
  partial: PartialShards,
  originalLength: number,
  params: ErasureParams,
  context: CodecContext = createContext(params),
): Promise<Buffer> {
  if (!Number.isInteger(originalLength) || originalLength < 0) {
    throw new DecodeError(`Invalid original length ${originalLength}`);
  }
  const shards = await reconstructShards(partial, params, context);
  const joined = Buffer.concat(shards.slice(0, params.dataShards));
  if (joined.length < originalLength) {
    throw new DecodeError(
      `Reconstructed ${joined.length} bytes but the blob is ${originalLength} bytes long`,
    );
  }
  return joined.subarray(0, originalLength);
}
