import type { ErasureParams, PartialShards, Shard } from "./types.js";
import { type CodecContext, createContext } from "./utils/codec.js";
import { encodeShards } from "./utils/encoder.js";
import { reconstructBlob, reconstructShards } from "./utils/decoder.js";
import { paddedLength } from "./utils/padding.js";

// Shard indices travel as bit flags in a 32-bit integer.
const MAX_TOTAL_SHARDS = 31;

/**
 * ErasureCoder: one (k, m) Reed-Solomon code with a codec context that is
 * created once and reused for every blob.
 */
export class ErasureCoder {
  readonly dataShards: number;
  readonly parityShards: number;
  readonly totalShards: number;
  private readonly context: CodecContext;

  constructor(params: ErasureParams) {
    const { dataShards, parityShards } = params;
    if (!Number.isInteger(dataShards) || dataShards < 1) {
      throw new RangeError(`dataShards must be a positive integer, got ${dataShards}`);
    }
    if (!Number.isInteger(parityShards) || parityShards < 1) {
      throw new RangeError(`parityShards must be a positive integer, got ${parityShards}`);
    }
    if (dataShards + parityShards > MAX_TOTAL_SHARDS) {
      throw new RangeError(`At most ${MAX_TOTAL_SHARDS} shards in total are supported`);
    }
    this.dataShards = dataShards;
    this.parityShards = parityShards;
    this.totalShards = dataShards + parityShards;
    this.context = createContext(params);
  }

  get params(): ErasureParams {
    return { dataShards: this.dataShards, parityShards: this.parityShards };
  }

  /** Length every shard of a `blobLength`-byte blob will have. */
  shardLength(blobLength: number): number {
    return paddedLength(blobLength, this.dataShards) / this.dataShards;
  }

  async encode(blob: Uint8Array): Promise<Shard[]> {
    const shards = await encodeShards(blob, this.params, this.context);
    return shards.map((data, index) => ({ index, data }));
  }

  reconstructShards(partial: PartialShards): Promise<Buffer[]> {
    return reconstructShards(partial, this.params, this.context);
  }

  reconstruct(partial: PartialShards, originalLength: number): Promise<Buffer> {
    return reconstructBlob(partial, originalLength, this.params, this.context);
  }
}
