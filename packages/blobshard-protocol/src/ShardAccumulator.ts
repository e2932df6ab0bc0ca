import { DecodeError, sha256Hex } from "blobshard-erasure";
import type { ErasureCoder } from "blobshard-erasure";
import { ProtocolError } from "./errors.js";
import { Mutex } from "./Mutex.js";
import type { DasShardMessage, ReconstructionFailure } from "./types.js";

/**
 * ShardState: where one filename stands.
 *  - empty:             no shards held (never seen, or cleared after a verified reconstruction)
 *  - accumulating:      some shards, fewer than k
 *  - threshold-reached: k or more shards held but not reconstructed (a failed attempt kept them)
 *  - reconstructing:    a reconstruction attempt is running
 */
export type ShardState = "empty" | "accumulating" | "threshold-reached" | "reconstructing";

export type InsertResult =
  | { status: "accumulating"; filename: string; count: number }
  | { status: "verified"; filename: string; count: number; data: Buffer; output: string }
  | {
      status: ReconstructionFailure;
      filename: string;
      count: number;
      detail: string;
    };

export interface PendingFile {
  filename: string;
  count: number;
}

/** Called with a verified blob before its shards are dropped; resolves to where it went. */
export type VerifiedBlobHandler = (filename: string, data: Buffer) => Promise<string>;

export interface ShardAccumulatorOptions {
  coder: ErasureCoder;
  onVerified: VerifiedBlobHandler;
  /** Drop a file's shards after a failed reconstruction too. Off by default. */
  resetOnFailure?: boolean;
}

/**
 * ShardAccumulator: collects DAS shards per filename and reconstructs a blob as
 * soon as k distinct indices are held.
 *
 * Every operation runs under one mutex shared by all connections, so at most
 * one reconstruction per filename is ever in flight.
 *
 * A failed reconstruction (decode error or checksum mismatch) keeps the shards
 * unless `resetOnFailure` is set, so each further shard for that file triggers
 * another attempt.
 */
export class ShardAccumulator {
  private readonly shards = new Map<string, Map<number, Buffer>>();
  private readonly reconstructing = new Set<string>();
  private readonly lock = new Mutex();
  private readonly coder: ErasureCoder;
  private readonly onVerified: VerifiedBlobHandler;
  private readonly resetOnFailure: boolean;

  constructor(options: ShardAccumulatorOptions) {
    this.coder = options.coder;
    this.onVerified = options.onVerified;
    this.resetOnFailure = options.resetOnFailure ?? false;
  }

  get threshold(): number {
    return this.coder.dataShards;
  }

  /**
   * Rejects with ProtocolError, leaving every entry untouched, when the index
   * is not one of the code's n shards.
   */
  insert(shard: DasShardMessage): Promise<InsertResult> {
    const { index } = shard;
    const totalShards = this.coder.totalShards;
    if (!Number.isInteger(index) || index < 0 || index >= totalShards) {
      return Promise.reject(
        new ProtocolError(`Shard index ${index} is outside 0..${totalShards - 1}`),
      );
    }

    return this.lock.runExclusive<InsertResult>(async () => {
      const { filename } = shard;

      // 1) Lazily create the entry; a repeated index overwrites (last write wins)
      let entry = this.shards.get(filename);
      if (!entry) {
        entry = new Map();
        this.shards.set(filename, entry);
      }
      entry.set(index, shard.data);
      const count = entry.size;

      // 2) Below threshold → keep collecting
      if (count < this.threshold) {
        return { status: "accumulating", filename, count };
      }

      // 3) Threshold reached → reconstruct from everything held
      this.reconstructing.add(filename);
      try {
        return await this.reconstruct(filename, entry, shard, count);
      } finally {
        this.reconstructing.delete(filename);
      }
    });
  }

  private async reconstruct(
    filename: string,
    entry: Map<number, Buffer>,
    shard: DasShardMessage,
    count: number,
  ): Promise<InsertResult> {
    let blob: Buffer;
    try {
      blob = await this.coder.reconstruct(entry, shard.originalLength);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      this.afterFailure(entry);
      return { status: "decode-failed", filename, count, detail: err.message };
    }

    const actual = await sha256Hex(blob);
    if (actual !== shard.checksum.toLowerCase()) {
      this.afterFailure(entry);
      return {
        status: "checksum-mismatch",
        filename,
        count,
        detail: `expected ${shard.checksum}, got ${actual}`,
      };
    }

    // Write first, then clear: a failed write leaves the shards in place
    const output = await this.onVerified(filename, blob);
    entry.clear();
    return { status: "verified", filename, count, data: blob, output };
  }

  private afterFailure(entry: Map<number, Buffer>): void {
    if (this.resetOnFailure) {
      entry.clear();
    }
  }

  /** Every filename holding at least one shard but fewer than k. */
  pendingBelowThreshold(): Promise<PendingFile[]> {
    return this.lock.runExclusive(() => {
      const pending: PendingFile[] = [];
      for (const [filename, entry] of this.shards) {
        if (entry.size > 0 && entry.size < this.threshold) {
          pending.push({ filename, count: entry.size });
        }
      }
      return pending;
    });
  }

  shardCount(filename: string): number {
    return this.shards.get(filename)?.size ?? 0;
  }

  /** Shard indices held for `filename`, ascending. */
  indices(filename: string): number[] {
    return [...(this.shards.get(filename)?.keys() ?? [])].sort((a, b) => a - b);
  }

  state(filename: string): ShardState {
    if (this.reconstructing.has(filename)) return "reconstructing";
    const count = this.shardCount(filename);
    if (count === 0) return "empty";
    return count < this.threshold ? "accumulating" : "threshold-reached";
  }
}
