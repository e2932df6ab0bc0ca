import crypto from "crypto";
import fs from "fs";
import net from "net";
import path from "path";
import { ErasureCoder, sha256Hex } from "blobshard-erasure";
import { DATA_SHARDS, PARITY_SHARDS, SAMPLE_COUNT } from "./constants.js";
import { createHandshake } from "./handshake.js";
import { LineChannel } from "./LineChannel.js";
import type { Message, ProposerOptions, TransferReport, TransferStrategy } from "./types.js";

/** Fisher-Yates shuffle of a copy of `indices`, driven by the OS CSPRNG. */
export function shuffleIndices(indices: number[]): number[] {
  const shuffled = [...indices];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = crypto.randomInt(i + 1);
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/** How many shards a strategy puts on the wire. */
export function shardsToSend(
  strategy: Exclude<TransferStrategy, "naive">,
  coder: ErasureCoder,
): number {
  return strategy === "das-sample" ? Math.min(SAMPLE_COUNT, coder.totalShards) : coder.dataShards;
}

export interface PlanOptions {
  /** Hex SHA-256 of the blob, when the caller already has it. */
  checksum?: string;
  shuffle?: (indices: number[]) => number[];
}

/**
 * Build the payload messages for one blob, handshake excluded.
 *  - naive:      one NaiveTransfer with the whole blob
 *  - das-full:   the first k indices of a shuffled 0..n-1
 *  - das-sample: the first SAMPLE_COUNT indices of a shuffled 0..n-1
 */
export async function planTransfer(
  blob: Buffer,
  filename: string,
  strategy: TransferStrategy,
  coder: ErasureCoder,
  options: PlanOptions = {},
): Promise<Message[]> {
  const checksum = options.checksum ?? (await sha256Hex(blob));
  const shuffle = options.shuffle ?? shuffleIndices;
  if (strategy === "naive") {
    return [{ kind: "naive-transfer", filename, data: blob, checksum }];
  }

  const shards = await coder.encode(blob);
  const order = shuffle(shards.map((shard) => shard.index));
  return order.slice(0, shardsToSend(strategy, coder)).map(
    (index): Message => ({
      kind: "das-shard",
      filename,
      originalLength: blob.length,
      index,
      data: shards[index].data,
      checksum,
    }),
  );
}

function connect(host: string, port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    socket.once("error", reject);
    socket.once("connect", () => {
      socket.off("error", reject);
      resolve(socket);
    });
  });
}

/**
 * Send one file to one validator.
 *
 * Reading the file and connecting are fatal: the returned promise rejects and
 * nothing is retried. The run ends once the validator has closed its side, so
 * every line has been read before the process moves on.
 */
export async function runProposer(options: ProposerOptions): Promise<TransferReport> {
  const { host, port, filePath, strategy, identity } = options;
  const coder =
    options.coder ?? new ErasureCoder({ dataShards: DATA_SHARDS, parityShards: PARITY_SHARDS });

  // 1) Read the whole blob once
  const blob = await fs.promises.readFile(filePath);
  const filename = path.basename(filePath);
  const checksum = await sha256Hex(blob);

  // 2) Connect and introduce ourselves
  const channel = new LineChannel(await connect(host, port));
  try {
    await channel.send(createHandshake(identity));

    // 3) Ship the payload, timing only the payload
    const started = performance.now();
    const messages = await planTransfer(blob, filename, strategy, coder, {
      checksum,
      shuffle: options.shuffle,
    });
    let bytesOnWire = 0;
    for (const message of messages) {
      bytesOnWire += await channel.send(message);
    }
    const durationMs = performance.now() - started;
    await channel.close();

    return {
      strategy,
      filename,
      fileSize: blob.length,
      checksum,
      bytesOnWire,
      durationMs,
      shardIndices: messages.flatMap((m) => (m.kind === "das-shard" ? [m.index] : [])),
    };
  } finally {
    channel.destroy();
  }
}
