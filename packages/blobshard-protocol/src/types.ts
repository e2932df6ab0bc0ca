import type { ErasureCoder } from "blobshard-erasure";
import type { HandshakePolicy } from "./handshake.js";
import type { Identity } from "./Identity.js";
import type { OutputSink } from "./sinks.js";

/**
 * HandshakeMessage: sent once by each side right after connecting.
 * `signature` covers `timestamp` as 8 big-endian bytes.
 */
export interface HandshakeMessage {
  kind: "handshake";
  publicKey: Buffer; // raw 32-byte Ed25519 key
  signature: Buffer; // 64-byte Ed25519 signature
  timestamp: number; // seconds since the epoch
}

/** NaiveTransferMessage: the whole blob in one message. */
export interface NaiveTransferMessage {
  kind: "naive-transfer";
  filename: string;
  data: Buffer;
  checksum: string; // hex SHA-256 of `data`
}

/** DasShardMessage: one erasure-coded shard of a blob. */
export interface DasShardMessage {
  kind: "das-shard";
  filename: string;
  originalLength: number;
  index: number;
  data: Buffer;
  checksum: string; // hex SHA-256 of the full blob, not of the shard
}

export type Message = HandshakeMessage | NaiveTransferMessage | DasShardMessage;

/**
 * TransferStrategy: how a proposer ships a blob.
 *  - naive:      the whole blob in one message
 *  - das-full:   k shards picked at random, enough to reconstruct
 *  - das-sample: SAMPLE_COUNT shards, never enough to reconstruct
 */
export const TRANSFER_STRATEGIES = ["naive", "das-full", "das-sample"] as const;
export type TransferStrategy = (typeof TRANSFER_STRATEGIES)[number];

export interface ProposerOptions {
  host: string;
  port: number;
  filePath: string;
  strategy: TransferStrategy;
  identity: Identity;
  coder?: ErasureCoder;
  /** Order in which shard indices are considered; defaults to a uniform shuffle. */
  shuffle?: (indices: number[]) => number[];
}

/** TransferReport: what a proposer run put on the wire. */
export interface TransferReport {
  strategy: TransferStrategy;
  filename: string;
  fileSize: number;
  checksum: string;
  bytesOnWire: number; // payload lines only, handshake excluded
  durationMs: number;
  shardIndices: number[]; // empty for naive transfers
}

export interface ValidatorOptions {
  identity: Identity;
  coder?: ErasureCoder;
  /** Where recv_/reconstructed_ files go; defaults to the working directory. */
  sink?: OutputSink;
  handshakePolicy?: HandshakePolicy;
  /** Empty a file's shards after a failed reconstruction instead of retrying on the next shard. */
  resetOnFailure?: boolean;
  host?: string;
}

export type ReconstructionFailure = "checksum-mismatch" | "decode-failed";

/**
 * ValidatorEvents: payload of every event a Validator emits, keyed by event name.
 */
export interface ValidatorEvents {
  listening: { address: string; port: number };
  "server-error": { error: string };
  connection: { connectionId: string; remoteAddress: string };
  "session-secured": { connectionId: string; policy: string };
  "naive-verified": { connectionId: string; filename: string; size: number; output: string };
  "naive-corrupted": { connectionId: string; filename: string; expected: string; actual: string };
  "shard-received": {
    connectionId: string;
    filename: string;
    index: number;
    count: number;
    totalShards: number;
    dataShards: number;
  };
  "threshold-reached": { connectionId: string; filename: string; count: number };
  "reconstruction-verified": {
    connectionId: string;
    filename: string;
    size: number;
    output: string;
  };
  "reconstruction-failed": {
    connectionId: string;
    filename: string;
    reason: ReconstructionFailure;
    detail: string;
  };
  "availability-verified": {
    connectionId: string;
    filename: string;
    sampledShards: number;
    bytesReceived: number;
  };
  "connection-error": { connectionId: string; error: string };
  "connection-closed": { connectionId: string; messages: number; bytesReceived: number };
}

/** SessionSummary: how one validator connection went. */
export interface SessionSummary {
  connectionId: string;
  remoteAddress: string;
  messages: number;
  bytesReceived: number;
  error?: Error;
}
