import { z } from "zod";
import { ProtocolError } from "./errors.js";
import type { Message } from "./types.js";

// ---------- Wire schema: one externally tagged JSON object per line ----------
// Byte strings travel as arrays of numbers, so a serialized line never holds a raw newline.
const ByteArraySchema = z.array(z.number().int().min(0).max(255));

const HandshakeWireSchema = z.object({
  Handshake: z.object({
    pubkey: ByteArraySchema,
    sig: ByteArraySchema,
    ts: z.number().int().nonnegative(),
  }),
});

const NaiveTransferWireSchema = z.object({
  NaiveTransfer: z.object({
    filename: z.string(),
    data: ByteArraySchema,
    checksum: z.string(),
  }),
});

const DasShardWireSchema = z.object({
  DasShard: z.object({
    filename: z.string(),
    original_len: z.number().int().nonnegative(),
    index: z.number().int().nonnegative(),
    data: ByteArraySchema,
    full_file_checksum: z.string(),
  }),
});

export const WireMessageSchema = z.union([
  HandshakeWireSchema.strict(),
  NaiveTransferWireSchema.strict(),
  DasShardWireSchema.strict(),
]);

export type WireMessage = z.infer<typeof WireMessageSchema>;

export function toWire(message: Message): WireMessage {
  switch (message.kind) {
    case "handshake":
      return {
        Handshake: {
          pubkey: Array.from(message.publicKey),
          sig: Array.from(message.signature),
          ts: message.timestamp,
        },
      };
    case "naive-transfer":
      return {
        NaiveTransfer: {
          filename: message.filename,
          data: Array.from(message.data),
          checksum: message.checksum,
        },
      };
    case "das-shard":
      return {
        DasShard: {
          filename: message.filename,
          original_len: message.originalLength,
          index: message.index,
          data: Array.from(message.data),
          full_file_checksum: message.checksum,
        },
      };
  }
}

export function fromWire(wire: WireMessage): Message {
  if ("Handshake" in wire) {
    const { pubkey, sig, ts } = wire.Handshake;
    return {
      kind: "handshake",
      publicKey: Buffer.from(pubkey),
      signature: Buffer.from(sig),
      timestamp: ts,
    };
  }
  if ("NaiveTransfer" in wire) {
    const { filename, data, checksum } = wire.NaiveTransfer;
    return { kind: "naive-transfer", filename, data: Buffer.from(data), checksum };
  }
  const { filename, original_len, index, data, full_file_checksum } = wire.DasShard;
  return {
    kind: "das-shard",
    filename,
    originalLength: original_len,
    index,
    data: Buffer.from(data),
    checksum: full_file_checksum,
  };
}

/** Serialize a message to a single line, without the trailing newline. */
export function encodeMessage(message: Message): string {
  return JSON.stringify(toWire(message));
}

/**
 * Parse one line into a message. Throws ProtocolError when the line is not JSON
 * or is not exactly one known variant.
 */
export function decodeMessage(line: string): Message {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    throw new ProtocolError(`Line is not valid JSON (${line.length} chars)`, { cause: err });
  }

  const parsed = WireMessageSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ProtocolError(`Unknown message${where}: ${issue?.message ?? "invalid"}`);
  }
  return fromWire(parsed.data);
}
