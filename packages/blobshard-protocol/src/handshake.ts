import { verifySignature } from "./Identity.js";
import type { Identity } from "./Identity.js";
import type { HandshakeMessage, Message } from "./types.js";

/** The signed bytes of a handshake: the timestamp as an unsigned 64-bit big-endian integer. */
export function timestampBytes(timestamp: number): Buffer {
  const bytes = Buffer.alloc(8);
  bytes.writeBigUInt64BE(BigInt(timestamp));
  return bytes;
}

export function createHandshake(
  identity: Identity,
  timestamp: number = Math.floor(Date.now() / 1000),
): HandshakeMessage {
  return {
    kind: "handshake",
    publicKey: identity.publicKey,
    signature: identity.sign(timestampBytes(timestamp)),
    timestamp,
  };
}

/** Does the handshake's signature cover its timestamp under its own public key? */
export function isHandshakeAuthentic(message: HandshakeMessage): boolean {
  if (!Number.isSafeInteger(message.timestamp) || message.timestamp < 0) {
    return false;
  }
  return verifySignature(message.publicKey, timestampBytes(message.timestamp), message.signature);
}

/**
 * Per-connection handshake bookkeeping, owned by the session and handed to
 * the policy with every message.
 */
export interface HandshakeSession {
  peerVerified: boolean;
  peerPublicKey?: Buffer;
}

export type Admission = { action: "accept" } | { action: "skip" } | { action: "reject"; reason: string };

/**
 * HandshakePolicy: the single check deciding whether an incoming message is
 * processed, ignored, or ends the connection.
 */
export interface HandshakePolicy {
  readonly name: string;
  admit(message: Message, session: HandshakeSession): Admission;
}

/**
 * Send-only: our own handshake is sent, the peer's is never inspected.
 * Incoming handshakes are ignored; everything else is processed.
 */
export const sendOnlyHandshake: HandshakePolicy = {
  name: "send-only",
  admit(message) {
    return message.kind === "handshake" ? { action: "skip" } : { action: "accept" };
  },
};

/**
 * Verified: the first incoming message must be a handshake that verifies.
 * Later handshakes are ignored.
 */
export const verifiedHandshake: HandshakePolicy = {
  name: "verified",
  admit(message, session) {
    if (session.peerVerified) {
      return message.kind === "handshake" ? { action: "skip" } : { action: "accept" };
    }
    if (message.kind !== "handshake") {
      return { action: "reject", reason: `Expected a handshake before ${message.kind}` };
    }
    if (!isHandshakeAuthentic(message)) {
      return { action: "reject", reason: "Handshake signature does not verify" };
    }
    session.peerVerified = true;
    session.peerPublicKey = message.publicKey;
    return { action: "skip" };
  },
};
