import { describe, expect, it } from "vitest";
import {
  createHandshake,
  Identity,
  isHandshakeAuthentic,
  sendOnlyHandshake,
  timestampBytes,
  verifiedHandshake,
  verifySignature,
} from "../src/index.js";
import type { HandshakeSession, Message } from "../src/index.js";

const naive: Message = {
  kind: "naive-transfer",
  filename: "f.txt",
  data: Buffer.from("payload"),
  checksum: "00",
};

describe("Identity", () => {
  it("exposes a raw 32-byte public key and 64-byte signatures", () => {
    const identity = Identity.generate();
    expect(identity.publicKey.length).toBe(32);
    expect(identity.sign(Buffer.from("hello")).length).toBe(64);
    expect(identity.fingerprint()).toBe(identity.publicKey.toString("hex").slice(0, 16));
  });

  it("signs so that the public key verifies", () => {
    const identity = Identity.generate();
    const message = Buffer.from("block 17");
    const signature = identity.sign(message);
    expect(verifySignature(identity.publicKey, message, signature)).toBe(true);
  });

  it("rejects a tampered message, a foreign key and malformed input", () => {
    const identity = Identity.generate();
    const other = Identity.generate();
    const message = Buffer.from("block 17");
    const signature = identity.sign(message);
    expect(verifySignature(identity.publicKey, Buffer.from("block 18"), signature)).toBe(false);
    expect(verifySignature(other.publicKey, message, signature)).toBe(false);
    expect(verifySignature(identity.publicKey.subarray(1), message, signature)).toBe(false);
    expect(verifySignature(identity.publicKey, message, signature.subarray(1))).toBe(false);
  });

  it("generates a fresh key pair every time", () => {
    expect(Identity.generate().publicKey.equals(Identity.generate().publicKey)).toBe(false);
  });
});

describe("handshake", () => {
  it("signs the timestamp as 8 big-endian bytes", () => {
    expect([...timestampBytes(1000)]).toEqual([0, 0, 0, 0, 0, 0, 3, 232]);
  });

  it("builds an authentic handshake", () => {
    const identity = Identity.generate();
    const handshake = createHandshake(identity, 1000);
    expect(handshake.timestamp).toBe(1000);
    expect(handshake.publicKey.equals(identity.publicKey)).toBe(true);
    expect(isHandshakeAuthentic(handshake)).toBe(true);
  });

  it("defaults the timestamp to the current second", () => {
    const before = Math.floor(Date.now() / 1000);
    const handshake = createHandshake(Identity.generate());
    expect(handshake.timestamp).toBeGreaterThanOrEqual(before);
    expect(handshake.timestamp).toBeLessThanOrEqual(Math.floor(Date.now() / 1000));
  });

  it("is not authentic once the timestamp changes", () => {
    const handshake = createHandshake(Identity.generate(), 1000);
    expect(isHandshakeAuthentic({ ...handshake, timestamp: 1001 })).toBe(false);
  });
});

describe("sendOnlyHandshake", () => {
  it("ignores incoming handshakes without looking at them", () => {
    const session: HandshakeSession = { peerVerified: false };
    const forged = { ...createHandshake(Identity.generate(), 5), signature: Buffer.alloc(64) };
    expect(sendOnlyHandshake.admit(forged, session)).toEqual({ action: "skip" });
    expect(session.peerVerified).toBe(false);
  });

  it("admits payloads with no handshake at all", () => {
    expect(sendOnlyHandshake.admit(naive, { peerVerified: false })).toEqual({ action: "accept" });
  });
});

describe("verifiedHandshake", () => {
  it("requires a handshake before anything else", () => {
    expect(verifiedHandshake.admit(naive, { peerVerified: false })).toEqual({
      action: "reject",
      reason: "Expected a handshake before naive-transfer",
    });
  });

  it("rejects a handshake whose signature does not verify", () => {
    const forged = { ...createHandshake(Identity.generate(), 5), timestamp: 6 };
    expect(verifiedHandshake.admit(forged, { peerVerified: false })).toEqual({
      action: "reject",
      reason: "Handshake signature does not verify",
    });
  });

  it("admits payloads after a valid handshake", () => {
    const peer = Identity.generate();
    const session: HandshakeSession = { peerVerified: false };
    expect(verifiedHandshake.admit(createHandshake(peer, 5), session)).toEqual({ action: "skip" });
    expect(session.peerVerified).toBe(true);
    expect(session.peerPublicKey?.equals(peer.publicKey)).toBe(true);
    expect(verifiedHandshake.admit(naive, session)).toEqual({ action: "accept" });
    expect(verifiedHandshake.admit(createHandshake(peer, 6), session)).toEqual({ action: "skip" });
  });
});
