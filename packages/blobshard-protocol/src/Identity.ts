import crypto from "crypto";

/**
 * Identity: this process's Ed25519 key pair, generated once per run.
 */
export class Identity {
  readonly publicKey: Buffer;
  private readonly privateKey: crypto.KeyObject;

  private constructor(privateKey: crypto.KeyObject) {
    this.privateKey = privateKey;
    // The verification key is always derived from the signing key
    this.publicKey = exportRawPublicKey(crypto.createPublicKey(privateKey));
  }

  static generate(): Identity {
    const { privateKey } = crypto.generateKeyPairSync("ed25519");
    return new Identity(privateKey);
  }

  sign(message: Uint8Array): Buffer {
    return crypto.sign(null, message, this.privateKey);
  }

  /** Short printable form of the public key, for logs. */
  fingerprint(): string {
    return this.publicKey.toString("hex").slice(0, 16);
  }
}

function exportRawPublicKey(key: crypto.KeyObject): Buffer {
  const jwk = key.export({ format: "jwk" });
  if (typeof jwk.x !== "string") {
    throw new Error("Ed25519 public key export is missing its x coordinate");
  }
  return Buffer.from(jwk.x, "base64url");
}

/**
 * Check an Ed25519 signature against a raw 32-byte public key.
 * Malformed keys or signatures verify as false.
 */
export function verifySignature(
  publicKey: Uint8Array,
  message: Uint8Array,
  signature: Uint8Array,
): boolean {
  if (publicKey.byteLength !== 32 || signature.byteLength !== 64) {
    return false;
  }
  let key: crypto.KeyObject;
  try {
    key = crypto.createPublicKey({
      key: { kty: "OKP", crv: "Ed25519", x: Buffer.from(publicKey).toString("base64url") },
      format: "jwk",
    });
  } catch {
    return false;
  }
  return crypto.verify(null, message, key, signature);
}
