import { sha256 } from "multiformats/hashes/sha2";

/**
 * Lowercase hex SHA-256 of `data` (64 characters).
 */
export async function sha256Hex(data: Uint8Array): Promise<string> {
  const hash = await sha256.digest(data);
  return Buffer.from(hash.digest).toString("hex");
}

export async function verifyChecksum(data: Uint8Array, expected: string): Promise<boolean> {
  return (await sha256Hex(data)) === expected.toLowerCase();
}
