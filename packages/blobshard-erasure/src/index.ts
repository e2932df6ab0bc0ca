export { ErasureCoder } from "./ErasureCoder.js";
export { DecodeError } from "./errors.js";
export type { ErasureParams, PartialShards, Shard } from "./types.js";
export { encodeShards } from "./utils/encoder.js";
export { reconstructBlob, reconstructShards } from "./utils/decoder.js";
export { paddedLength, padToMultiple } from "./utils/padding.js";
export { sha256Hex, verifyChecksum } from "./utils/checksum.js";
