/**
 * Raised when a shard subset cannot be turned back into a blob: too few
 * distinct shards, malformed shards, or a codec failure.
 */
export class DecodeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DecodeError";
  }
}
