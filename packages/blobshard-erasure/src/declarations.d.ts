/**
 * Typings for @ronomon/reed-solomon, which ships plain JavaScript.
 *
 * `encode()` both encodes and decodes: `sources` flags the shards that hold
 * valid data, `targets` flags the shards to (re)compute. Bit `i` is shard `i`;
 * data shards come first, then parity shards.
 */
declare module "@ronomon/reed-solomon" {
  interface ReedSolomonBinding {
    create(dataShards: number, parityShards: number): Buffer;
    encode(
      context: Buffer,
      sources: number,
      targets: number,
      buffer: Buffer,
      bufferOffset: number,
      bufferSize: number,
      parity: Buffer,
      parityOffset: number,
      paritySize: number,
      end: (error?: Error | null) => void,
    ): void;
  }

  const ReedSolomon: ReedSolomonBinding;
  export = ReedSolomon;
}
