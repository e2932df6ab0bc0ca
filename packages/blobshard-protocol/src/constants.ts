// Code shape shared by every proposer and validator in a run.
export const DATA_SHARDS = 4; // k
export const PARITY_SHARDS = 2; // m
export const TOTAL_SHARDS = DATA_SHARDS + PARITY_SHARDS;

/** Shards a light client samples; kept below DATA_SHARDS. */
export const SAMPLE_COUNT = 2;

export const DEFAULT_PORT = 8080;
export const DEFAULT_LISTEN_HOST = "0.0.0.0";

export const NAIVE_OUTPUT_PREFIX = "recv_";
export const RECONSTRUCTED_OUTPUT_PREFIX = "reconstructed_";
