export * from "./constants.js";
export { ProtocolError, HandshakeError } from "./errors.js";
export type {
  DasShardMessage,
  HandshakeMessage,
  Message,
  NaiveTransferMessage,
  ProposerOptions,
  ReconstructionFailure,
  SessionSummary,
  TransferReport,
  TransferStrategy,
  ValidatorEvents,
  ValidatorOptions,
} from "./types.js";
export { TRANSFER_STRATEGIES } from "./types.js";
export { decodeMessage, encodeMessage, WireMessageSchema } from "./codec.js";
export type { WireMessage } from "./codec.js";
export { Identity, verifySignature } from "./Identity.js";
export {
  createHandshake,
  isHandshakeAuthentic,
  sendOnlyHandshake,
  timestampBytes,
  verifiedHandshake,
} from "./handshake.js";
export type { Admission, HandshakePolicy, HandshakeSession } from "./handshake.js";
export { EventBus } from "./EventBus.js";
export type { BusEvent, BusListener } from "./EventBus.js";
export { LineChannel } from "./LineChannel.js";
export { Mutex } from "./Mutex.js";
export { ShardAccumulator } from "./ShardAccumulator.js";
export type { InsertResult, PendingFile, ShardState } from "./ShardAccumulator.js";
export { DirectorySink } from "./sinks.js";
export type { OutputSink } from "./sinks.js";
export { Validator } from "./Validator.js";
export { planTransfer, runProposer, shardsToSend, shuffleIndices } from "./Proposer.js";
export type { PlanOptions } from "./Proposer.js";
