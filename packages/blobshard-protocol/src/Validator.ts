import net from "net";
import type { AddressInfo } from "net";
import { v4 as uuidv4 } from "uuid";
import { ErasureCoder, sha256Hex } from "blobshard-erasure";
import {
  DATA_SHARDS,
  DEFAULT_LISTEN_HOST,
  NAIVE_OUTPUT_PREFIX,
  PARITY_SHARDS,
  RECONSTRUCTED_OUTPUT_PREFIX,
} from "./constants.js";
import { HandshakeError } from "./errors.js";
import { EventBus } from "./EventBus.js";
import type { BusListener } from "./EventBus.js";
import { createHandshake, sendOnlyHandshake } from "./handshake.js";
import type { HandshakePolicy, HandshakeSession } from "./handshake.js";
import type { Identity } from "./Identity.js";
import { LineChannel } from "./LineChannel.js";
import { ShardAccumulator } from "./ShardAccumulator.js";
import { DirectorySink } from "./sinks.js";
import type { OutputSink } from "./sinks.js";
import type {
  DasShardMessage,
  Message,
  NaiveTransferMessage,
  SessionSummary,
  ValidatorEvents,
  ValidatorOptions,
} from "./types.js";

/**
 * Validator: accepts proposer connections and serves them strictly one after
 * another. Each connection is read to the end before the next one is touched.
 *
 * Nothing is printed here; everything observable goes out as events.
 */
export class Validator {
  readonly accumulator: ShardAccumulator;
  private readonly identity: Identity;
  private readonly coder: ErasureCoder;
  private readonly sink: OutputSink;
  private readonly policy: HandshakePolicy;
  private readonly host: string;
  private readonly bus = new EventBus<ValidatorEvents>("validator");

  private server: net.Server | null = null;
  // Channels accepted and not yet finished, queued ones included
  private readonly open = new Set<LineChannel>();
  // Tail of the connection queue; each connection starts when the previous one settles
  private queue: Promise<void> = Promise.resolve();

  constructor(options: ValidatorOptions) {
    this.identity = options.identity;
    this.coder =
      options.coder ?? new ErasureCoder({ dataShards: DATA_SHARDS, parityShards: PARITY_SHARDS });
    this.sink = options.sink ?? new DirectorySink();
    this.policy = options.handshakePolicy ?? sendOnlyHandshake;
    this.host = options.host ?? DEFAULT_LISTEN_HOST;
    this.accumulator = new ShardAccumulator({
      coder: this.coder,
      resetOnFailure: options.resetOnFailure,
      onVerified: (filename, data) =>
        this.sink.write(`${RECONSTRUCTED_OUTPUT_PREFIX}${filename}`, data),
    });
  }

  onEvent(listener: BusListener<ValidatorEvents>): () => void {
    return this.bus.on(listener);
  }

  /**
   * Bind and start accepting. Resolves with the bound address once listening;
   * rejects if the port cannot be bound.
   */
  async listen(port: number): Promise<AddressInfo> {
    if (this.server) {
      throw new Error("Validator is already listening");
    }
    const server = net.createServer((socket) => this.enqueue(socket));

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, this.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    server.on("error", (err) => {
      this.bus.emit({ event: "server-error", payload: { error: err.message } });
    });
    this.server = server;

    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Validator is not bound to a TCP address");
    }
    this.bus.emit({ event: "listening", payload: { address: address.address, port: address.port } });
    return address;
  }

  /**
   * Stop accepting and cut every open or queued connection, then wait for the
   * queue to drain. Reads have no timeout, so a stalled peer is dropped here.
   */
  async close(): Promise<void> {
    const server = this.server;
    this.server = null;
    const stopped = server
      ? new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
        })
      : Promise.resolve();

    for (const channel of this.open) {
      channel.destroy();
    }
    await stopped;
    await this.queue;
  }

  private enqueue(socket: net.Socket): void {
    // The channel is created at once so a queued socket's errors are caught
    const channel = new LineChannel(socket);
    this.open.add(channel);
    this.queue = this.queue
      .then(() => this.handleConnection(channel))
      .then(
        () => undefined,
        (err: unknown) => {
          const message = err instanceof Error ? err.message : String(err);
          this.bus.emit({ event: "server-error", payload: { error: message } });
        },
      );
  }

  /**
   * Serve one connection to completion: send our handshake, process messages
   * until the peer closes or a line is rejected, then report every file that
   * stayed below threshold. Connection failures are reported as events, not thrown.
   */
  async handleConnection(channel: LineChannel): Promise<SessionSummary> {
    const connectionId = uuidv4();
    const remoteAddress = channel.remoteAddress;
    const session: HandshakeSession = { peerVerified: false };
    let messages = 0;
    let error: Error | undefined;

    this.open.add(channel);
    this.bus.emit({ event: "connection", payload: { connectionId, remoteAddress } });
    try {
      await channel.send(createHandshake(this.identity));
      this.bus.emit({
        event: "session-secured",
        payload: { connectionId, policy: this.policy.name },
      });

      for await (const message of channel.messages()) {
        messages++;
        const admission = this.policy.admit(message, session);
        if (admission.action === "skip") continue;
        if (admission.action === "reject") throw new HandshakeError(admission.reason);
        await this.route(connectionId, message);
      }
    } catch (err) {
      error = err instanceof Error ? err : new Error(String(err));
      this.bus.emit({ event: "connection-error", payload: { connectionId, error: error.message } });
    } finally {
      channel.destroy();
      this.open.delete(channel);
    }

    // Light-client check: anything sampled but not reconstructable counts as available
    const bytesReceived = channel.bytesReceived;
    for (const pending of await this.accumulator.pendingBelowThreshold()) {
      this.bus.emit({
        event: "availability-verified",
        payload: {
          connectionId,
          filename: pending.filename,
          sampledShards: pending.count,
          bytesReceived,
        },
      });
    }
    this.bus.emit({
      event: "connection-closed",
      payload: { connectionId, messages, bytesReceived },
    });

    return { connectionId, remoteAddress, messages, bytesReceived, error };
  }

  private async route(connectionId: string, message: Message): Promise<void> {
    switch (message.kind) {
      case "naive-transfer":
        await this.acceptNaive(connectionId, message);
        return;
      case "das-shard":
        await this.acceptShard(connectionId, message);
        return;
      case "handshake":
        // Only reachable with a policy that admits handshakes; nothing to do
        return;
    }
  }

  private async acceptNaive(connectionId: string, message: NaiveTransferMessage): Promise<void> {
    const { filename, data, checksum } = message;
    const actual = await sha256Hex(data);
    if (actual !== checksum.toLowerCase()) {
      this.bus.emit({
        event: "naive-corrupted",
        payload: { connectionId, filename, expected: checksum, actual },
      });
      return;
    }
    const output = await this.sink.write(`${NAIVE_OUTPUT_PREFIX}${filename}`, data);
    this.bus.emit({
      event: "naive-verified",
      payload: { connectionId, filename, size: data.length, output },
    });
  }

  private async acceptShard(connectionId: string, message: DasShardMessage): Promise<void> {
    const result = await this.accumulator.insert(message);
    const { filename, count } = result;

    this.bus.emit({
      event: "shard-received",
      payload: {
        connectionId,
        filename,
        index: message.index,
        count,
        totalShards: this.coder.totalShards,
        dataShards: this.coder.dataShards,
      },
    });

    if (result.status === "accumulating") return;

    this.bus.emit({ event: "threshold-reached", payload: { connectionId, filename, count } });
    if (result.status === "verified") {
      this.bus.emit({
        event: "reconstruction-verified",
        payload: { connectionId, filename, size: result.data.length, output: result.output },
      });
    } else {
      this.bus.emit({
        event: "reconstruction-failed",
        payload: { connectionId, filename, reason: result.status, detail: result.detail },
      });
    }
  }
}
