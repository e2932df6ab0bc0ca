import { once } from "events";
import type { Socket } from "net";
import readline from "readline";
import { decodeMessage, encodeMessage } from "./codec.js";
import type { Message } from "./types.js";

/**
 * LineChannel: newline-delimited JSON messages over one TCP socket.
 * Counts the bytes of every line sent and received (newlines excluded).
 */
export class LineChannel {
  private sent = 0;
  private received = 0;
  private socketError: Error | null = null;

  constructor(private readonly socket: Socket) {
    // Record instead of crashing; surfaced by messages() once the stream ends
    this.socket.on("error", (err) => {
      this.socketError = err;
    });
  }

  get bytesSent(): number {
    return this.sent;
  }

  get bytesReceived(): number {
    return this.received;
  }

  get remoteAddress(): string {
    return `${this.socket.remoteAddress ?? "unknown"}:${this.socket.remotePort ?? 0}`;
  }

  /** Write one message as one line; resolves once the socket accepted it. Returns the line's byte length. */
  send(message: Message): Promise<number> {
    const line = encodeMessage(message);
    const size = Buffer.byteLength(line);
    return new Promise<number>((resolve, reject) => {
      this.socket.write(`${line}\n`, (err) => {
        if (err) {
          reject(err);
          return;
        }
        this.sent += size;
        resolve(size);
      });
    });
  }

  /**
   * Yield every message until the peer closes the stream. Blank lines are skipped.
   * A malformed line throws ProtocolError; a socket failure is rethrown at the end.
   */
  async *messages(): AsyncGenerator<Message> {
    if (!this.socket.destroyed) {
      const lines = readline.createInterface({ input: this.socket, crlfDelay: Infinity });
      // A socket destroyed on our side never ends; stop reading when it closes
      const stop = () => lines.close();
      this.socket.once("close", stop);
      try {
        for await (const line of lines) {
          if (line.trim() === "") continue;
          this.received += Buffer.byteLength(line);
          yield decodeMessage(line);
        }
      } finally {
        this.socket.off("close", stop);
        lines.close();
      }
    }
    if (this.socketError) {
      throw this.socketError;
    }
  }

  /**
   * Half-close our side and wait for the peer to close theirs. Anything the peer
   * still sends is discarded so the socket closes cleanly.
   */
  async close(): Promise<void> {
    if (this.socket.destroyed) return;
    const closed = once(this.socket, "close");
    this.socket.resume();
    this.socket.end();
    await closed;
  }

  destroy(): void {
    this.socket.destroy();
  }
}
