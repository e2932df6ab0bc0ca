import path from "path";
import { describe, expect, it } from "vitest";
import {
  ListenOptionsSchema,
  parseOptions,
  parsePeerAddress,
  SendOptionsSchema,
} from "../src/options.js";

describe("parsePeerAddress", () => {
  it("splits host and port", () => {
    expect(parsePeerAddress("127.0.0.1:8080")).toEqual({ host: "127.0.0.1", port: 8080 });
    expect(parsePeerAddress("validator.local:9000")).toEqual({
      host: "validator.local",
      port: 9000,
    });
  });

  it("unwraps bracketed IPv6 hosts", () => {
    expect(parsePeerAddress("[::1]:9000")).toEqual({ host: "::1", port: 9000 });
  });

  it("rejects a missing host or port", () => {
    expect(() => parsePeerAddress("localhost")).toThrow('Peer must be host:port, got "localhost"');
    expect(() => parsePeerAddress(":8080")).toThrow("Peer must be host:port");
    expect(() => parsePeerAddress("localhost:")).toThrow("Peer must be host:port");
  });

  it("rejects ports outside 1..65535", () => {
    expect(() => parsePeerAddress("localhost:0")).toThrow(
      'Peer port must be between 1 and 65535, got "0"',
    );
    expect(() => parsePeerAddress("localhost:70000")).toThrow("Peer port must be between");
    expect(() => parsePeerAddress("localhost:http")).toThrow("Peer port must be between");
  });
});

describe("listen options", () => {
  it("fills in defaults", () => {
    expect(parseOptions(ListenOptionsSchema, {})).toEqual({
      port: 8080,
      outputDir: path.resolve("."),
      verifyHandshake: false,
      resetOnFailure: false,
    });
  });

  it("coerces the port and resolves the output directory", () => {
    const options = parseOptions(ListenOptionsSchema, {
      port: "9001",
      outputDir: "received",
      verifyHandshake: true,
    });
    expect(options.port).toBe(9001);
    expect(options.outputDir).toBe(path.resolve("received"));
    expect(options.verifyHandshake).toBe(true);
    expect(options.resetOnFailure).toBe(false);
  });

  it("names the flag that failed", () => {
    expect(() => parseOptions(ListenOptionsSchema, { port: "99999" })).toThrow(
      /^Invalid options: --port: /,
    );
  });
});

describe("send options", () => {
  it("parses the peer address and mode", () => {
    const options = parseOptions(SendOptionsSchema, {
      peer: "localhost:8080",
      file: "block.bin",
      mode: "das-full",
    });
    expect(options).toEqual({
      peer: { host: "localhost", port: 8080 },
      file: "block.bin",
      mode: "das-full",
    });
  });

  it("accepts and keeps an ignored --port", () => {
    const options = parseOptions(SendOptionsSchema, {
      peer: "localhost:8080",
      file: "block.bin",
      mode: "naive",
      port: "9999",
    });
    expect(options.port).toBe(9999);
    expect(options.peer.port).toBe(8080);
  });

  it("rejects an unknown mode", () => {
    expect(() =>
      parseOptions(SendOptionsSchema, { peer: "localhost:8080", file: "a", mode: "torrent" }),
    ).toThrow(/--mode: /);
  });

  it("reports a malformed peer under its flag", () => {
    expect(() =>
      parseOptions(SendOptionsSchema, { peer: "nowhere", file: "a", mode: "naive" }),
    ).toThrow('Invalid options: --peer: Peer must be host:port, got "nowhere"');
  });
});
