import { describe, expect, it } from "vitest";
import type { TransferReport } from "blobshard-protocol";
import {
  formatBytes,
  formatDuration,
  performanceLines,
  throughputMBps,
  wireEfficiency,
} from "../src/metrics.js";

describe("formatBytes", () => {
  it("uses bytes below one kilobyte", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(1023)).toBe("1023 B");
  });

  it("uses two decimals for KB and MB", () => {
    expect(formatBytes(1024)).toBe("1.00 KB");
    expect(formatBytes(1536)).toBe("1.50 KB");
    expect(formatBytes(1024 * 1024)).toBe("1.00 MB");
    expect(formatBytes(5.5 * 1024 * 1024)).toBe("5.50 MB");
  });
});

describe("formatDuration", () => {
  it("switches from milliseconds to seconds at one second", () => {
    expect(formatDuration(12.5)).toBe("12.50ms");
    expect(formatDuration(999.5)).toBe("999.50ms");
    expect(formatDuration(1500)).toBe("1.50s");
  });
});

describe("throughputMBps", () => {
  it("divides megabytes by seconds", () => {
    expect(throughputMBps(1024 * 1024, 500)).toBe(2);
  });

  it("is null when no time elapsed", () => {
    expect(throughputMBps(100, 0)).toBeNull();
  });
});

describe("wireEfficiency", () => {
  it("reports savings when less went on the wire than the file", () => {
    expect(wireEfficiency(250, 1000)).toEqual({ kind: "saved", percent: 75 });
  });

  it("reports overhead otherwise", () => {
    expect(wireEfficiency(1500, 1000)).toEqual({ kind: "overhead", percent: 50 });
    expect(wireEfficiency(1000, 1000)).toEqual({ kind: "overhead", percent: 0 });
  });

  it("cannot compare against an empty file", () => {
    expect(wireEfficiency(10, 0)).toEqual({ kind: "unknown" });
  });
});

describe("performanceLines", () => {
  const sample: TransferReport = {
    strategy: "das-sample",
    filename: "block.bin",
    fileSize: 4096,
    checksum: "ab".repeat(32),
    bytesOnWire: 1024,
    durationMs: 500,
    shardIndices: [4, 1],
  };

  it("prints an aligned table with savings and shard indices", () => {
    expect(performanceLines(sample)).toEqual([
      "=== Performance Metrics ===",
      "Mode            : das-sample",
      "Latency         : 500.00ms",
      "Throughput      : 0.00 MB/s",
      "Total Wire      : 1.00 KB",
      "Efficiency      : 75.00% Saved",
      "Shards          : 4, 1",
    ]);
  });

  it("prints overhead and no shard row for a naive transfer", () => {
    const lines = performanceLines({
      ...sample,
      strategy: "naive",
      bytesOnWire: 6144,
      durationMs: 0,
      shardIndices: [],
    });
    expect(lines).toEqual([
      "=== Performance Metrics ===",
      "Mode            : naive",
      "Latency         : 0.00ms",
      "Throughput      : n/a",
      "Total Wire      : 6.00 KB",
      "Overhead        : 50.00%",
    ]);
  });
});
