import type { TransferReport } from "blobshard-protocol";

const KB = 1024;
const MB = 1024 * 1024;
const LABEL_WIDTH = 15;

/** Human-readable size: bytes below 1 KB, else KB or MB with two decimals. */
export function formatBytes(n: number): string {
  if (n < KB) return `${n} B`;
  if (n < MB) return `${(n / KB).toFixed(2)} KB`;
  return `${(n / MB).toFixed(2)} MB`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms.toFixed(2)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

/** Megabytes per second over the payload, or null when no time was measured. */
export function throughputMBps(bytes: number, durationMs: number): number | null {
  if (durationMs <= 0) return null;
  return bytes / MB / (durationMs / 1000);
}

export type WireEfficiency =
  | { kind: "saved"; percent: number }
  | { kind: "overhead"; percent: number }
  | { kind: "unknown" };

/**
 * Compare what went on the wire with the file itself. Fewer bytes than the
 * file is a saving; anything else is overhead.
 */
export function wireEfficiency(bytesOnWire: number, fileSize: number): WireEfficiency {
  if (fileSize === 0) return { kind: "unknown" };
  if (bytesOnWire < fileSize) {
    return { kind: "saved", percent: ((fileSize - bytesOnWire) / fileSize) * 100 };
  }
  return { kind: "overhead", percent: (bytesOnWire / fileSize - 1) * 100 };
}

function row(label: string, value: string): string {
  return `${label.padEnd(LABEL_WIDTH)} : ${value}`;
}

/** The performance table printed after a send, one entry per line. */
export function performanceLines(report: TransferReport): string[] {
  const throughput = throughputMBps(report.bytesOnWire, report.durationMs);
  const lines = [
    "=== Performance Metrics ===",
    row("Mode", report.strategy),
    row("Latency", formatDuration(report.durationMs)),
    row("Throughput", throughput === null ? "n/a" : `${throughput.toFixed(2)} MB/s`),
    row("Total Wire", formatBytes(report.bytesOnWire)),
  ];

  const efficiency = wireEfficiency(report.bytesOnWire, report.fileSize);
  switch (efficiency.kind) {
    case "saved":
      lines.push(row("Efficiency", `${efficiency.percent.toFixed(2)}% Saved`));
      break;
    case "overhead":
      lines.push(row("Overhead", `${efficiency.percent.toFixed(2)}%`));
      break;
    case "unknown":
      lines.push(row("Overhead", "n/a (empty file)"));
      break;
  }

  if (report.shardIndices.length > 0) {
    lines.push(row("Shards", report.shardIndices.join(", ")));
  }
  return lines;
}
