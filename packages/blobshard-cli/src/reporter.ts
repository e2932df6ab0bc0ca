import type { BusEvent, ValidatorEvents } from "blobshard-protocol";
import { formatBytes } from "./metrics.js";
import type { Output } from "./output.js";

function shortId(connectionId: string): string {
  return connectionId.slice(0, 8);
}

/**
 * Turn validator events into console lines. Returns a listener for
 * `Validator.onEvent`.
 */
export function createValidatorReporter(out: Output): (event: BusEvent<ValidatorEvents>) => void {
  return (event) => {
    switch (event.event) {
      case "listening":
        out.log(`➜ Validator: Listening on ${event.payload.address}:${event.payload.port}`);
        break;
      case "server-error":
        out.error(`❌ Server error: ${event.payload.error}`);
        break;
      case "connection":
        out.log("");
        out.log(
          `➜ Network: Connection from ${event.payload.remoteAddress} [${shortId(event.payload.connectionId)}]`,
        );
        break;
      case "session-secured":
        out.log(`✅ Session Secured (Ed25519, ${event.payload.policy})`);
        break;
      case "naive-verified":
        out.log(
          `📦 Received full blob ${event.payload.filename} (${formatBytes(event.payload.size)})`,
        );
        out.log(`✅ Integrity Verified → ${event.payload.output}`);
        break;
      case "naive-corrupted":
        out.error(
          `❌ Corrupted: ${event.payload.filename} (expected ${event.payload.expected}, got ${event.payload.actual})`,
        );
        break;
      case "shard-received": {
        const { count, totalShards, dataShards } = event.payload;
        out.progress(`Downloading Shards: ${count}/${totalShards} (k=${dataShards})`);
        break;
      }
      case "threshold-reached":
        out.log(`➜ Threshold Reached. Reconstructing ${event.payload.filename}...`);
        break;
      case "reconstruction-verified":
        out.log(
          `✅ RECONSTRUCTION SUCCESSFUL: ${event.payload.filename} (${formatBytes(event.payload.size)}) → ${event.payload.output}`,
        );
        break;
      case "reconstruction-failed":
        out.error(
          `❌ Reconstruction failed for ${event.payload.filename} (${event.payload.reason}): ${event.payload.detail}`,
        );
        break;
      case "availability-verified":
        out.log("");
        out.log("=== Light Client Validation ===");
        out.log(`File: ${event.payload.filename}`);
        out.log(`Sampled ${event.payload.sampledShards} random shards.`);
        out.log("✅ Data Availability Verified (>99% prob)");
        out.log(`Simulated Bandwidth: ${formatBytes(event.payload.bytesReceived)}`);
        break;
      case "connection-error":
        out.warn(
          `⚠️ Connection [${shortId(event.payload.connectionId)}] ended: ${event.payload.error}`,
        );
        break;
      case "connection-closed":
        out.log(
          `➜ Network: Connection [${shortId(event.payload.connectionId)}] closed after ${event.payload.messages} messages (${formatBytes(event.payload.bytesReceived)})`,
        );
        break;
    }
  };
}
