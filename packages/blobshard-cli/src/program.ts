import fs from "fs";
import path from "path";
import { Command } from "commander";
import {
  DEFAULT_PORT,
  DirectorySink,
  Identity,
  runProposer,
  sendOnlyHandshake,
  TRANSFER_STRATEGIES,
  Validator,
  verifiedHandshake,
} from "blobshard-protocol";
import { formatBytes, performanceLines } from "./metrics.js";
import { ListenOptionsSchema, parseOptions, SendOptionsSchema } from "./options.js";
import type { ListenOptions, SendOptions } from "./options.js";
import { ConsoleOutput } from "./output.js";
import type { Output } from "./output.js";
import { createValidatorReporter } from "./reporter.js";

const BANNER = "=== Data Availability Sampling Prototype ===";

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run a validator until SIGINT. Resolves once it is listening; the process
 * then stays alive on the open server.
 */
export async function startValidator(
  options: ListenOptions,
  identity: Identity,
  out: Output,
): Promise<Validator> {
  await fs.promises.mkdir(options.outputDir, { recursive: true });

  const validator = new Validator({
    identity,
    sink: new DirectorySink(options.outputDir),
    handshakePolicy: options.verifyHandshake ? verifiedHandshake : sendOnlyHandshake,
    resetOnFailure: options.resetOnFailure,
  });
  validator.onEvent(createValidatorReporter(out));

  await validator.listen(options.port);
  out.log(`🔑 Identity: ${identity.fingerprint()}`);
  out.log(`📂 Output: ${options.outputDir}`);
  return validator;
}

/** Send one file and print the performance table. */
export async function sendFile(options: SendOptions, identity: Identity, out: Output) {
  const { host, port } = options.peer;
  const filePath = path.resolve(options.file);

  out.log(`Target: ${host}:${port}`);
  out.log(`Strategy: ${options.mode}`);

  const report = await runProposer({ host, port, filePath, strategy: options.mode, identity });
  out.log(`Payload: ${report.filename} (${formatBytes(report.fileSize)})`);
  out.log("");
  for (const line of performanceLines(report)) {
    out.log(line);
  }
  return report;
}

export function createProgram(out: Output = new ConsoleOutput()): Command {
  const program = new Command();

  program
    .name("blobshard")
    .description("Compare naive blob transfer with erasure-coded data availability sampling")
    .version("0.1.0");

  /**
   * `listen`: accept proposers one at a time.
   *  --verify-handshake: drop a connection whose first message is not a valid handshake
   *  --reset-on-failure: forget a file's shards after a failed reconstruction
   */
  program
    .command("listen")
    .description("Run a validator")
    .option("-p, --port <port>", "TCP port to listen on", String(DEFAULT_PORT))
    .option("-o, --output-dir <dir>", "Directory for received files", ".")
    .option("--verify-handshake", "Require a valid signed handshake before any payload")
    .option("--reset-on-failure", "Drop held shards when a reconstruction fails")
    .action(async (raw: unknown) => {
      out.log(BANNER);
      try {
        const options = parseOptions(ListenOptionsSchema, raw);
        const validator = await startValidator(options, Identity.generate(), out);

        process.once("SIGINT", () => {
          out.log("🛑 Shutting down...");
          validator.close().then(
            () => process.exit(0),
            (err: unknown) => {
              out.error(`❌ Shutdown failed: ${describeError(err)}`);
              process.exit(1);
            },
          );
        });
      } catch (err) {
        out.error(`❌ Failed to start validator: ${describeError(err)}`);
        process.exit(1);
      }
    });

  /**
   * `send`: ship one file to one validator with the chosen strategy.
   */
  program
    .command("send")
    .description("Send a file to a validator")
    .requiredOption("-P, --peer <host:port>", "Validator address")
    .requiredOption("-f, --file <path>", "File to send")
    .requiredOption("-m, --mode <mode>", `Transfer mode (${TRANSFER_STRATEGIES.join(" | ")})`)
    .option("-p, --port <port>", "Ignored; the peer address names the port")
    .action(async (raw: unknown) => {
      out.log(BANNER);
      try {
        const options = parseOptions(SendOptionsSchema, raw);
        await sendFile(options, Identity.generate(), out);
      } catch (err) {
        out.error(`❌ Send failed: ${describeError(err)}`);
        process.exit(1);
      }
    });

  return program;
}
