import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Identity, Validator } from "blobshard-protocol";
import type { OutputSink } from "blobshard-protocol";
import { createProgram, sendFile, startValidator } from "../src/program.js";
import { RecordingOutput } from "./RecordingOutput.js";

class MemorySink implements OutputSink {
  readonly files = new Map<string, Buffer>();

  async write(name: string, data: Uint8Array): Promise<string> {
    this.files.set(name, Buffer.from(data));
    return `memory:${name}`;
  }
}

let workdir: string;
const running: Validator[] = [];

beforeEach(async () => {
  workdir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "blobshard-cli-"));
});

afterEach(async () => {
  await Promise.all(running.splice(0).map((v) => v.close()));
  await fs.promises.rm(workdir, { recursive: true, force: true });
});

describe("createProgram", () => {
  it("registers listen and send", () => {
    const program = createProgram(new RecordingOutput());
    expect(program.name()).toBe("blobshard");
    expect(program.commands.map((c) => c.name())).toEqual(["listen", "send"]);
  });
});

describe("sendFile", () => {
  it("sends a file and prints the performance table", async () => {
    const sink = new MemorySink();
    const validator = new Validator({ identity: Identity.generate(), sink, host: "127.0.0.1" });
    running.push(validator);
    const { port } = await validator.listen(0);

    const blob = Buffer.alloc(2048, 7);
    const filePath = path.join(workdir, "block.bin");
    await fs.promises.writeFile(filePath, blob);

    const out = new RecordingOutput();
    const report = await sendFile(
      { peer: { host: "127.0.0.1", port }, file: filePath, mode: "naive" },
      Identity.generate(),
      out,
    );
    await validator.close();

    expect(report.fileSize).toBe(2048);
    expect(sink.files.get("recv_block.bin")?.equals(blob)).toBe(true);
    expect(out.lines.slice(0, 5)).toEqual([
      `Target: 127.0.0.1:${port}`,
      "Strategy: naive",
      "Payload: block.bin (2.00 KB)",
      "",
      "=== Performance Metrics ===",
    ]);
    expect(out.lines).toContain("Mode            : naive");
  });
});

describe("startValidator", () => {
  it("creates the output directory and writes received files into it", async () => {
    const outputDir = path.join(workdir, "nested", "out");
    const out = new RecordingOutput();
    const identity = Identity.generate();
    const validator = await startValidator(
      { port: 0, outputDir, verifyHandshake: false, resetOnFailure: false },
      identity,
      out,
    );
    running.push(validator);

    expect(fs.existsSync(outputDir)).toBe(true);
    expect(out.lines[0]).toMatch(/^➜ Validator: Listening on 0\.0\.0\.0:\d+$/);
    expect(out.lines.slice(1)).toEqual([
      `🔑 Identity: ${identity.fingerprint()}`,
      `📂 Output: ${outputDir}`,
    ]);
  });
});
