import type { Output } from "../src/output.js";

/** Collects printed lines, tagged by stream. */
export class RecordingOutput implements Output {
  readonly lines: string[] = [];

  log(line: string): void {
    this.lines.push(line);
  }

  warn(line: string): void {
    this.lines.push(`warn: ${line}`);
  }

  error(line: string): void {
    this.lines.push(`error: ${line}`);
  }

  progress(line: string): void {
    this.lines.push(`progress: ${line}`);
  }
}
