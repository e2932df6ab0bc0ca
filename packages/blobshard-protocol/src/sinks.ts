import fs from "fs";
import path from "path";

/**
 * OutputSink: where a validator puts blobs it accepted.
 * Resolves to the location written, for reporting.
 */
export interface OutputSink {
  write(name: string, data: Uint8Array): Promise<string>;
}

/**
 * DirectorySink: writes each blob as a file in one directory. Only the base
 * name of `name` is used, so a peer-chosen filename cannot leave the directory.
 */
export class DirectorySink implements OutputSink {
  constructor(readonly directory: string = process.cwd()) {}

  async write(name: string, data: Uint8Array): Promise<string> {
    const target = path.join(this.directory, path.basename(name));
    await fs.promises.writeFile(target, data);
    return target;
  }
}
