/**
 * Output: where the CLI prints. `progress` rewrites the current line in place
 * until the next regular line is printed.
 */
export interface Output {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
  progress(line: string): void;
}

export class ConsoleOutput implements Output {
  private progressOpen = false;

  log(line: string): void {
    this.closeProgress();
    console.log(line);
  }

  warn(line: string): void {
    this.closeProgress();
    console.warn(line);
  }

  error(line: string): void {
    this.closeProgress();
    console.error(line);
  }

  progress(line: string): void {
    process.stdout.write(`\r${line}`);
    this.progressOpen = true;
  }

  private closeProgress(): void {
    if (this.progressOpen) {
      process.stdout.write("\n");
      this.progressOpen = false;
    }
  }
}
