import fs from 'fs';
import type { ResultLine, ResultSink } from '../types/scanner.js';

export type LineWriter = (line: string) => void;

export interface ResultWriterOptions {
  outputFile?: string | undefined;
  writeLine?: LineWriter | undefined;
}

export function resultFields(line: ResultLine): string[] {
  const fields = [line.host, String(line.port), line.status];
  if (line.hostname !== undefined) {
    fields.push(line.hostname);
  }
  return fields;
}

/**
 * Writes each result as one tab-separated line to stdout and, when an output
 * file is configured, one comma-separated row to it. Rows go straight to the
 * file descriptor so every row on disk is complete.
 */
export class ResultWriter implements ResultSink {
  private readonly writeLine: LineWriter;
  private fd: number | null;

  constructor(options: ResultWriterOptions = {}) {
    this.writeLine = options.writeLine ?? ((line) => console.log(line));
    this.fd = options.outputFile ? fs.openSync(options.outputFile, 'w') : null;
  }

  emit(line: ResultLine): void {
    const fields = resultFields(line);
    this.writeLine(fields.join('\t'));
    if (this.fd !== null) {
      fs.writeSync(this.fd, `${fields.join(',')}\n`);
    }
  }

  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }
}
