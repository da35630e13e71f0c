/**
 * @file packages/program/src/output/sink.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Line-oriented output sinks.
 */

export interface OutputSink {
  writeLine(line: string): void;
}

export interface MemorySink extends OutputSink {
  readonly lines: () => readonly string[];
  clear: () => void;
}

/** The slice of a writable stream the stdout sink needs. */
export interface LineStream {
  write(chunk: string): unknown;
}

/**
 * Writes each line followed by `\n`. Write failures are not caught here.
 */
export function createStdoutSink(
  stream: LineStream = process.stdout,
): OutputSink {
  return {
    writeLine(line) {
      stream.write(`${line}\n`);
    },
  };
}

export function createMemorySink(): MemorySink {
  const written: string[] = [];

  return {
    writeLine(line) {
      written.push(line);
    },
    lines() {
      return written.slice();
    },
    clear() {
      written.length = 0;
    },
  };
}
