/**
 * @file packages/program/tests/unit/output/sink.spec.ts
 * @version 0.1.0
 * @scope Program package test code.
 * @description Unit coverage for output sinks.
 */

import { describe, expect, it, vi } from "vitest";

import {
  createMemorySink,
  createStdoutSink,
} from "../../../src/output/sink.js";

describe("output/sink", () => {
  it("stdout sink terminates every line with a newline", () => {
    const chunks: string[] = [];
    const sink = createStdoutSink({
      write(chunk: string) {
        chunks.push(chunk);
        return true;
      },
    });

    sink.writeLine("Hello, world!");
    sink.writeLine("");

    expect(chunks).toEqual(["Hello, world!\n", "\n"]);
  });

  it("stdout sink defaults to process.stdout", () => {
    const write = vi
      .spyOn(process.stdout, "write")
      .mockImplementation(() => true);

    try {
      createStdoutSink().writeLine("x: 5, y: 15");
      expect(write).toHaveBeenCalledTimes(1);
      expect(write).toHaveBeenCalledWith("x: 5, y: 15\n");
    } finally {
      write.mockRestore();
    }
  });

  it("stdout sink lets write failures propagate", () => {
    const sink = createStdoutSink({
      write() {
        throw new Error("EPIPE");
      },
    });

    expect(() => sink.writeLine("Number: 1")).toThrow("EPIPE");
  });

  it("memory sink returns copies and can be cleared", () => {
    const sink = createMemorySink();
    sink.writeLine("a");

    const snapshot = sink.lines();
    sink.writeLine("b");

    expect(snapshot).toEqual(["a"]);
    expect(sink.lines()).toEqual(["a", "b"]);

    sink.clear();
    expect(sink.lines()).toEqual([]);
  });
});
