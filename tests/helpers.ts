/**
 * In-process stand-ins for sockets, streams and display sinks.
 */

import { Duplex, PassThrough, Writable } from "node:stream";
import type { ChatSocket, DisplaySink } from "../src/types.js";

export interface PrintedLine {
  target: string | null;
  tags: string[];
  text: string;
}

/** Sink that records every print call */
export function createRecordingSink(onPrint?: (line: PrintedLine) => void) {
  const printed: PrintedLine[] = [];
  const sink: DisplaySink = {
    print(target, tags, text) {
      const line = { target, tags: [...tags], text };
      printed.push(line);
      onPrint?.(line);
    },
  };
  return { sink, printed };
}

/**
 * Socket whose write results can be scripted. Each entry of `writeResults`
 * is returned by one write call; after that writes succeed in full.
 * `failWrite` reports a late write error the way a stream does.
 */
export function createFakeSocket(writeResults: number[] = []) {
  const writes: Buffer[] = [];
  const writeErrorListeners: ((err: Error) => void)[] = [];
  let closeCount = 0;
  const socket: ChatSocket = {
    write(bytes) {
      const planned = writeResults.shift();
      const count = planned ?? bytes.length;
      if (count > 0) writes.push(Buffer.from(bytes.subarray(0, count)));
      return count;
    },
    close() {
      closeCount++;
    },
    onWriteError(listener) {
      writeErrorListeners.push(listener);
    },
  };
  const failWrite = (err: Error) => {
    for (const listener of writeErrorListeners) listener(err);
  };
  return { socket, writes, failWrite, closeCount: () => closeCount };
}

/** Duplex with a manual read side (`push`) and a recorded write side */
export function createFakeStream() {
  const written: Buffer[] = [];
  const stream = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written.push(Buffer.from(chunk));
      callback();
    },
  });
  return { stream, written, text: () => Buffer.concat(written).toString("utf8") };
}

/** Captured stdin/stdout/stderr for CLI tests */
export function createTestIO() {
  const out: string[] = [];
  const err: string[] = [];
  const collect = (into: string[]) =>
    new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        into.push(chunk.toString());
        callback();
      },
    });
  const stdin = new PassThrough();
  return {
    io: { stdin, stdout: collect(out), stderr: collect(err) },
    stdin,
    stdout: () => out.join(""),
    stderr: () => err.join(""),
  };
}

/** Let pending stream and readline events run */
export async function flush(rounds = 3): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}
