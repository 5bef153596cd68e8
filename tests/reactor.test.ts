/**
 * Unit tests for the Socket Reactor, using an in-process Duplex
 */

import { describe, it, afterEach } from "node:test";
import assert from "node:assert";
import { Duplex } from "node:stream";

import { resetChatConfig, setChatConfig } from "../src/config.js";
import { attachSession, duplexSocket, openChat } from "../src/reactor.js";
import { SessionRegistry } from "../src/registry.js";
import { ChatSession } from "../src/session.js";
import type { CloseReason, ReadResult } from "../src/types.js";
import { EXIT_OK, EXIT_SEND_FAILED } from "../src/types.js";
import { createFakeStream, createRecordingSink, flush } from "./helpers.js";

/** Session that records the size of every read event */
class RecordingSession extends ChatSession {
  readonly reads: number[] = [];

  receive(result: ReadResult) {
    this.reads.push(typeof result === "number" ? result : result.length);
    return super.receive(result);
  }
}

function open(options: { charset?: string; registry?: SessionRegistry } = {}) {
  const { stream, written, text } = createFakeStream();
  const { sink, printed } = createRecordingSink();
  const closes: CloseReason[] = [];
  const task = openChat(stream, {
    localNick: "alice",
    remoteNick: "bob",
    surface: "dcc.bob",
    sink,
    onClose: (_session, reason) => closes.push(reason),
    ...options,
  });
  return { task, stream, written, text, printed, closes };
}

describe("duplexSocket", () => {
  it("should report the full length of a write", () => {
    const { stream, text } = createFakeStream();
    const socket = duplexSocket(stream);
    assert.strictEqual(socket.write(Buffer.from("hi\r\n")), 4);
    assert.strictEqual(text(), "hi\r\n");
  });

  it("should report a write the stream rejects later", async () => {
    const stream = new Duplex({
      read() {},
      write(_chunk, _encoding, callback) {
        callback(new Error("EPIPE"));
      },
    });
    stream.on("error", () => {});
    const socket = duplexSocket(stream);
    const errors: string[] = [];
    socket.onWriteError?.((err) => errors.push(err.message));

    assert.strictEqual(socket.write(Buffer.from("hi")), 2);
    await flush();
    assert.deepStrictEqual(errors, ["EPIPE"]);
  });

  it("should fail writes once the stream is destroyed", () => {
    const { stream } = createFakeStream();
    const socket = duplexSocket(stream);
    socket.close();
    assert.strictEqual(stream.destroyed, true);
    assert.strictEqual(socket.write(Buffer.from("hi")), -1);
  });
});

describe("openChat", () => {
  afterEach(() => {
    resetChatConfig();
  });

  it("should announce the chat and display incoming lines", async () => {
    const { task, stream, printed } = open();
    stream.push("hello\r\nwor");
    stream.push("ld\n");
    await flush();

    assert.strictEqual(task.session.status, "active");
    assert.deepStrictEqual(printed.map((line) => line.text), [
      "--\tpeerchat: connected to bob via direct chat",
      "\x1b[36mbob\x1b[0m\thello",
      "\x1b[36mbob\x1b[0m\tworld",
    ]);
  });

  it("should write typed lines to the stream", async () => {
    const { task, text } = open();
    task.session.input("hi there");
    await flush();
    assert.strictEqual(text(), "hi there\r\n");
  });

  it("should end the chat as aborted when the peer ends the stream", async () => {
    const { task, stream, printed, closes } = open();
    stream.push("bye\n");
    stream.push(null);
    await flush();

    assert.strictEqual(task.session.status, "aborted");
    assert.deepStrictEqual(closes, ["aborted"]);
    assert.strictEqual(stream.destroyed, true);
    assert.strictEqual(printed[printed.length - 1].text, "--\tpeerchat: chat closed with bob");
  });

  it("should end the chat as aborted on a socket error", async () => {
    const { task, stream, closes } = open();
    stream.destroy(new Error("connection reset"));
    await flush();

    assert.strictEqual(task.session.status, "aborted");
    assert.deepStrictEqual(closes, ["aborted"]);
  });

  it("should fail the chat when the stream can no longer be written", () => {
    const { task, stream, printed, closes } = open();
    stream.destroy();

    const result = task.session.input("hi");
    assert.strictEqual(result.code, EXIT_SEND_FAILED);
    assert.strictEqual(task.session.status, "failed");
    assert.deepStrictEqual(closes, ["failed"]);
    assert.strictEqual(
      printed[printed.length - 1].text,
      '=!=\tpeerchat: error sending data to "bob" via direct chat',
    );
  });

  it("should fail the chat when the stream rejects a queued write", async () => {
    const stream = new Duplex({
      read() {},
      write(_chunk, _encoding, callback) {
        callback(new Error("EPIPE"));
      },
    });
    const { sink, printed } = createRecordingSink();
    const closes: CloseReason[] = [];
    const task = openChat(stream, {
      localNick: "alice",
      remoteNick: "bob",
      sink,
      onClose: (_session, reason) => closes.push(reason),
    });

    assert.strictEqual(task.session.input("hi").code, EXIT_OK);
    await flush();

    assert.strictEqual(task.session.status, "failed");
    assert.deepStrictEqual(closes, ["failed"]);
    assert.strictEqual(stream.destroyed, true);
    assert.deepStrictEqual(printed.map((line) => line.text), [
      "--\tpeerchat: connected to bob via direct chat",
      "\x1b[97malice\x1b[0m\thi",
      '=!=\tpeerchat: error sending data to "bob" via direct chat',
    ]);
  });

  it("should stop reading after cancel", async () => {
    const { task, stream, printed, closes } = open();
    task.cancel();
    task.cancel();
    stream.push("ignored\n");
    await flush();

    assert.strictEqual(task.session.status, "aborted");
    assert.deepStrictEqual(closes, ["aborted"]);
    assert.deepStrictEqual(printed.map((line) => line.text), [
      "--\tpeerchat: connected to bob via direct chat",
      "--\tpeerchat: chat closed with bob",
    ]);
  });

  it("should register the session under its surface", () => {
    const registry = new SessionRegistry();
    const { task } = open({ registry });
    assert.strictEqual(registry.get("dcc.bob"), task.session);
  });

  it("should release the stream of a chat refused by the registry", async () => {
    const registry = new SessionRegistry();
    const first = open({ registry });
    const { stream } = createFakeStream();
    const { sink, printed } = createRecordingSink();

    assert.throws(
      () => openChat(stream, { localNick: "alice", remoteNick: "carol", surface: "dcc.bob", sink, registry }),
      /Surface dcc.bob already has an active chat/,
    );
    stream.push("hello\n");
    await flush();

    assert.strictEqual(stream.destroyed, true);
    assert.strictEqual(stream.listenerCount("data"), 0);
    assert.deepStrictEqual(printed.map((line) => line.text), ["--\tpeerchat: chat closed with carol"]);
    assert.strictEqual(registry.get("dcc.bob"), first.task.session);
    assert.strictEqual(first.task.session.status, "active");
  });

  it("should build a transcoder from the charset option", () => {
    const { task } = open({ charset: "latin1" });
    assert.strictEqual(task.session.transcoder.charset, "latin1");
  });

  it("should use the configured charset by default", () => {
    setChatConfig({ charset: "cp1252" });
    const { task } = open();
    assert.strictEqual(task.session.transcoder.charset, "cp1252");
  });

  it("should reject an unknown charset", () => {
    assert.throws(() => open({ charset: "no-such-charset" }), /Unknown charset/);
  });
});

describe("attachSession", () => {
  afterEach(() => {
    resetChatConfig();
  });

  it("should split large reads into chunk-sized read events", async () => {
    setChatConfig({ chunkSize: 4 });
    const { stream } = createFakeStream();
    const { sink } = createRecordingSink();
    const session = new RecordingSession({
      socket: duplexSocket(stream),
      sink,
      remoteNick: "bob",
      localNick: "alice",
    });
    attachSession(session, stream);

    stream.push("abcdefghij\n");
    await flush();

    assert.deepStrictEqual(session.reads, [4, 4, 3]);
  });

  it("should stop feeding the session once detached", async () => {
    const { stream } = createFakeStream();
    const { sink, printed } = createRecordingSink();
    const session = new ChatSession({
      socket: duplexSocket(stream),
      sink,
      remoteNick: "bob",
      localNick: "alice",
    });
    const detach = attachSession(session, stream);
    detach();

    stream.push("hello\n");
    stream.destroy(new Error("late failure"));
    await flush();

    assert.strictEqual(session.status, "active");
    assert.strictEqual(printed.length, 0);
  });
});
