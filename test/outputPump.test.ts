import test from "node:test";
import assert from "node:assert/strict";
import { PassThrough } from "node:stream";
import { LineChannel } from "../src/sessions/lineChannel.js";
import { startPump } from "../src/sessions/outputPump.js";

test("pump forwards non-empty lines until end of stream", async () => {
  const channel = new LineChannel();
  const stream = new PassThrough();
  const pump = startPump(stream, channel.sender(), { source: "stdout" });

  stream.write("a\n\nb\r\n");
  stream.end("c");
  await pump.done;

  assert.equal(pump.finished, true);
  assert.deepEqual(channel.drain(), ["a", "b", "c"]);
  assert.equal(channel.disconnected, true);
});

test("stderr lines are tagged", async () => {
  const channel = new LineChannel();
  const stream = new PassThrough();
  const pump = startPump(stream, channel.sender(), { source: "stderr" });

  stream.end("warning: deprecated\n");
  await pump.done;

  assert.equal(pump.source, "stderr");
  assert.deepEqual(channel.drain(), ["[stderr] warning: deprecated"]);
});

test("invalid UTF-8 is replaced rather than failing the pump", async () => {
  const channel = new LineChannel();
  const stream = new PassThrough();
  const pump = startPump(stream, channel.sender(), { source: "stdout" });

  stream.end(Buffer.from([0x6f, 0x6b, 0xff, 0x0a]));
  await pump.done;

  assert.deepEqual(channel.drain(), ["ok\uFFFD"]);
});

test("a stream error finishes the pump and reports the error", async () => {
  const channel = new LineChannel();
  const stream = new PassThrough();
  const errors: string[] = [];
  const pump = startPump(stream, channel.sender(), {
    source: "stdout",
    onError: (error) => errors.push(error.message),
  });

  stream.write("before\n");
  await new Promise((resolve) => setImmediate(resolve));
  stream.destroy(new Error("pipe broke"));
  await pump.done;

  assert.equal(pump.finished, true);
  assert.deepEqual(errors, ["pipe broke"]);
  assert.deepEqual(channel.drain(), ["before"]);
});

test("a closed channel does not stop the pump from reaching end of stream", async () => {
  const channel = new LineChannel();
  const stream = new PassThrough();
  const pump = startPump(stream, channel.sender(), { source: "stdout" });

  channel.close();
  stream.end("ignored\n");
  await pump.done;

  assert.equal(pump.finished, true);
  assert.deepEqual(channel.drain(), []);
});
