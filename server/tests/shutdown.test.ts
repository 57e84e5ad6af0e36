import test from "node:test";
import assert from "node:assert/strict";
import { EventEmitter } from "node:events";
import { installShutdownHandlers, lateBoundServer, type ClosableServer } from "../src/shutdown.js";

function fakeServer(closeError?: Error): ClosableServer & { closed: number } {
  return {
    closed: 0,
    close(callback: (err?: Error) => void) {
      this.closed += 1;
      callback(closeError);
    },
  };
}

test("installShutdownHandlers should close the server and exit 0 on SIGTERM", () => {
  const source = new EventEmitter();
  const server = fakeServer();
  const exits: number[] = [];
  const logs: string[] = [];

  installShutdownHandlers(server, {
    source,
    exit: (code) => exits.push(code),
    log: (message) => logs.push(message),
  });
  source.emit("SIGTERM");

  assert.equal(server.closed, 1);
  assert.deepEqual(exits, [0]);
  assert.deepEqual(logs, ["received SIGTERM, closing server"]);
  assert.equal(source.listenerCount("SIGTERM"), 0);
  assert.equal(source.listenerCount("SIGINT"), 0);
});

test("installShutdownHandlers should handle SIGINT only once", () => {
  const source = new EventEmitter();
  const server = fakeServer();
  const exits: number[] = [];

  installShutdownHandlers(server, { source, exit: (code) => exits.push(code), log: () => undefined });
  source.emit("SIGINT");
  source.emit("SIGINT");
  source.emit("SIGTERM");

  assert.equal(server.closed, 1);
  assert.deepEqual(exits, [0]);
});

test("installShutdownHandlers should exit 1 and report when close fails", () => {
  const source = new EventEmitter();
  const exits: number[] = [];
  const errors: string[] = [];

  installShutdownHandlers(fakeServer(new Error("boom")), {
    source,
    exit: (code) => exits.push(code),
    log: () => undefined,
    error: (message) => errors.push(message),
  });
  source.emit("SIGTERM");

  assert.deepEqual(exits, [1]);
  assert.deepEqual(errors, ["server close failed: boom"]);
});

test("installShutdownHandlers dispose should remove listeners", () => {
  const source = new EventEmitter();
  const dispose = installShutdownHandlers(fakeServer(), { source, signals: ["SIGTERM"] });

  assert.equal(source.listenerCount("SIGTERM"), 1);
  assert.equal(source.listenerCount("SIGINT"), 0);
  dispose();
  assert.equal(source.listenerCount("SIGTERM"), 0);
});

test("lateBoundServer should exit 0 on a signal that arrives before listen", () => {
  const source = new EventEmitter();
  const exits: number[] = [];

  installShutdownHandlers(lateBoundServer(), { source, exit: (code) => exits.push(code), log: () => undefined });
  source.emit("SIGTERM");

  assert.deepEqual(exits, [0]);
});

test("lateBoundServer should close the bound server once listening", () => {
  const source = new EventEmitter();
  const target = lateBoundServer();
  const server = fakeServer();
  const exits: number[] = [];

  installShutdownHandlers(target, { source, exit: (code) => exits.push(code), log: () => undefined });
  target.bind(server);
  source.emit("SIGINT");

  assert.equal(server.closed, 1);
  assert.deepEqual(exits, [0]);
});
