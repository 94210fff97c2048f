import { describe, it } from "node:test";
import assert from "node:assert/strict";
import net from "node:net";
import { serveStandalone, type StandaloneOptions } from "./standalone.ts";
import { Runner } from "../runner.ts";
import { fromFunction } from "../handler-adapter.ts";
import { createLogger } from "../logger.ts";

const logger = createLogger({ level: "silent" });

function options(overrides: Partial<StandaloneOptions> = {}): StandaloneOptions {
  return {
    host: "127.0.0.1",
    port: 0,
    endpointPath: "/process",
    responseType: "json",
    mode: "standalone",
    serviceName: "standalone-test",
    shutdownTimeoutMs: 2000,
    logger,
    ...overrides,
  };
}

function trackedRunner(calls: string[]): Runner {
  return new Runner({
    handler: fromFunction(() => "ok"),
    onInit: () => {
      calls.push("init");
    },
    onShutdown: () => {
      calls.push("shutdown");
    },
    logger,
  });
}

describe("serveStandalone", () => {
  it("serves until aborted and brackets the runner lifecycle", async () => {
    const calls: string[] = [];
    const controller = new AbortController();
    let port = 0;

    const serving = serveStandalone(
      trackedRunner(calls),
      options({
        signal: controller.signal,
        onListening: (address) => {
          port = address.port;
          calls.push("listening");
        },
      }),
    );
    while (port === 0) {
      await new Promise((resolve) => setTimeout(resolve, 10));
    }

    const ready = await fetch(`http://127.0.0.1:${port}/readiness`);
    assert.equal(await ready.text(), "success");
    const res = await fetch(`http://127.0.0.1:${port}/process`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ input: [], session_id: "s-standalone" }),
    });
    const body: unknown = await res.json();
    assert.ok(typeof body === "object" && body !== null && "session_id" in body);
    assert.equal(body.session_id, "s-standalone");

    controller.abort();
    await serving;
    assert.deepEqual(calls, ["init", "listening", "shutdown"]);
  });

  it("returns at once when the signal is already aborted", async () => {
    const calls: string[] = [];
    await serveStandalone(trackedRunner(calls), options({ signal: AbortSignal.abort() }));
    assert.deepEqual(calls, ["init", "shutdown"]);
  });

  it("shuts down through the admin endpoint in detached mode", async () => {
    let port = 0;
    const serving = serveStandalone(
      trackedRunner([]),
      options({
        mode: "detached_process",
        shutdownDelayMs: 10,
        onListening: (address) => {
          port = address.port;
        },
      }),
    );
    while (port === 0) {
      await new Promise((resolve) => setTimeout(resolve, 10));
    }

    const res = await fetch(`http://127.0.0.1:${port}/admin/shutdown`, { method: "POST" });
    assert.equal(res.headers.get("X-Process-Mode"), "detached");
    assert.deepEqual(await res.json(), { message: "Shutdown initiated" });
    await serving;
  });

  it("fails on a bound port and still runs the shutdown hook", async () => {
    const blocker = net.createServer();
    await new Promise<void>((resolve) => blocker.listen(0, "127.0.0.1", () => resolve()));
    const address = blocker.address();
    const port = typeof address === "object" && address ? address.port : 0;
    const calls: string[] = [];

    try {
      await assert.rejects(
        serveStandalone(trackedRunner(calls), options({ port })),
        /EADDRINUSE/,
      );
      assert.deepEqual(calls, ["init", "shutdown"]);
    } finally {
      await new Promise((resolve) => blocker.close(resolve));
    }
  });
});
