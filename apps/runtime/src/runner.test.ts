import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { DeploymentRecord, StreamEvent } from "@agentrun/api-types";
import { Runner } from "./runner.ts";
import {
  fromFunction,
  fromAsyncFunction,
  fromGenerator,
  fromAsyncGenerator,
  type QueryHandler,
} from "./handler-adapter.ts";
import { dataMessage, textMessage } from "./events.ts";
import { ValidationError } from "./errors/validation-error.ts";
import type { DeployManager } from "./deployers/deploy-manager.ts";
import { createLogger } from "./logger.ts";

const logger = createLogger({ level: "silent" });

const REQUEST = {
  input: [{ role: "user", content: [{ type: "text", text: "hello" }] }],
  session_id: "session-1",
};

function createRunner(handler: QueryHandler): Runner {
  return new Runner({ handler, logger });
}

async function collect(runner: Runner, request: unknown = REQUEST): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of runner.streamQuery(request)) {
    events.push(event);
  }
  return events;
}

function statuses(events: StreamEvent[]): string[] {
  return events.map((e) => `${e.object}:${e.status}`);
}

describe("Runner.streamQuery", () => {
  it("plain sync function returning a string yields created, in_progress, completed", async () => {
    const runner = createRunner(fromFunction(() => "ok"));
    const events = await collect(runner);

    assert.deepEqual(statuses(events), [
      "response:created",
      "response:in_progress",
      "response:completed",
    ]);
    const last = events[2];
    assert.ok(last && last.object === "response");
    assert.equal(last.output.length, 1);
    assert.deepEqual(last.output[0]?.content, [{ type: "text", text: "ok" }]);
  });

  it("async generator that fails after one element ends with a single failed envelope", async () => {
    const runner = createRunner(
      fromAsyncGenerator(async function* () {
        yield "a";
        throw new RangeError("boom");
      }),
    );
    const events = await collect(runner);

    assert.deepEqual(statuses(events), [
      "response:created",
      "response:in_progress",
      "message:completed",
      "response:failed",
    ]);
    const message = events[2];
    assert.ok(message && message.object === "message");
    assert.deepEqual(message.content, [{ type: "text", text: "a" }]);
    const last = events[3];
    assert.ok(last && last.object === "response");
    assert.deepEqual(last.error, { code: "handler_error", message: "boom" });
    assert.equal(last.output.length, 1);
  });

  it("numbers events contiguously from 0", async () => {
    const runner = createRunner(
      fromGenerator(function* () {
        yield "one";
        yield "two";
        yield "three";
      }),
    );
    const events = await collect(runner);
    assert.deepEqual(
      events.map((e) => e.sequence_number),
      [0, 1, 2, 3, 4, 5],
    );
  });

  const shapes: [string, QueryHandler, QueryHandler][] = [
    ["sync function", fromFunction(() => "x"), fromFunction(() => {
      throw new Error("sync failure");
    })],
    ["async function", fromAsyncFunction(async () => "x"), fromAsyncFunction(async () => {
      throw new Error("async failure");
    })],
    ["sync generator", fromGenerator(function* () {
      yield "x";
    }), fromGenerator(function* () {
      throw new Error("generator failure");
    })],
    ["async generator", fromAsyncGenerator(async function* () {
      yield "x";
    }), fromAsyncGenerator(async function* () {
      throw new Error("async generator failure");
    })],
  ];

  for (const [name, ok, failing] of shapes) {
    it(`emits exactly one terminal event, last, for a ${name}`, async () => {
      for (const handler of [ok, failing]) {
        const events = await collect(createRunner(handler));
        const terminal = events.filter(
          (e) => e.object === "response" && (e.status === "completed" || e.status === "failed"),
        );
        assert.equal(terminal.length, 1);
        assert.equal(events[events.length - 1], terminal[0]);
      }
    });
  }

  it("streams every generator element and folds only completed messages", async () => {
    const runner = createRunner(
      fromGenerator(function* () {
        yield dataMessage("function_call", { name: "lookup" }, "in_progress");
        yield dataMessage("function_call_output", { output: "25C" });
        yield textMessage("It is 25C");
      }),
    );
    const events = await collect(runner);
    assert.deepEqual(statuses(events), [
      "response:created",
      "response:in_progress",
      "message:in_progress",
      "message:completed",
      "message:completed",
      "response:completed",
    ]);
    const last = events[5];
    assert.ok(last && last.object === "response");
    assert.deepEqual(
      last.output.map((m) => m.type),
      ["function_call_output", "message"],
    );
  });

  it("does not stream the result of a function handler as its own event", async () => {
    const runner = createRunner(fromAsyncFunction(async () => textMessage("final")));
    const events = await collect(runner);
    assert.equal(events.filter((e) => e.object === "message").length, 0);
  });

  it("folds a function handler's result only when it is completed", async () => {
    const runner = createRunner(
      fromFunction(() => dataMessage("function_call", { name: "lookup" }, "in_progress")),
    );
    const response = await runner.query(REQUEST);
    assert.equal(response.status, "completed");
    assert.deepEqual(response.output, []);
  });

  it("generates a session id when the request has none", async () => {
    let seen = "";
    const runner = createRunner(
      fromFunction((_runner, request) => {
        seen = request.session_id;
        return "ok";
      }),
    );
    const events = await collect(runner, { input: [] });
    const envelope = events[0];
    assert.ok(envelope && envelope.object === "response");
    assert.ok(envelope.session_id.length > 0);
    assert.equal(envelope.session_id, seen);
  });

  it("preserves a supplied session id", async () => {
    const events = await collect(createRunner(fromFunction(() => "ok")));
    for (const event of events) {
      assert.ok(event.object === "response");
      assert.equal(event.session_id, "session-1");
    }
  });

  it("backfills user_id with an empty string and honors an explicit user id", async () => {
    const users: string[] = [];
    const runner = createRunner(
      fromFunction((_runner, request) => {
        users.push(request.user_id);
        return "ok";
      }),
    );
    await collect(runner);
    await collect(runner, { ...REQUEST, user_id: "u-1" });
    for await (const _ of runner.streamQuery({ ...REQUEST, user_id: "u-1" }, { userId: "u-2" })) {
      // drain
    }
    assert.deepEqual(users, ["", "u-1", "u-2"]);
  });

  it("rejects a malformed request with ValidationError before any event", async () => {
    const runner = createRunner(fromFunction(() => "ok"));
    const events: StreamEvent[] = [];
    await assert.rejects(async () => {
      for await (const event of runner.streamQuery({ session_id: "s" })) {
        events.push(event);
      }
    }, ValidationError);
    assert.equal(events.length, 0);
  });

  it("passes the runner itself to the handler", async () => {
    let received: Runner | undefined;
    const runner = createRunner(
      fromFunction((self) => {
        received = self;
        return "ok";
      }),
    );
    await collect(runner);
    assert.equal(received, runner);
  });
});

describe("Runner.query", () => {
  it("returns the terminal envelope", async () => {
    const runner = createRunner(
      fromGenerator(function* () {
        yield "a";
        yield "b";
      }),
    );
    const response = await runner.query(REQUEST);
    assert.equal(response.status, "completed");
    assert.equal(response.sequence_number, 4);
    assert.deepEqual(
      response.output.map((m) => m.content[0]),
      [
        { type: "text", text: "a" },
        { type: "text", text: "b" },
      ],
    );
  });
});

describe("Runner lifecycle", () => {
  it("runs init and shutdown hooks exactly once around use()", async () => {
    const calls: string[] = [];
    const runner = new Runner({
      handler: fromFunction(() => "ok"),
      onInit: () => {
        calls.push("init");
      },
      onShutdown: async () => {
        calls.push("shutdown");
      },
      logger,
    });

    const result = await runner.use(async (r) => {
      await r.start();
      calls.push("body");
      return 42;
    });
    await runner.close();

    assert.equal(result, 42);
    assert.deepEqual(calls, ["init", "body", "shutdown"]);
  });

  it("runs shutdown when the body throws", async () => {
    const calls: string[] = [];
    const runner = new Runner({
      handler: fromFunction(() => "ok"),
      onShutdown: () => {
        calls.push("shutdown");
      },
      logger,
    });
    await assert.rejects(
      runner.use(() => {
        throw new Error("body failed");
      }),
      /body failed/,
    );
    assert.deepEqual(calls, ["shutdown"]);
  });

  it("runs shutdown when init throws", async () => {
    const calls: string[] = [];
    const runner = new Runner({
      handler: fromFunction(() => "ok"),
      onInit: () => {
        throw new Error("init failed");
      },
      onShutdown: () => {
        calls.push("shutdown");
      },
      logger,
    });
    await assert.rejects(runner.use(() => calls.push("body")), /init failed/);
    assert.deepEqual(calls, ["shutdown"]);
  });

  it("suppresses a failing shutdown hook", async () => {
    const runner = new Runner({
      handler: fromFunction(() => "ok"),
      onShutdown: () => {
        throw new Error("cleanup failed");
      },
      logger,
    });
    assert.equal(await runner.use(() => "done"), "done");
  });
});

describe("Runner deploy / stop", () => {
  function createFakeManager(): DeployManager & { stops: number } {
    let running = false;
    return {
      stops: 0,
      get deployId() {
        return running ? "daemon_127.0.0.1_9000" : null;
      },
      get isRunning() {
        return running;
      },
      get serviceUrl() {
        return running ? "http://127.0.0.1:9000" : null;
      },
      async deploy(): Promise<DeploymentRecord> {
        running = true;
        return {
          deploy_id: "daemon_127.0.0.1_9000",
          mode: "daemon_thread",
          host: "127.0.0.1",
          port: 9000,
          pid: null,
          url: "http://127.0.0.1:9000",
        };
      },
      async stop() {
        this.stops++;
        running = false;
      },
    };
  }

  it("tracks a deployment by id and stops it through its manager", async () => {
    const runner = createRunner(fromFunction(() => "ok"));
    const manager = createFakeManager();

    const record = await runner.deploy(manager);
    assert.equal(record.deploy_id, "daemon_127.0.0.1_9000");
    assert.deepEqual(runner.deploymentIds, ["daemon_127.0.0.1_9000"]);

    await runner.stop(record.deploy_id);
    assert.equal(manager.stops, 1);
    assert.equal(manager.isRunning, false);
    assert.deepEqual(runner.deploymentIds, []);
  });

  it("treats stopping an unknown deployment as a no-op", async () => {
    const runner = createRunner(fromFunction(() => "ok"));
    await runner.stop("nonexistent");
    assert.deepEqual(runner.deploymentIds, []);
  });
});
