import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import http from "node:http";
import type { StreamEvent } from "@agentrun/api-types";
import { getHealth, getProcessStatus, setBaseUrl, getBaseUrl, shutdownService, streamQuery } from "./api-client.ts";

const EVENTS = [
  { object: "response", id: "r1", session_id: "s1", status: "created", created_at: 1, output: [], sequence_number: 0 },
  { object: "response", id: "r1", session_id: "s1", status: "in_progress", created_at: 1, output: [], sequence_number: 1 },
  { object: "response", id: "r1", session_id: "s1", status: "completed", created_at: 1, output: [], sequence_number: 2 },
];

describe("api client", () => {
  let server: http.Server;
  let received: unknown;

  before(async () => {
    server = http.createServer((req, res) => {
      if (req.url === "/health") {
        res.setHeader("Content-Type", "application/json");
        res.end(JSON.stringify({ status: "healthy", timestamp: 1, service: "svc", mode: "detached_process" }));
        return;
      }
      if (req.url === "/admin/status") {
        res.statusCode = 404;
        res.end("not here");
        return;
      }
      if (req.url === "/admin/shutdown" && req.method === "POST") {
        res.setHeader("Content-Type", "application/json");
        res.end(JSON.stringify({ message: "Shutdown initiated" }));
        return;
      }
      let body = "";
      req.on("data", (chunk: Buffer) => {
        body += chunk.toString();
      });
      req.on("end", () => {
        received = JSON.parse(body);
        res.setHeader("Content-Type", "text/event-stream");
        const wire = EVENTS.map((e) => `data: ${JSON.stringify(e)}\n\n`).join("");
        // split mid-frame to exercise the incremental parser
        res.write(wire.slice(0, 37));
        setTimeout(() => {
          res.write(`: keep-alive\n\n${wire.slice(37)}`);
          res.end();
        }, 10);
      });
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    const port = typeof address === "object" && address ? address.port : 0;
    setBaseUrl(`http://127.0.0.1:${port}/`);
  });

  after(async () => {
    await new Promise((resolve) => server.close(resolve));
  });

  it("drops trailing slashes from the base URL", () => {
    assert.doesNotMatch(getBaseUrl(), /\/$/);
  });

  it("fetches the health body", async () => {
    const health = await getHealth();
    assert.equal(health.status, "healthy");
    assert.equal(health.service, "svc");
  });

  it("turns an HTTP error into an exception", async () => {
    await assert.rejects(getProcessStatus(), { message: "HTTP 404: not here" });
  });

  it("requests a shutdown", async () => {
    assert.deepEqual(await shutdownService(), { message: "Shutdown initiated" });
  });

  it("streams events in order across chunk boundaries", async () => {
    const events: StreamEvent[] = [];
    const body = { input: [{ role: "user" as const, content: [{ type: "text" as const, text: "hi" }] }] };
    await streamQuery(body, (event) => events.push(event), { endpointPath: "/agent" });

    assert.deepEqual(received, body);
    assert.deepEqual(
      events.map((e) => `${e.sequence_number}:${e.status}`),
      ["0:created", "1:in_progress", "2:completed"],
    );
  });
});
