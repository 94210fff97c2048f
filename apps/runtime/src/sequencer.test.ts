import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Sequencer } from "./sequencer.ts";

describe("Sequencer", () => {
  it("starts at 0 and increments by one", () => {
    const seq = new Sequencer();
    assert.deepEqual([seq.next(), seq.next(), seq.next()], [0, 1, 2]);
  });

  it("keeps separate counters per instance", () => {
    const a = new Sequencer();
    const b = new Sequencer();
    a.next();
    a.next();
    assert.equal(b.next(), 0);
    assert.equal(a.next(), 2);
  });

  it("stamps a copy without touching the original", () => {
    const seq = new Sequencer();
    const event = { object: "message", id: "m1" };
    const stamped = seq.stamp(event);
    assert.deepEqual(stamped, { object: "message", id: "m1", sequence_number: 0 });
    assert.equal("sequence_number" in event, false);
    assert.equal(seq.stamp(event).sequence_number, 1);
  });
});
