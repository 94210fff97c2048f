import type { Sequenced } from "@agentrun/api-types";

/**
 * Stamps events of one request stream with gap-free, strictly increasing
 * sequence numbers starting at 0. One instance per stream; never shared.
 */
export class Sequencer {
  private nextValue = 0;

  next(): number {
    return this.nextValue++;
  }

  stamp<T extends object>(event: T): Sequenced<T> {
    return { ...event, sequence_number: this.next() };
  }
}
