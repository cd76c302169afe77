import type { SimulationEvent, SimulationEventKind, SimulationEventPayloadMap } from "@devteam-sim/core";

/**
 * Append-only event log for one run. Events are numbered from 1 and frozen on
 * append; there is no way to edit or remove them.
 */
export class EventLog {
  private events: SimulationEvent[] = [];

  append<K extends SimulationEventKind>(
    kind: K,
    day: number,
    agentId: string | null,
    payload: SimulationEventPayloadMap[K]
  ): SimulationEvent<K> {
    const event: SimulationEvent<K> = Object.freeze({
      seq: this.events.length + 1,
      kind,
      day,
      agentId,
      payload: Object.freeze<SimulationEventPayloadMap[K]>({ ...payload }),
    });
    this.events.push(event);
    return event;
  }

  get size(): number {
    return this.events.length;
  }

  /** Snapshot of the log. Later appends do not show up in it. */
  toArray(): readonly SimulationEvent[] {
    return this.events.slice();
  }
}
