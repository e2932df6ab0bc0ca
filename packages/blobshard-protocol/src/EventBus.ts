import { z } from "zod";

// ---------- Schema for event‐envelope validation ----------
const BaseEnvelopeSchema = z.object({
  event: z.string().min(1),
  source: z.string().min(1),
  payload: z.unknown(),
});

/** One event as handed to `emit()`: its name and matching payload. */
export type BusEmission<Events> = {
  [K in keyof Events & string]: { event: K; payload: Events[K] };
}[keyof Events & string];

/**
 * BusEvent: an emission tagged with the component that emitted it.
 * Switching on `event` narrows `payload`.
 */
export type BusEvent<Events> = BusEmission<Events> & { source: string };

export type BusListener<Events> = (envelope: BusEvent<Events>) => void;

/**
 * EventBus: an array of listeners, each called synchronously in registration
 * order. A listener that throws is logged and skipped.
 */
export class EventBus<Events> {
  private listeners: BusListener<Events>[] = [];

  constructor(private readonly source: string) {}

  /** Subscribe; returns the matching unsubscribe function. */
  on(listener: BusListener<Events>): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  emit(emission: BusEmission<Events>): void {
    const envelope: BusEvent<Events> = Object.assign({ source: this.source }, emission);
    const checked = BaseEnvelopeSchema.safeParse(envelope);
    if (!checked.success) {
      console.warn(`[${this.source}] dropped invalid event envelope`);
      return;
    }
    for (const listener of this.listeners) {
      try {
        listener(envelope);
      } catch (err) {
        console.error(`[${this.source}] listener for "${checked.data.event}" failed:`, err);
      }
    }
  }
}
