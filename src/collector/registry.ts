import { FullEvent } from "../dispatch/full-event";
import { toError } from "../utils/errors";
import { logger } from "../utils/logger";

export interface CollectorSink {
  /** Returns `false` once the sink wants no more events */
  offer(event: FullEvent): boolean;
  stop(): void;
}

type Registration = {
  sink: CollectorSink;
  /** Ordinal of the last event decoded before the sink was registered */
  since: number;
};

const log = logger.scope("Collectors");

/**
 * Live collectors of one shard. Every decoded event is stamped with an
 * ordinal so a collector only sees events decoded after it was added.
 */
export class CollectorRegistry {
  private ordinal = 0;
  private readonly registrations = new Set<Registration>();

  get current() {
    return this.ordinal;
  }

  get size() {
    return this.registrations.size;
  }

  /** Called once per decoded event, in wire order */
  stamp(): number {
    return ++this.ordinal;
  }

  /** Returns a function that removes the sink again */
  register(sink: CollectorSink): () => void {
    const registration: Registration = { sink, since: this.ordinal };
    this.registrations.add(registration);
    return () => {
      this.registrations.delete(registration);
    };
  }

  offer(event: FullEvent, ordinal: number) {
    for (const registration of [...this.registrations]) {
      if (ordinal <= registration.since) continue;

      let keep: boolean;
      try {
        keep = registration.sink.offer(event);
      } catch (err) {
        log.error(`Collector filter threw on ${event.type}:`, toError(err));
        registration.sink.stop();
        keep = false;
      }
      if (!keep) this.registrations.delete(registration);
    }
  }

  /** Stops and forgets every collector */
  clear() {
    for (const { sink } of this.registrations) {
      sink.stop();
    }
    this.registrations.clear();
  }
}
