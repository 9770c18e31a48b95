import { CacheUpdateResult } from "../cache/updates";
import { CollectorRegistry } from "../collector/registry";
import { Diagnostics } from "../diagnostics";
import { GatewayEvent } from "../events/gateway-event";
import { HandlerError, toError } from "../utils/errors";
import { Awaitable, nextTick } from "../utils/helpers";
import { logger } from "../utils/logger";
import { buildFullEvent, FullEvent, PseudoEvent } from "./full-event";
import { callHandler, Context, EventHandler, RawDispatch, RawEventHandler } from "./handler";

export type DispatchJob = {
  ctx: Context;
  event: GatewayEvent;
  result: CacheUpdateResult;
  /** Ordinal the shard stamped on the event when it was decoded */
  ordinal: number;
  collectors: CollectorRegistry;
  raw?: RawDispatch;
};

export type DispatcherOptions = {
  handler?: EventHandler;
  rawHandler?: RawEventHandler;
  diagnostics: Diagnostics;
};

const log = logger.scope("Dispatcher");

/**
 * Runs handlers off the receive path. Jobs start in the order they are
 * spawned but may finish out of order.
 */
export class Dispatcher {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly options: DispatcherOptions) {}

  get pending() {
    return this.inFlight.size;
  }

  spawn(job: DispatchJob) {
    this.track(() => this.run(job));
  }

  /** Dispatches a pseudo-event that no cache update produced */
  spawnPseudo(ctx: Context, event: PseudoEvent) {
    this.track(() => this.invoke(ctx, event));
  }

  /** Resolves once every spawned job has finished */
  async settled() {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private track(work: () => Promise<void>) {
    const task: Promise<void> = nextTick()
      .then(work)
      .catch((err) => {
        log.error("Dispatch failed:", toError(err));
      })
      .then(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private async run({ ctx, event, result, ordinal, collectors, raw }: DispatchJob) {
    const { rawHandler } = this.options;
    if (rawHandler && raw) {
      await this.guard(ctx.shardId, "Raw", () => rawHandler(ctx, raw));
    }

    const full = buildFullEvent(event, result);
    collectors.offer(full, ordinal);

    for (const milestone of result.milestones) {
      await this.invoke(ctx, milestone);
    }
    await this.invoke(ctx, full);
  }

  private async invoke(ctx: Context, event: FullEvent) {
    const { handler } = this.options;
    if (!handler) return;
    await this.guard(ctx.shardId, event.type, () =>
      callHandler(handler, event.type, ctx, event)
    );
  }

  private async guard(shardId: number, eventType: string, fn: () => Awaitable<void>) {
    try {
      await fn();
    } catch (err) {
      const error = new HandlerError(eventType, shardId, err);
      log.error(error.message, toError(err));
      this.options.diagnostics.emit("handlerError", { shardId, eventType, error });
    }
  }
}
