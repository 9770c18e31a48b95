import { EventEmitter } from "node:events";
import { CacheWarning } from "./cache/store";
import { ShardStage } from "./gateway/protocol";
import { GatewayError, HandlerError } from "./utils/errors";

export type DropReason = "invalidSession" | "shutdown" | "overflow" | "fatal";

export type DiagnosticsEventsMap = {
  transport: [payload: { shardId: number; error: Error }];
  protocol: [payload: { shardId: number; error: Error }];
  fatal: [payload: { shardId: number; error: GatewayError }];
  stage: [payload: { shardId: number; old: ShardStage; new: ShardStage }];
  /** An inbound event or outbound command that was never delivered */
  dropped: [payload: { shardId: number; name: string; reason: DropReason }];
  handlerError: [payload: { shardId: number; eventType: string; error: HandlerError }];
  cacheWarning: [warning: CacheWarning];
  heartbeat: [payload: { shardId: number; latency: number }];
};

/**
 * Transport and protocol problems never reach event handlers; they are
 * published here instead.
 */
export class Diagnostics extends EventEmitter<DiagnosticsEventsMap> {}
