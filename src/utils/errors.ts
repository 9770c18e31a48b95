import { GatewayCloseCodes } from "discord-api-types/v10";

export enum GatewayErrorKind {
  TransportFailure = "TransportFailure",
  ProtocolViolation = "ProtocolViolation",
  AuthFailure = "AuthFailure",
  ShardingRequired = "ShardingRequired",
  InvalidShard = "InvalidShard",
  InvalidApiVersion = "InvalidApiVersion",
  SessionInvalidated = "SessionInvalidated",
  ReconnectExhausted = "ReconnectExhausted",
}

const FatalKinds = new Set([
  GatewayErrorKind.AuthFailure,
  GatewayErrorKind.ShardingRequired,
  GatewayErrorKind.InvalidShard,
  GatewayErrorKind.InvalidApiVersion,
  GatewayErrorKind.ReconnectExhausted,
]);

const FatalCloseCodes: ReadonlyMap<number, [GatewayErrorKind, string]> =
  new Map([
    [
      GatewayCloseCodes.AuthenticationFailed,
      [GatewayErrorKind.AuthFailure, "The account token sent with identify is invalid"],
    ],
    [
      GatewayCloseCodes.InvalidShard,
      [GatewayErrorKind.InvalidShard, "An invalid shard was sent when identifying"],
    ],
    [
      GatewayCloseCodes.ShardingRequired,
      [GatewayErrorKind.ShardingRequired, "The session would have handled too many guilds"],
    ],
    [
      GatewayCloseCodes.InvalidAPIVersion,
      [GatewayErrorKind.InvalidApiVersion, "An invalid gateway version was requested"],
    ],
    [
      GatewayCloseCodes.InvalidIntents,
      [GatewayErrorKind.AuthFailure, "An invalid intent bitfield was sent"],
    ],
    [
      GatewayCloseCodes.DisallowedIntents,
      [GatewayErrorKind.AuthFailure, "A privileged intent was requested without being enabled"],
    ],
  ]);

type GatewayErrorOptions = {
  code?: number;
  shardId?: number;
  cause?: unknown;
};

export class GatewayError extends Error {
  readonly code?: number;
  readonly shardId?: number;

  constructor(
    readonly kind: GatewayErrorKind,
    message: string,
    options: GatewayErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "GatewayError";
    this.code = options.code;
    this.shardId = options.shardId;
  }

  get fatal() {
    return FatalKinds.has(this.kind);
  }

  static isFatalCloseCode(code: number) {
    return FatalCloseCodes.has(code);
  }

  /** Maps a close code from the fatal set to its error, `null` for recoverable codes */
  static fromCloseCode(code: number, shardId?: number): GatewayError | null {
    const entry = FatalCloseCodes.get(code);
    if (!entry) return null;
    const [kind, message] = entry;
    return new GatewayError(kind, `${message} (close code ${code})`, {
      code,
      shardId,
    });
  }
}

export class ValidationError extends Error {
  constructor(
    readonly reason: string,
    readonly path: string[] = []
  ) {
    super(path.length ? `${path.join(".")}: ${reason}` : reason);
    this.name = "ValidationError";
  }

  /** Returns `error` with `segment` prepended to its path */
  static at(segment: string, error: unknown): Error {
    if (error instanceof ValidationError) {
      return new ValidationError(error.reason, [segment, ...error.path]);
    }
    return toError(error);
  }
}

export class RestError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly retryAfter?: number
  ) {
    super(message);
    this.name = "RestError";
  }
}

export class HandlerError extends Error {
  constructor(
    readonly eventType: string,
    readonly shardId: number,
    cause: unknown
  ) {
    super(
      `Handler for ${eventType} on shard ${shardId} failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
    this.name = "HandlerError";
  }
}

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
