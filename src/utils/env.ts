import dotenv from "dotenv";
import { Infer, v } from "./validator";

const numeric = () => v.string().numeric().optional();

export const envSchema = v.object({
  BOT_TOKEN: v.string().isNotEmpty(),
  /** Decimal gateway intents bitfield */
  INTENTS: numeric(),
  TOTAL_SHARDS: numeric(),
  MAX_MESSAGES: numeric(),
  LARGE_THRESHOLD: numeric(),
  GATEWAY_COMPRESSION: v.enum(["none", "zlib-stream"] as const).optional(),
  AUDIT_LOG_CHANNEL: v.string().numeric().optional(),
  LOG_LEVEL: v.enum(["debug", "info", "init", "ready", "warn", "error"] as const).optional(),
  NODE_ENV: v.string().optional(),
});

export type Env = Infer<typeof envSchema>;

/** Loads `.env` into `process.env` and validates it */
export const loadEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  dotenv.config();
  return envSchema.parse(source);
};
