namespace NodeJS {
  interface ProcessEnv {
    NODE_ENV?: string;
    BOT_TOKEN?: string;
    INTENTS?: string;
    TOTAL_SHARDS?: string;
    MAX_MESSAGES?: string;
    LARGE_THRESHOLD?: string;
    GATEWAY_COMPRESSION?: string;
    AUDIT_LOG_CHANNEL?: string;
    LOG_LEVEL?: string;
    DISABLE_LOGGING?: string;
  }
}
