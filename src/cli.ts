#!/usr/bin/env node
import { Client } from "./client";
import { configFromEnv } from "./config";
import { EventHandler } from "./dispatch/handler";
import { toError } from "./utils/errors";
import { logger } from "./utils/logger";

const handler: EventHandler = {
  Ready: (ctx, { ready }) => {
    logger.ready(`Shard ${ctx.shardId} logged in as ${ready.user.username}`);
  },
  ShardsReady: (_ctx, { totalShards }) => {
    logger.ready(`All ${totalShards} shards connected`);
  },
  CacheReady: (_ctx, { guilds }) => {
    logger.ready(`Cache ready with ${guilds.length} guilds`);
  },
  GuildCreate: (ctx, { guild, isNew }) => {
    if (isNew) logger.info(`Joined guild ${guild.name} on shard ${ctx.shardId}`);
  },
  GuildDelete: (_ctx, { guild, removed }) => {
    if (!guild.unavailable) logger.info(`Left guild ${removed?.name ?? guild.id}`);
  },
  ShardStageUpdate: (_ctx, event) => {
    logger.debug(`Shard ${event.shardId}: ${event.old} -> ${event.new}`);
  },
};

logger.init("Initializing gateway client...");

const client = new Client(configFromEnv({ eventHandler: handler }));
let shuttingDown = false;

const gracefulShutdown = async (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.init(`Received ${signal}, shutting down gracefully...`);

  try {
    await client.auditLog?.info("Client Shutdown", `Shutting down due to ${signal}`);
    await client.shutdown();
    process.exit(0);
  } catch (error) {
    logger.error("Error during graceful shutdown:", toError(error));
    process.exit(1);
  }
};

client
  .start()
  .then(() => client.auditLog?.info("Client Started", `Connected ${client.shards.total} shards`))
  .catch(async (error) => {
    logger.error("Failed to start:", toError(error));
    await gracefulShutdown("startup failure");
  });

process.on("uncaughtException", async (error) => {
  logger.error("Uncaught Exception:", error.stack ?? error.message);
  await client.auditLog?.error(error, "Process - uncaughtException");
  await gracefulShutdown("uncaughtException");
});

process.on("unhandledRejection", async (reason) => {
  const error = toError(reason);
  logger.error("Unhandled Promise Rejection:", error.stack ?? error.message);
  await client.auditLog?.error(error, "Process - unhandledRejection");
  await gracefulShutdown("unhandledRejection");
});

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

process.on("exit", (code) => {
  logger.init(`Process exiting with code ${code}`);
});
