import { Cache } from "../../src/cache/cache";
import { CollectorRegistry } from "../../src/collector/registry";
import { Diagnostics } from "../../src/diagnostics";
import { FullEvent } from "../../src/dispatch/full-event";
import { Context } from "../../src/dispatch/handler";
import { ShardCommand, ShardMessenger } from "../../src/gateway/shard-messenger";
import { messageSchema } from "../../src/model/message";
import { RestClient } from "../../src/rest/rest-client";
import { Channel } from "../../src/utils/channel";
import { messagePayload } from "./fixtures";

/** A handler context wired to in-memory collaborators */
export const createContext = (options: { cache?: Cache; mailboxCapacity?: number } = {}) => {
  const diagnostics = new Diagnostics();
  const collectors = new CollectorRegistry();
  const mailbox = new Channel<ShardCommand>(options.mailboxCapacity);
  const messenger = new ShardMessenger(0, mailbox, collectors, diagnostics);
  const ctx: Context = {
    shardId: 0,
    cache: options.cache ?? new Cache(),
    rest: new RestClient("test-secret"),
    messenger,
  };
  return { ctx, diagnostics, collectors, mailbox, messenger };
};

export const messageEvent = (
  id: string,
  channelId: string,
  authorId = "200"
): FullEvent => ({
  type: "MessageCreate",
  message: messageSchema.parse(messagePayload(id, channelId, { authorId })),
});
