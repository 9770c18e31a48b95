import { InteractionType } from "discord-api-types/v10";
import { Collector } from "../src/collector/collector";
import {
  awaitComponent,
  awaitModal,
  awaitReaction,
  awaitReply,
  collectMessages,
} from "../src/collector/helpers";
import { FullEvent } from "../src/dispatch/full-event";
import { Interaction } from "../src/model/interaction";
import { createContext, messageEvent } from "./helpers/context";
import { useGatewayTimers } from "./helpers/fake-transport";

const interactionEvent = (fields: Partial<Interaction> & Pick<Interaction, "type">): FullEvent => ({
  type: "InteractionCreate",
  interaction: { id: "1", application_id: "2", token: "test-token", ...fields },
});

describe("Collector", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  test("rejects a non-positive event limit", () => {
    expect(() => new Collector({ filter: () => 1, maxEvents: 0 })).toThrow(RangeError);
  });

  test("only sees events decoded after it was added", async () => {
    const { collectors, messenger } = createContext();
    const early = collectors.stamp();
    const collector = collectMessages(messenger, { channelId: "20", maxEvents: 1 });

    collectors.offer(messageEvent("1", "20"), early);
    collectors.offer(messageEvent("2", "20"), collectors.stamp());

    expect((await collector.collect()).map((message) => message.id)).toEqual(["2"]);
  });

  test("stops after the event limit and unregisters", async () => {
    const { collectors, messenger } = createContext();
    const collector = collectMessages(messenger, { channelId: "20", maxEvents: 2 });

    for (const id of ["1", "2", "3"]) {
      collectors.offer(messageEvent(id, "20"), collectors.stamp());
    }

    expect((await collector.collect()).map((message) => message.id)).toEqual(["1", "2"]);
    expect(collector.stopped).toBe(true);
    expect(collectors.size).toBe(0);
  });

  test("filters by channel and author", async () => {
    const { collectors, messenger } = createContext();
    const collector = collectMessages(messenger, { channelId: "20", authorId: "300", maxEvents: 1 });

    collectors.offer(messageEvent("1", "21", "300"), collectors.stamp());
    collectors.offer(messageEvent("2", "20", "200"), collectors.stamp());
    collectors.offer(messageEvent("3", "20", "300"), collectors.stamp());

    expect((await collector.first())?.id).toBe("3");
  });

  test("yields what it collected before the timeout", async () => {
    useGatewayTimers();
    const { collectors, messenger } = createContext();
    const collector = collectMessages(messenger, { channelId: "20", timeoutMs: 1_000 });
    const values = collector.collect();

    collectors.offer(messageEvent("1", "20"), collectors.stamp());
    jest.advanceTimersByTime(1_000);

    expect((await values).map((message) => message.id)).toEqual(["1"]);
    expect(collectors.size).toBe(0);
  });

  test("drops a collector whose filter throws", () => {
    const { collectors, messenger } = createContext();
    const collector = messenger.addCollector(
      new Collector({
        filter: () => {
          throw new Error("bad filter");
        },
      })
    );

    collectors.offer(messageEvent("1", "20"), collectors.stamp());
    expect(collector.stopped).toBe(true);
    expect(collectors.size).toBe(0);
  });

  test("stops every collector when the registry is cleared", async () => {
    const { collectors, messenger } = createContext();
    const collector = collectMessages(messenger, { channelId: "20" });

    collectors.clear();
    await expect(collector.next()).resolves.toBeUndefined();
  });
});

describe("collector helpers", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  test("awaitReply resolves with the next matching message", async () => {
    const { collectors, messenger } = createContext();
    const reply = awaitReply(messenger, { channelId: "20", authorId: "300" });

    collectors.offer(messageEvent("1", "20", "300"), collectors.stamp());
    expect((await reply)?.id).toBe("1");
  });

  test("awaitReply resolves with undefined on timeout", async () => {
    useGatewayTimers();
    const { messenger } = createContext();
    const reply = awaitReply(messenger, { channelId: "20", timeoutMs: 500 });

    jest.advanceTimersByTime(500);
    await expect(reply).resolves.toBeUndefined();
  });

  test("awaitReaction matches the message and user", async () => {
    const { collectors, messenger } = createContext();
    const reaction = awaitReaction(messenger, { messageId: "10", userId: "300" });
    const event = (userId: string): FullEvent => ({
      type: "MessageReactionAdd",
      reaction: { user_id: userId, channel_id: "20", message_id: "10", emoji: { name: "thumbsup" } },
    });

    collectors.offer(event("200"), collectors.stamp());
    collectors.offer(event("300"), collectors.stamp());
    expect((await reaction)?.user_id).toBe("300");
  });

  test("awaitComponent matches the custom id", async () => {
    const { collectors, messenger } = createContext();
    const component = awaitComponent(messenger, { messageId: "10", customId: "confirm" });

    collectors.offer(
      interactionEvent({
        type: InteractionType.MessageComponent,
        message: { id: "10" },
        data: { custom_id: "cancel" },
      }),
      collectors.stamp()
    );
    collectors.offer(
      interactionEvent({
        id: "5",
        type: InteractionType.MessageComponent,
        message: { id: "10" },
        data: { custom_id: "confirm" },
      }),
      collectors.stamp()
    );

    expect((await component)?.id).toBe("5");
  });

  test("awaitModal ignores submissions by other users", async () => {
    const { collectors, messenger } = createContext();
    const modal = awaitModal(messenger, { customId: "feedback", userId: "300" });

    collectors.offer(
      interactionEvent({
        type: InteractionType.ModalSubmit,
        user: { id: "200", username: "user-200" },
        data: { custom_id: "feedback" },
      }),
      collectors.stamp()
    );
    collectors.offer(
      interactionEvent({
        id: "6",
        type: InteractionType.ModalSubmit,
        member: { user: { id: "300", username: "user-300" }, roles: [] },
        data: { custom_id: "feedback" },
      }),
      collectors.stamp()
    );

    expect((await modal)?.id).toBe("6");
  });
});
