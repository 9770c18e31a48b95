import { decodeEvent } from "../src/events/decoder";
import { ValidationError } from "../src/utils/errors";
import {
  channelPayload,
  guildPayload,
  memberPayload,
  messagePayload,
  rolePayload,
} from "./helpers/fixtures";

describe("decodeEvent", () => {
  test("decodes a message", () => {
    const event = decodeEvent("MESSAGE_CREATE", messagePayload("10", "20", { content: "hi" }));
    expect(event.type).toBe("MessageCreate");
    if (event.type !== "MessageCreate") return;
    expect(event.message.content).toBe("hi");
    expect(event.message.author.id).toBe("200");
  });

  test("fills in the guild id of nested guild entities", () => {
    const event = decodeEvent(
      "GUILD_CREATE",
      guildPayload("111", {
        channels: [channelPayload("30")],
        members: [memberPayload("40")],
        roles: [rolePayload("111", "@everyone"), rolePayload("50")],
      })
    );
    if (event.type !== "GuildCreate") throw new Error(`unexpected ${event.type}`);

    expect(event.guild.channels.map((channel) => channel.guild_id)).toEqual(["111"]);
    expect(event.guild.members.map((member) => member.guild_id)).toEqual(["111"]);
    expect(event.guild.roles.map((role) => [role.id, role.guild_id])).toEqual([
      ["111", "111"],
      ["50", "111"],
    ]);
  });

  test("moves guild_id onto role payloads", () => {
    expect(
      decodeEvent("GUILD_ROLE_UPDATE", { guild_id: "111", role: rolePayload("50", "mods") })
    ).toEqual({
      type: "GuildRoleUpdate",
      role: { id: "50", name: "mods", position: 0, guild_id: "111" },
    });
  });

  test("flattens delete payloads", () => {
    expect(decodeEvent("MESSAGE_DELETE", { id: "10", channel_id: "20" })).toEqual({
      type: "MessageDelete",
      channelId: "20",
      messageId: "10",
      guildId: undefined,
    });
    expect(decodeEvent("GUILD_ROLE_DELETE", { guild_id: "111", role_id: "50" })).toEqual({
      type: "GuildRoleDelete",
      guildId: "111",
      roleId: "50",
    });
  });

  test("keeps unknown events with their raw payload", () => {
    expect(decodeEvent("SOMETHING_NEW", { a: 1 })).toEqual({
      type: "Unknown",
      name: "SOMETHING_NEW",
      raw: { a: 1 },
    });
  });

  test("rejects a known event with a malformed payload", () => {
    expect(() => decodeEvent("MESSAGE_CREATE", { id: "10" })).toThrow(ValidationError);
  });

  test("reports the path of the malformed field", () => {
    expect(() =>
      decodeEvent("MESSAGE_CREATE", { ...messagePayload("10", "20"), author: { id: "x", username: "a" } })
    ).toThrow("author.id: `x` is not a snowflake");
  });
});
