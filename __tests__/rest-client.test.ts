import { RestClient } from "../src/rest/rest-client";
import { RestError } from "../src/utils/errors";
import { gatewayBot } from "./helpers/fixtures";

global.fetch = jest.fn();

const respond = (status: number, body: unknown, statusText = "OK") =>
  new Response(status === 204 ? null : JSON.stringify(body), { status, statusText });

describe("RestClient", () => {
  const mockFetch = jest.mocked(fetch);
  const rest = new RestClient("test-secret");

  beforeEach(() => {
    mockFetch.mockReset();
  });

  test("fetches the recommended gateway settings", async () => {
    mockFetch.mockResolvedValue(respond(200, gatewayBot(4, 2)));

    await expect(rest.getGatewayBot()).resolves.toEqual(gatewayBot(4, 2));
    expect(mockFetch).toHaveBeenCalledWith(
      "https://discord.com/api/v10/gateway/bot",
      expect.objectContaining({
        method: "GET",
        headers: {
          "Content-Type": "application/json",
          Authorization: "Bot test-secret",
        },
      })
    );
  });

  test("rejects a malformed gateway response", async () => {
    mockFetch.mockResolvedValue(respond(200, { url: "wss://gateway.test", shards: 0 }));
    await expect(rest.getGatewayBot()).rejects.toThrow("shards: `0` must be at least 1");
  });

  test("posts a message body", async () => {
    mockFetch.mockResolvedValue(respond(200, { id: "1" }));

    await rest.createMessage("123", { content: "hello" });
    expect(mockFetch).toHaveBeenCalledWith(
      "https://discord.com/api/v10/channels/123/messages",
      expect.objectContaining({ method: "POST", body: '{"content":"hello"}' })
    );
  });

  test("reports the retry delay of a rate limited request", async () => {
    mockFetch.mockResolvedValue(respond(429, { retry_after: 1.5 }, "Too Many Requests"));

    const error = await rest.getGatewayBot().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RestError);
    expect(error).toMatchObject({ status: 429, retryAfter: 1.5 });
  });

  test("throws on other failures", async () => {
    mockFetch.mockResolvedValue(respond(401, { message: "401: Unauthorized" }, "Unauthorized"));
    await expect(rest.getGatewayBot()).rejects.toThrow(
      "HTTP 401: Unauthorized (GET /gateway/bot)"
    );
  });
});
