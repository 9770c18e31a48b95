import { RESTPostAPIChannelMessageJSONBody } from "discord-api-types/v10";
import { Snowflake } from "../model/snowflake";
import { RestError } from "../utils/errors";
import { logger } from "../utils/logger";
import { Infer, v } from "../utils/validator";

const ApiVersion = "v10";

const gatewayBotSchema = v.object({
  url: v.string().url(),
  shards: v.number().integer().min(1),
  session_start_limit: v.object({
    total: v.number().integer(),
    remaining: v.number().integer(),
    reset_after: v.number(),
    max_concurrency: v.number().integer().min(1),
  }),
});

export type GatewayBot = Infer<typeof gatewayBotSchema>;

/** The only REST call the gateway core depends on */
export interface GatewayBotProvider {
  getGatewayBot(): Promise<GatewayBot>;
}

const retryAfterSchema = v.object({ retry_after: v.number() });

export class RestClient implements GatewayBotProvider {
  /** Base url for Discord API */
  readonly baseUrl = `https://discord.com/api/${ApiVersion}`;

  constructor(private readonly token: string) {}

  /** Reusable fetch init since every request in this class uses the same headers */
  private async request(
    method: "GET" | "POST",
    path: string,
    body?: unknown
  ): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bot ${this.token}`,
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    logger.debug(`${method} ${path} responded with ${response.status}`);

    if (!response.ok) {
      let retryAfter: number | undefined;
      if (response.status === 429) {
        retryAfter = retryAfterSchema.safeParse(await response.json())?.retry_after;
      }
      throw new RestError(
        `HTTP ${response.status}: ${response.statusText} (${method} ${path})`,
        response.status,
        retryAfter
      );
    }

    return response.status === 204 ? undefined : response.json();
  }

  /** https://discord.com/developers/docs/topics/gateway#get-gateway-bot */
  async getGatewayBot(): Promise<GatewayBot> {
    return gatewayBotSchema.parse(await this.request("GET", "/gateway/bot"));
  }

  async createMessage(
    channelId: Snowflake,
    body: RESTPostAPIChannelMessageJSONBody
  ): Promise<unknown> {
    return this.request("POST", `/channels/${channelId}/messages`, body);
  }
}
