import { APIEmbedField, RESTPostAPIChannelMessageJSONBody } from "discord-api-types/v10";
import { Diagnostics, DiagnosticsEventsMap } from "../diagnostics";
import { Snowflake } from "../model/snowflake";
import { RestClient } from "../rest/rest-client";
import { GatewayErrorKind, toError } from "./errors";
import { logger } from "./logger";

export enum AuditLogLevel {
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
  CRITICAL = "critical",
}

interface AuditLogEntry {
  level: AuditLogLevel;
  title: string;
  description: string;
  fields?: APIEmbedField[];
  timestamp?: string;
}

const MAX_DESCRIPTION = 4096;
const MAX_FIELD_VALUE = 1024;

const truncate = (text: string, max: number) =>
  text.length > max ? text.substring(0, max - 3) + "..." : text;

const log = logger.scope("Audit Log");

/** Posts embeds describing gateway failures to a Discord channel */
export class AuditLogService {
  constructor(
    private readonly rest: Pick<RestClient, "createMessage">,
    private readonly channelId: Snowflake
  ) {}

  private getColor(level: AuditLogLevel): number {
    switch (level) {
      case AuditLogLevel.INFO:
        return 0x3498db; // Blue
      case AuditLogLevel.WARN:
        return 0xf39c12; // Orange
      case AuditLogLevel.ERROR:
        return 0xe74c3c; // Red
      case AuditLogLevel.CRITICAL:
        return 0x8e44ad; // Purple
    }
  }

  private async sendToChannel(entry: AuditLogEntry): Promise<void> {
    try {
      const payload: RESTPostAPIChannelMessageJSONBody = {
        embeds: [
          {
            title: entry.title,
            description: truncate(entry.description, MAX_DESCRIPTION),
            color: this.getColor(entry.level),
            timestamp: entry.timestamp ?? new Date().toISOString(),
            fields: entry.fields ?? [],
            footer: {
              text: `Level: ${entry.level.toUpperCase()}`,
            },
          },
        ],
      };

      await this.rest.createMessage(this.channelId, payload);
      log.debug(`Audit log sent: ${entry.level} - ${entry.title}`);
    } catch (error) {
      log.error("Failed to send audit log:", toError(error).message);
    }
  }

  async info(title: string, description: string, fields?: APIEmbedField[]) {
    await this.sendToChannel({ level: AuditLogLevel.INFO, title, description, fields });
  }

  async warn(title: string, description: string, fields?: APIEmbedField[]) {
    await this.sendToChannel({ level: AuditLogLevel.WARN, title, description, fields });
  }

  async error(error: Error, context?: string) {
    const fields: APIEmbedField[] = [
      { name: "Error Type", value: error.name, inline: true },
      {
        name: "Stack Trace",
        value: truncate(error.stack ?? "N/A", MAX_FIELD_VALUE),
        inline: false,
      },
    ];

    if (context) {
      fields.unshift({ name: "Context", value: context, inline: true });
    }

    await this.sendToChannel({
      level: AuditLogLevel.ERROR,
      title: "Application Error",
      description: error.message || "Unknown error occurred",
      fields,
    });
  }

  async critical(title: string, description: string, fields?: APIEmbedField[]) {
    await this.sendToChannel({ level: AuditLogLevel.CRITICAL, title, description, fields });
  }

  /** Reports fatal shard errors and handler failures; returns a detach function */
  attach(diagnostics: Diagnostics): () => void {
    const fatal = ({ shardId, error }: DiagnosticsEventsMap["fatal"][0]) => {
      const title =
        error.kind === GatewayErrorKind.ReconnectExhausted
          ? `Shard ${shardId} gave up reconnecting`
          : `Shard ${shardId} stopped`;
      const fields: APIEmbedField[] = [{ name: "Kind", value: error.kind, inline: true }];
      if (error.code !== undefined) {
        fields.push({ name: "Close Code", value: String(error.code), inline: true });
      }
      void this.critical(title, error.message, fields);
    };
    const handlerError = ({
      shardId,
      eventType,
      error,
    }: DiagnosticsEventsMap["handlerError"][0]) => {
      void this.error(error, `Shard ${shardId} - ${eventType} handler`);
    };

    diagnostics.on("fatal", fatal);
    diagnostics.on("handlerError", handlerError);
    return () => {
      diagnostics.off("fatal", fatal);
      diagnostics.off("handlerError", handlerError);
    };
  }
}
