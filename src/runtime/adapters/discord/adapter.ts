import { Client, MessageCreateListener, ReadyListener } from "@buape/carbon";
import { GatewayIntents, GatewayPlugin } from "@buape/carbon/gateway";
import { Routes, type APIAttachment } from "discord-api-types/v10";
import type { EventEmitter } from "node:events";
import { logger } from "../../../logger";
import { abortReason, createDeferred, type Deferred } from "../../core/async";
import { classifyError } from "../../error-classify";
import { CredentialInvalidError, TransientNetworkError } from "../../errors";
import type { BindingCredentials } from "../../types";
import { ActiveAdapter } from "../adapter";
import { parseDiscordCredentials } from "../credentials";
import type { AdapterLiveness, DiscordMessagePayload, SendReceipt } from "../types";

const DISCORD_API_BASE = "https://discord.com/api/v10";
const MAX_GATEWAY_RECONNECT_ATTEMPTS = 5;
const GAVE_UP_RE = /max(imum)?\s+reconnect|reconnect\s+attempts/i;

type CarbonMessageCreateEvent = Parameters<MessageCreateListener["handle"]>[0];
type CarbonReadyEvent = Parameters<ReadyListener["handle"]>[0];

type ReadyOutcome = { tag: string } | { error: unknown };

class CarbonReadyBridge extends ReadyListener {
  constructor(private readonly onReady: (data: CarbonReadyEvent) => void) {
    super();
  }

  async handle(data: CarbonReadyEvent, _client: Client): Promise<void> {
    this.onReady(data);
  }
}

class CarbonMessageBridge extends MessageCreateListener {
  constructor(private readonly onMessage: (data: CarbonMessageCreateEvent) => void) {
    super();
  }

  async handle(data: CarbonMessageCreateEvent, _client: Client): Promise<void> {
    this.onMessage(data);
  }
}

/**
 * Discord bot connection over the carbon gateway plugin. Carbon reconnects a
 * dropped socket on its own a few times; once it gives up, or the gateway
 * rejects the token, the loss is recorded and surfaced by the next probe.
 */
export class DiscordAdapter extends ActiveAdapter {
  private client: Client | null = null;
  private gateway: GatewayPlugin | null = null;
  private gatewayEmitter: EventEmitter | undefined;
  private readonly onGatewayError = (err: unknown) => {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.error(
      { err: error, agentId: this.agentId, platform: this.platform },
      "Discord gateway error",
    );
    this.pendingReady?.resolve({ error });
    if (this.isConnected() && (classifyError(error).permanent || GAVE_UP_RE.test(error.message))) {
      this.markConnectionLost(error.message, error);
    }
  };
  private pendingReady: Deferred<ReadyOutcome> | null = null;

  protected async open(signal: AbortSignal, credentials: BindingCredentials): Promise<void> {
    const { botToken } = parseDiscordCredentials(credentials);
    const applicationId = await fetchApplicationId(botToken, signal);
    if (signal.aborted) {
      throw abortReason(signal);
    }

    const ready = createDeferred<ReadyOutcome>();
    this.pendingReady = ready;
    const onAbort = () => ready.resolve({ error: abortReason(signal) });
    signal.addEventListener("abort", onAbort, { once: true });

    const listeners = [
      new CarbonReadyBridge((event) => {
        ready.resolve({ tag: formatUserTag(event.user?.username, event.user?.discriminator) });
      }),
      new CarbonMessageBridge((event) => {
        this.handleMessage(event);
      }),
    ];

    const gateway = new GatewayPlugin({
      intents:
        GatewayIntents.Guilds |
        GatewayIntents.GuildMessages |
        GatewayIntents.MessageContent |
        GatewayIntents.DirectMessages,
      reconnect: { maxAttempts: MAX_GATEWAY_RECONNECT_ATTEMPTS },
    });

    this.gateway = gateway;
    this.gatewayEmitter = getGatewayEmitter(gateway);
    this.gatewayEmitter?.on("error", this.onGatewayError);

    this.client = new Client(
      {
        baseUrl: "http://localhost",
        clientId: applicationId,
        publicKey: "unused",
        token: botToken,
        disableDeployRoute: true,
        disableEventsRoute: true,
        disableInteractionsRoute: true,
      },
      { listeners },
      [gateway],
    );

    try {
      const outcome = await ready.promise;
      if ("error" in outcome) {
        throw outcome.error;
      }
      logger.info(
        { agentId: this.agentId, platform: this.platform, botTag: outcome.tag },
        "Discord bot ready",
      );
    } finally {
      this.pendingReady = null;
      signal.removeEventListener("abort", onAbort);
    }
  }

  protected async checkSocket(_signal: AbortSignal): Promise<AdapterLiveness> {
    const gateway = this.gateway;
    if (!gateway) {
      return { alive: false, detail: "gateway not attached" };
    }
    if ("isConnected" in gateway && gateway.isConnected === false) {
      return { alive: false, detail: "gateway socket is not connected" };
    }
    return { alive: true };
  }

  protected async deliver(
    externalChatId: string,
    content: string,
    _signal: AbortSignal,
  ): Promise<SendReceipt> {
    if (!this.client) {
      throw new TransientNetworkError("Discord client is not connected");
    }
    const sent = (await this.client.rest.post(Routes.channelMessages(externalChatId), {
      body: { content },
    })) as { id?: string };
    return { messageId: sent.id ?? "unknown" };
  }

  protected async teardown(_signal: AbortSignal): Promise<void> {
    const gateway = this.gateway;
    this.gatewayEmitter?.removeListener("error", this.onGatewayError);
    this.gatewayEmitter = undefined;
    this.gateway = null;
    this.client = null;
    if (!gateway) {
      return;
    }
    const reconnectOptions = (
      gateway as unknown as { options?: { reconnect?: { maxAttempts: number } } }
    ).options;
    if (reconnectOptions) {
      reconnectOptions.reconnect = { maxAttempts: 0 };
    }
    gateway.disconnect();
    logger.info({ agentId: this.agentId, platform: this.platform }, "Discord bot disconnected");
  }

  private handleMessage(event: CarbonMessageCreateEvent): void {
    const author = event.author;
    const msg = event.message;
    if (!author) {
      return;
    }

    const message: DiscordMessagePayload = {
      messageId: msg.id,
      channelId: msg.channelId,
      guildId: event.guild_id ?? event.guild?.id,
      authorId: author.id,
      authorUsername: author.username,
      authorBot: Boolean(author.bot),
      content: msg.content,
      timestamp: msg.timestamp,
      attachments: (msg.attachments ?? []).map((att: APIAttachment) => ({
        id: att.id,
        filename: att.filename,
        contentType: att.content_type,
        size: att.size,
        url: att.url,
      })),
      replyToMessageId: msg.messageReference?.message_id,
    };

    this.emitEvent({ platform: "discord", receivedAt: new Date(), message });
  }
}

function formatUserTag(username: string | undefined, discriminator: string | undefined): string {
  const safeName = username?.trim() || "unknown";
  if (!discriminator || discriminator === "0") {
    return safeName;
  }
  return `${safeName}#${discriminator}`;
}

function getGatewayEmitter(gateway: GatewayPlugin): EventEmitter | undefined {
  return (gateway as unknown as { emitter?: EventEmitter }).emitter;
}

async function fetchApplicationId(token: string, signal: AbortSignal): Promise<string> {
  let response: Response;
  try {
    response = await fetch(`${DISCORD_API_BASE}/oauth2/applications/@me`, {
      headers: {
        Authorization: `Bot ${token}`,
      },
      signal,
    });
  } catch (err) {
    if (signal.aborted) {
      throw abortReason(signal);
    }
    throw new TransientNetworkError("Discord API /oauth2/applications/@me unreachable", {
      cause: err,
    });
  }

  if (response.status === 401 || response.status === 403) {
    throw new CredentialInvalidError(`Discord rejected the bot token (${response.status})`);
  }
  if (!response.ok) {
    throw new TransientNetworkError(
      `Discord API /oauth2/applications/@me failed (${response.status})`,
      { status: response.status },
    );
  }

  const data = (await response.json()) as { id?: string };
  if (!data.id) {
    throw new TransientNetworkError("Discord API returned no application id");
  }

  return data.id;
}
