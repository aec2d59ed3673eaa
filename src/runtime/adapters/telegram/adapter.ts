import { Bot, GrammyError } from "grammy";
import type { Update } from "grammy/types";
import { logger } from "../../../logger";
import { CredentialInvalidError, MisconfiguredError, TransientNetworkError } from "../../errors";
import type { BindingCredentials } from "../../types";
import { PassiveAdapter } from "../adapter";
import { parseTelegramCredentials } from "../credentials";
import type { AdapterContext, AdapterLiveness, RawPlatformEvent, SendReceipt } from "../types";

const ALLOWED_UPDATES = ["message", "channel_post"] as const;

export interface TelegramAdapterOptions {
  /** Public origin Telegram posts updates to, without trailing slash */
  publicBaseUrl?: string;
}

export function telegramWebhookUrl(publicBaseUrl: string, agentId: string): string {
  return `${publicBaseUrl}/webhook/telegram/${encodeURIComponent(agentId)}`;
}

export function isTelegramUpdate(value: unknown): value is Update {
  return (
    typeof value === "object" &&
    value !== null &&
    "update_id" in value &&
    typeof value.update_id === "number"
  );
}

/**
 * Telegram bot bound through a webhook. Connecting validates the token and
 * registers the webhook with a fresh secret; updates arrive through `ingest`.
 */
export class TelegramAdapter extends PassiveAdapter {
  private bot: Bot | null = null;
  private webhookUrl: string | null = null;
  private botUsername: string | null = null;

  constructor(
    context: AdapterContext,
    private readonly options: TelegramAdapterOptions = {},
  ) {
    super(context);
  }

  protected async open(signal: AbortSignal, credentials: BindingCredentials): Promise<void> {
    const { botToken } = parseTelegramCredentials(credentials);
    if (!this.options.publicBaseUrl) {
      throw new MisconfiguredError("server.publicBaseUrl is required to register Telegram webhooks");
    }

    const bot = new Bot(botToken);
    this.bot = bot;

    try {
      const me = await bot.api.getMe(signal);
      this.botUsername = me.username?.trim().toLowerCase() || null;
    } catch (err) {
      // Telegram answers 404 for tokens it cannot parse and 401 for revoked ones.
      if (err instanceof GrammyError && (err.error_code === 401 || err.error_code === 404)) {
        throw new CredentialInvalidError(`Telegram rejected the bot token (${err.error_code})`, {
          cause: err,
        });
      }
      throw err;
    }

    const url = telegramWebhookUrl(this.options.publicBaseUrl, this.agentId);
    const secret = this.issueSecret();
    await bot.api.setWebhook(
      url,
      { secret_token: secret, allowed_updates: [...ALLOWED_UPDATES] },
      signal,
    );
    this.webhookUrl = url;
    logger.info(
      { agentId: this.agentId, platform: this.platform, botUsername: this.botUsername },
      "Telegram webhook registered",
    );
  }

  protected toRawEvent(payload: unknown): RawPlatformEvent | null {
    if (!isTelegramUpdate(payload)) {
      return null;
    }
    return { platform: "telegram", receivedAt: new Date(), update: payload };
  }

  /** Alive while Telegram still posts to this connection's webhook URL. */
  protected async checkLiveness(signal: AbortSignal): Promise<AdapterLiveness> {
    if (!this.bot || !this.webhookUrl) {
      return { alive: false, detail: "webhook not registered" };
    }
    const info = await this.bot.api.getWebhookInfo(signal);
    if (info.url !== this.webhookUrl) {
      return {
        alive: false,
        detail: info.url ? "webhook superseded by another registration" : "webhook removed",
      };
    }
    return { alive: true, detail: info.last_error_message };
  }

  protected async deliver(
    externalChatId: string,
    content: string,
    signal: AbortSignal,
  ): Promise<SendReceipt> {
    if (!this.bot) {
      throw new TransientNetworkError("Telegram bot is not connected");
    }
    const sent = await this.bot.api.sendMessage(externalChatId, content, {}, signal);
    return { messageId: sent.message_id.toString() };
  }

  protected async teardown(signal: AbortSignal): Promise<void> {
    const bot = this.bot;
    const registered = this.webhookUrl;
    this.revokeSecret();
    this.bot = null;
    this.webhookUrl = null;
    if (!bot || !registered) {
      return;
    }
    // Only remove the webhook if nobody re-pointed it in the meantime.
    const info = await bot.api.getWebhookInfo(signal);
    if (info.url === registered) {
      await bot.api.deleteWebhook({ drop_pending_updates: false }, signal);
    }
    logger.info({ agentId: this.agentId, platform: this.platform }, "Telegram webhook released");
  }
}
