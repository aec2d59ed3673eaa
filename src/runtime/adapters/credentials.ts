import { CredentialInvalidError } from "../errors";
import type { BindingCredentials } from "../types";

const TELEGRAM_TOKEN_RE = /^\d+:[A-Za-z0-9_-]{35,}$/;

function readBotToken(credentials: BindingCredentials, platform: string): string {
  const raw = credentials.botToken;
  if (typeof raw !== "string" || !raw.trim()) {
    throw new CredentialInvalidError(`${platform} credentials are missing botToken`);
  }
  return raw.trim();
}

export function normalizeDiscordToken(raw: string): string {
  return raw.trim().replace(/^Bot\s+/i, "");
}

export function parseDiscordCredentials(credentials: BindingCredentials): { botToken: string } {
  const botToken = normalizeDiscordToken(readBotToken(credentials, "discord"));
  if (!botToken || /\s/.test(botToken)) {
    throw new CredentialInvalidError("discord botToken is malformed");
  }
  return { botToken };
}

export function parseTelegramCredentials(credentials: BindingCredentials): { botToken: string } {
  const botToken = readBotToken(credentials, "telegram");
  if (!TELEGRAM_TOKEN_RE.test(botToken)) {
    throw new CredentialInvalidError("telegram botToken is malformed");
  }
  return { botToken };
}
