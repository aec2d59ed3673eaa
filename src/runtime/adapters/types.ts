import type { Update } from "grammy/types";
import type { Platform } from "../types";

/**
 * Serializable subset of a Discord MESSAGE_CREATE event. Carbon event objects
 * hold circular references to the client and guild.
 */
export interface DiscordMessagePayload {
  messageId: string;
  channelId: string;
  guildId?: string;
  authorId: string;
  authorUsername?: string;
  authorBot: boolean;
  content: string;
  timestamp: string;
  attachments: Array<{
    id: string;
    filename: string;
    contentType?: string;
    size: number;
    url: string;
  }>;
  replyToMessageId?: string;
}

export type RawPlatformEvent =
  | { platform: "discord"; receivedAt: Date; message: DiscordMessagePayload }
  | { platform: "telegram"; receivedAt: Date; update: Update };

export type AdapterKind = "active" | "passive";

export type AdapterStatus = "idle" | "connecting" | "connected" | "draining" | "closed";

export interface AdapterContext {
  agentId: string;
  platform: Platform;
  /** Per-call bound on `send` */
  sendTimeoutMs: number;
  /** Bound on releasing platform resources during teardown */
  disconnectTimeoutMs: number;
}

export interface SendReceipt {
  messageId: string;
}

export interface AdapterLiveness {
  alive: boolean;
  detail?: string;
  /** Underlying failure, classified by the supervisor */
  error?: unknown;
}

export type IngestResult = "accepted" | "busy" | "unauthorized" | "not_running" | "invalid";
