import type { Message } from "grammy/types";
import type { DiscordMessagePayload, RawPlatformEvent } from "../adapters/types";
import type { ConnectionSource } from "../supervisor/supervisor";
import { type Attachment, type AttachmentKind, type MessageEnvelope, createEnvelope } from "../types";

export type DropReason = "bot_author" | "empty" | "unsupported" | "duplicate" | "router_closed";

export type NormalizeResult =
  | { ok: true; envelope: MessageEnvelope }
  | { ok: false; reason: DropReason };

export function normalizeEvent(source: ConnectionSource, event: RawPlatformEvent): NormalizeResult {
  switch (event.platform) {
    case "discord":
      return normalizeDiscord(source, event.message);
    case "telegram": {
      const msg = event.update.message ?? event.update.channel_post;
      if (!msg) {
        return { ok: false, reason: "unsupported" };
      }
      return normalizeTelegram(source, msg);
    }
  }
}

function normalizeDiscord(source: ConnectionSource, msg: DiscordMessagePayload): NormalizeResult {
  if (msg.authorBot) {
    return { ok: false, reason: "bot_author" };
  }
  const attachments: Attachment[] = msg.attachments.map((att) => ({
    kind: attachmentKind(att.contentType),
    url: att.url,
    filename: att.filename,
    mimeType: att.contentType,
    byteSize: att.size,
  }));
  if (!msg.content.trim() && attachments.length === 0) {
    return { ok: false, reason: "empty" };
  }
  const timestamp = new Date(msg.timestamp);
  return {
    ok: true,
    envelope: createEnvelope({
      platform: "discord",
      agentId: source.agentId,
      externalChatId: msg.channelId,
      externalMessageId: msg.messageId,
      senderId: msg.authorId,
      senderName: msg.authorUsername,
      content: msg.content,
      attachments,
      direction: "inbound",
      timestamp: Number.isNaN(timestamp.getTime()) ? new Date() : timestamp,
    }),
  };
}

function normalizeTelegram(source: ConnectionSource, msg: Message): NormalizeResult {
  if (msg.from?.is_bot) {
    return { ok: false, reason: "bot_author" };
  }
  const chatId = msg.chat.id.toString();
  const text = msg.text || msg.caption || "";

  const attachments: Attachment[] = [];
  if (msg.photo && msg.photo.length > 0) {
    const photo = msg.photo[msg.photo.length - 1]; // Largest size
    attachments.push({
      kind: "image",
      fileId: photo.file_id,
      mimeType: "image/jpeg",
      byteSize: photo.file_size,
    });
  }
  if (msg.document) {
    attachments.push({
      kind: "document",
      fileId: msg.document.file_id,
      filename: msg.document.file_name,
      mimeType: msg.document.mime_type,
      byteSize: msg.document.file_size,
    });
  }
  if (msg.voice) {
    attachments.push({
      kind: "voice",
      fileId: msg.voice.file_id,
      mimeType: msg.voice.mime_type,
      byteSize: msg.voice.file_size,
    });
  }
  if (msg.audio) {
    attachments.push({
      kind: "audio",
      fileId: msg.audio.file_id,
      filename: msg.audio.file_name,
      mimeType: msg.audio.mime_type,
      byteSize: msg.audio.file_size,
    });
  }
  if (msg.video) {
    attachments.push({
      kind: "video",
      fileId: msg.video.file_id,
      mimeType: msg.video.mime_type,
      byteSize: msg.video.file_size,
    });
  }

  if (!text.trim() && attachments.length === 0) {
    return { ok: false, reason: "empty" };
  }

  const senderId = msg.from?.id.toString() ?? msg.sender_chat?.id.toString() ?? chatId;
  const senderName =
    [msg.from?.first_name, msg.from?.last_name].filter(Boolean).join(" ") || undefined;

  return {
    ok: true,
    envelope: createEnvelope({
      platform: "telegram",
      agentId: source.agentId,
      externalChatId: chatId,
      // message_id is only unique within a chat
      externalMessageId: `${chatId}:${msg.message_id}`,
      senderId,
      senderName,
      content: text,
      attachments,
      direction: "inbound",
      timestamp: new Date(msg.date * 1000),
    }),
  };
}

function attachmentKind(contentType: string | undefined): AttachmentKind {
  if (!contentType) {
    return "document";
  }
  if (contentType.startsWith("image/")) {
    return "image";
  }
  if (contentType.startsWith("video/")) {
    return "video";
  }
  if (contentType.startsWith("audio/")) {
    return "audio";
  }
  return "document";
}
