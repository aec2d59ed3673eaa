import type { RelayErrorKind } from "./errors";

export const PLATFORMS = ["discord", "telegram"] as const;
export type Platform = (typeof PLATFORMS)[number];

export type DesiredState = "enabled" | "disabled";

/** Opaque per-platform secret record. Never logged. */
export type BindingCredentials = Readonly<Record<string, string>>;

export interface AgentBotBinding {
  readonly agentId: string;
  readonly platform: Platform;
  readonly credentials: BindingCredentials;
  readonly desiredState: DesiredState;
  readonly version: number;
  readonly updatedAt: Date;
}

export type ConnectionStatus = "stopped" | "starting" | "running" | "stopping" | "error";

export interface ConnectionError {
  kind: RelayErrorKind;
  message: string;
  permanent: boolean;
  at: Date;
}

export interface ConnectionState {
  agentId: string;
  platform: Platform;
  status: ConnectionStatus;
  boundVersion: number | null;
  lastError: ConnectionError | null;
  retryCount: number;
  updatedAt: Date;
}

export type AttachmentKind = "image" | "video" | "audio" | "voice" | "document";

export interface Attachment {
  readonly kind: AttachmentKind;
  /** Direct URL (Discord CDN) */
  readonly url?: string;
  /** Platform file handle (Telegram file_id) */
  readonly fileId?: string;
  readonly filename?: string;
  readonly mimeType?: string;
  readonly byteSize?: number;
}

export type MessageDirection = "inbound" | "outbound";

export interface MessageEnvelope {
  readonly platform: Platform;
  readonly agentId: string;
  readonly externalChatId: string;
  readonly externalMessageId: string;
  readonly senderId: string;
  readonly senderName?: string;
  readonly content: string;
  readonly attachments: readonly Attachment[];
  readonly direction: MessageDirection;
  readonly timestamp: Date;
}

export function isPlatform(value: string): value is Platform {
  return (PLATFORMS as readonly string[]).includes(value);
}

export function bindingKey(agentId: string, platform: Platform): string {
  return `${platform}:${agentId}`;
}

export function createEnvelope(input: MessageEnvelope): MessageEnvelope {
  return Object.freeze({
    ...input,
    attachments: Object.freeze(input.attachments.map((attachment) => Object.freeze({ ...attachment }))),
  });
}

export function sameCredentials(a: BindingCredentials, b: BindingCredentials): boolean {
  const left = Object.keys(a).sort();
  const right = Object.keys(b).sort();
  if (left.length !== right.length) {
    return false;
  }
  return left.every((key, index) => key === right[index] && a[key] === b[key]);
}
