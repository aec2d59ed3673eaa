import { randomUUID } from "node:crypto";
import { deadLetters } from "../../storage/db";
import type { MessageEnvelope } from "../types";

export type DeadLetterReason = "rejected" | "retries_exhausted" | "buffer_full";

export interface DeadLetterEntry {
  envelope: MessageEnvelope;
  reason: DeadLetterReason;
  attempts: number;
  lastError: string | null;
}

export interface DeadLetterSink {
  record(entry: DeadLetterEntry): Promise<void>;
}

export class SqliteDeadLetterSink implements DeadLetterSink {
  async record(entry: DeadLetterEntry): Promise<void> {
    const { envelope } = entry;
    deadLetters.create({
      id: randomUUID(),
      agent_id: envelope.agentId,
      platform: envelope.platform,
      external_chat_id: envelope.externalChatId,
      external_message_id: envelope.externalMessageId,
      envelope_json: JSON.stringify(envelope),
      reason: entry.reason,
      attempts: entry.attempts,
      last_error: entry.lastError,
      created_at: new Date().toISOString(),
    });
  }
}
