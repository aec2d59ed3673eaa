export type BindingPlatform = "discord" | "telegram";
export type BindingDesiredState = "enabled" | "disabled";

export interface BindingRow {
  agent_id: string;
  platform: BindingPlatform;
  credentials_json: string;
  desired_state: BindingDesiredState;
  version: number;
  deleted: number;
  created_at: string;
  updated_at: string;
}

export interface DeadLetterRow {
  id: string;
  agent_id: string;
  platform: string;
  external_chat_id: string;
  external_message_id: string;
  envelope_json: string;
  reason: string;
  attempts: number;
  last_error: string | null;
  created_at: string;
}
