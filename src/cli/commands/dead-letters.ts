import { deadLetters, type DeadLetterRow } from "../../storage/db";
import { withStore } from "./store";

export function formatDeadLetter(row: DeadLetterRow): string {
  const error = row.last_error ? ` ${row.last_error}` : "";
  return `${row.created_at} ${row.platform}/${row.agent_id} chat=${row.external_chat_id} msg=${row.external_message_id} ${row.reason} x${row.attempts}${error}`;
}

export async function listDeadLetters(options: {
  config?: string;
  agent?: string;
  limit?: string;
}): Promise<DeadLetterRow[]> {
  const limit = options.limit ? Number.parseInt(options.limit, 10) : 50;
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`--limit must be a positive integer, got "${options.limit}"`);
  }
  const rows = await withStore(options.config, () =>
    options.agent ? deadLetters.listByAgent(options.agent, limit) : deadLetters.list(limit),
  );
  if (rows.length === 0) {
    console.log("No dead letters.");
  }
  for (const row of rows) {
    console.log(formatDeadLetter(row));
  }
  return rows;
}
