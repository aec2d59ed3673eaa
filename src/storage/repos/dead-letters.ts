import { withConnection } from "../connection";
import type { DeadLetterRow } from "../types";

export const deadLetters = {
  create: (row: DeadLetterRow) =>
    withConnection((conn) =>
      conn
        .prepare(
          `INSERT INTO dead_letters (id, agent_id, platform, external_chat_id, external_message_id, envelope_json, reason, attempts, last_error, created_at) VALUES ($id, $agent_id, $platform, $external_chat_id, $external_message_id, $envelope_json, $reason, $attempts, $last_error, $created_at)`,
        )
        .run(row),
    ),
  list: (limit = 50): DeadLetterRow[] =>
    withConnection(
      (conn) =>
        conn
          .prepare("SELECT * FROM dead_letters ORDER BY created_at DESC LIMIT ?")
          .all(limit) as DeadLetterRow[],
    ),
  listByAgent: (agentId: string, limit = 50): DeadLetterRow[] =>
    withConnection(
      (conn) =>
        conn
          .prepare(
            "SELECT * FROM dead_letters WHERE agent_id = ? ORDER BY created_at DESC LIMIT ?",
          )
          .all(agentId, limit) as DeadLetterRow[],
    ),
  count: (): number =>
    withConnection((conn) => {
      const row = conn.prepare("SELECT COUNT(*) AS total FROM dead_letters").get() as
        | { total: number }
        | undefined;
      return row?.total ?? 0;
    }),
};
