import { withConnection } from "../connection";
import type { BindingRow } from "../types";

export type BindingRowDraft = Omit<BindingRow, "created_at">;

export const bindings = {
  get: (agentId: string, platform: string): BindingRow | null =>
    withConnection(
      (conn) =>
        (conn
          .prepare("SELECT * FROM bindings WHERE agent_id = ? AND platform = ?")
          .get(agentId, platform) as BindingRow | undefined) ?? null,
    ),
  listActive: (): BindingRow[] =>
    withConnection(
      (conn) =>
        conn
          .prepare("SELECT * FROM bindings WHERE deleted = 0 ORDER BY agent_id, platform")
          .all() as BindingRow[],
    ),
  listAll: (): BindingRow[] =>
    withConnection(
      (conn) =>
        conn.prepare("SELECT * FROM bindings ORDER BY agent_id, platform").all() as BindingRow[],
    ),
  countActive: (): number =>
    withConnection((conn) => {
      const row = conn.prepare("SELECT COUNT(*) AS total FROM bindings WHERE deleted = 0").get() as
        | { total: number }
        | undefined;
      return row?.total ?? 0;
    }),
  /**
   * Reads the current row (tombstones included) and writes whatever `next`
   * returns, all inside one transaction. Returning null leaves the row alone.
   */
  mutate: (
    agentId: string,
    platform: string,
    next: (current: BindingRow | null) => BindingRowDraft | null,
  ): BindingRow | null =>
    withConnection((conn) =>
      conn.transaction((): BindingRow | null => {
        const current =
          (conn
            .prepare("SELECT * FROM bindings WHERE agent_id = ? AND platform = ?")
            .get(agentId, platform) as BindingRow | undefined) ?? null;
        const draft = next(current);
        if (!draft) {
          return null;
        }
        conn
          .prepare(
            `INSERT INTO bindings (agent_id, platform, credentials_json, desired_state, version, deleted, created_at, updated_at) VALUES ($agent_id, $platform, $credentials_json, $desired_state, $version, $deleted, $updated_at, $updated_at) ON CONFLICT(agent_id, platform) DO UPDATE SET credentials_json = excluded.credentials_json, desired_state = excluded.desired_state, version = excluded.version, deleted = excluded.deleted, updated_at = excluded.updated_at`,
          )
          .run(draft);
        return {
          ...draft,
          created_at: current?.created_at ?? draft.updated_at,
        };
      })(),
    ),
};
