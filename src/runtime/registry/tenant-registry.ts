import { z } from "zod";
import type { BindingSeed } from "../../config";
import { logger } from "../../logger";
import { type BindingRow, bindings } from "../../storage/db";
import { EventChannel } from "../core/event-channel";
import {
  type AgentBotBinding,
  type BindingCredentials,
  type DesiredState,
  type Platform,
  bindingKey,
  sameCredentials,
} from "../types";

export interface BindingInput {
  agentId: string;
  platform: Platform;
  credentials: BindingCredentials;
  desiredState?: DesiredState;
}

export type RegistryChange =
  | { type: "upsert"; binding: AgentBotBinding }
  | { type: "remove"; agentId: string; platform: Platform; version: number };

export interface TenantRegistry {
  put(input: BindingInput): AgentBotBinding;
  /** Returns the removed binding (carrying the removal version), or null if none existed. */
  remove(agentId: string, platform: Platform): AgentBotBinding | null;
  get(agentId: string, platform: Platform): AgentBotBinding | null;
  list(): AgentBotBinding[];
  /**
   * At-least-once stream of changes until `signal` aborts. Subscribing is
   * synchronous: nothing written after the call returns is missed.
   */
  watch(signal: AbortSignal): AsyncIterable<RegistryChange>;
}

const CredentialsJsonSchema = z.record(z.string(), z.string());

function parseCredentials(row: BindingRow): BindingCredentials {
  const parsed = CredentialsJsonSchema.safeParse(JSON.parse(row.credentials_json));
  if (!parsed.success) {
    logger.warn(
      { agentId: row.agent_id, platform: row.platform },
      "Stored credentials are not a string record; treating as empty",
    );
    return {};
  }
  return parsed.data;
}

function toBinding(row: BindingRow): AgentBotBinding {
  return {
    agentId: row.agent_id,
    platform: row.platform,
    credentials: parseCredentials(row),
    desiredState: row.desired_state,
    version: row.version,
    updatedAt: new Date(row.updated_at),
  };
}

export interface SqliteTenantRegistryOptions {
  /** How often `watch` re-reads the table for writes made by other processes */
  pollIntervalMs: number;
  now?: () => Date;
}

/**
 * Registry on the `bindings` table. Removal leaves a tombstone row so a
 * key's versions keep increasing across delete and re-create.
 */
export class SqliteTenantRegistry implements TenantRegistry {
  private readonly subscribers = new Set<EventChannel<RegistryChange>>();
  private readonly seen = new Map<string, number>();
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private readonly now: () => Date;

  constructor(private readonly options: SqliteTenantRegistryOptions) {
    this.now = options.now ?? (() => new Date());
  }

  put(input: BindingInput): AgentBotBinding {
    const desiredState = input.desiredState ?? "enabled";
    const credentialsJson = JSON.stringify(input.credentials);
    const written = bindings.mutate(input.agentId, input.platform, (current) => {
      if (
        current &&
        current.deleted === 0 &&
        current.desired_state === desiredState &&
        sameCredentials(parseCredentials(current), input.credentials)
      ) {
        return null;
      }
      return {
        agent_id: input.agentId,
        platform: input.platform,
        credentials_json: credentialsJson,
        desired_state: desiredState,
        version: (current?.version ?? 0) + 1,
        deleted: 0,
        updated_at: this.now().toISOString(),
      };
    });

    if (!written) {
      const existing = this.get(input.agentId, input.platform);
      if (!existing) {
        throw new Error(`Binding ${input.platform}/${input.agentId} vanished during put`);
      }
      return existing;
    }

    const binding = toBinding(written);
    logger.info(
      { agentId: binding.agentId, platform: binding.platform, version: binding.version },
      "Binding stored",
    );
    this.publish({ type: "upsert", binding });
    return binding;
  }

  remove(agentId: string, platform: Platform): AgentBotBinding | null {
    const written = bindings.mutate(agentId, platform, (current) => {
      if (!current || current.deleted !== 0) {
        return null;
      }
      return {
        agent_id: current.agent_id,
        platform: current.platform,
        credentials_json: current.credentials_json,
        desired_state: current.desired_state,
        version: current.version + 1,
        deleted: 1,
        updated_at: this.now().toISOString(),
      };
    });
    if (!written) {
      return null;
    }
    const binding = toBinding(written);
    logger.info({ agentId, platform, version: written.version }, "Binding removed");
    this.publish({ type: "remove", agentId, platform, version: written.version });
    return binding;
  }

  get(agentId: string, platform: Platform): AgentBotBinding | null {
    const row = bindings.get(agentId, platform);
    if (!row || row.deleted !== 0) {
      return null;
    }
    return toBinding(row);
  }

  list(): AgentBotBinding[] {
    return bindings.listActive().map(toBinding);
  }

  /** Writes `seeds` only into a registry that never held a binding. */
  seed(seeds: readonly BindingSeed[]): number {
    if (seeds.length === 0 || bindings.listAll().length > 0) {
      return 0;
    }
    for (const seed of seeds) {
      this.put({
        agentId: seed.agentId,
        platform: seed.platform,
        credentials: seed.credentials,
        desiredState: seed.desiredState,
      });
    }
    logger.info({ count: seeds.length }, "Registry seeded from config");
    return seeds.length;
  }

  watch(signal: AbortSignal): AsyncIterable<RegistryChange> {
    const channel = new EventChannel<RegistryChange>();
    if (signal.aborted) {
      channel.close();
      return channel;
    }
    if (this.subscribers.size === 0) {
      this.snapshotVersions();
    }
    this.subscribers.add(channel);
    this.ensurePolling();
    signal.addEventListener(
      "abort",
      () => {
        channel.close();
        this.subscribers.delete(channel);
        if (this.subscribers.size === 0) {
          this.stopPolling();
        }
      },
      { once: true },
    );
    return channel;
  }

  /** Re-reads the table and publishes rows whose version moved. */
  poll(): number {
    let changes = 0;
    for (const row of bindings.listAll()) {
      if ((this.seen.get(bindingKey(row.agent_id, row.platform)) ?? 0) >= row.version) {
        continue;
      }
      changes += 1;
      if (row.deleted !== 0) {
        this.publish({
          type: "remove",
          agentId: row.agent_id,
          platform: row.platform,
          version: row.version,
        });
      } else {
        this.publish({ type: "upsert", binding: toBinding(row) });
      }
    }
    return changes;
  }

  private publish(change: RegistryChange): void {
    const { agentId, platform, version } =
      change.type === "upsert" ? change.binding : change;
    const key = bindingKey(agentId, platform);
    this.seen.set(key, Math.max(this.seen.get(key) ?? 0, version));
    for (const subscriber of this.subscribers) {
      subscriber.push(change);
    }
  }

  private snapshotVersions(): void {
    for (const row of bindings.listAll()) {
      const key = bindingKey(row.agent_id, row.platform);
      this.seen.set(key, Math.max(this.seen.get(key) ?? 0, row.version));
    }
  }

  private ensurePolling(): void {
    if (this.pollTimer) {
      return;
    }
    this.pollTimer = setInterval(() => {
      try {
        this.poll();
      } catch (err) {
        logger.error({ err }, "Registry poll failed");
      }
    }, this.options.pollIntervalMs);
  }

  private stopPolling(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
  }
}
