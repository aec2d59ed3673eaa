import { logger } from "../../logger";
import type { RegistryChange, TenantRegistry } from "../registry/tenant-registry";
import type { ConnectionSupervisor } from "../supervisor/supervisor";
import { type AgentBotBinding, type Platform, bindingKey } from "../types";

type Reconciler = Pick<ConnectionSupervisor, "reconcile" | "remove">;

export interface CredentialWatcherOptions {
  registry: Pick<TenantRegistry, "list" | "watch">;
  supervisor: Reconciler;
}

/**
 * Drives the supervisor from registry changes. Reconciles are fired without
 * awaiting them in the loop, so a slow tenant never delays the others.
 */
export class CredentialWatcher {
  private readonly applied = new Map<string, number>();
  private readonly inflight = new Set<Promise<void>>();
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  get pendingCount(): number {
    return this.inflight.size;
  }

  constructor(private readonly options: CredentialWatcherOptions) {}

  /** Subscribes, then fires a reconcile for every listed binding. */
  start(): void {
    if (this.controller) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    // Subscribe before listing so a write landing in between is still seen.
    const changes = this.options.registry.watch(controller.signal);
    const initial = this.options.registry.list();
    logger.info({ bindings: initial.length }, "Credential watcher starting");
    for (const binding of initial) {
      this.handle({ type: "upsert", binding });
    }
    this.loop = this.consume(changes);
  }

  /** Stops consuming and waits for reconciles already in flight. */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      return;
    }
    this.controller = null;
    controller.abort();
    await this.loop;
    this.loop = null;
    await this.settled();
  }

  /** Resolves when every reconcile fired so far has finished. */
  async settled(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  private async consume(changes: AsyncIterable<RegistryChange>): Promise<void> {
    try {
      for await (const change of changes) {
        this.handle(change);
      }
    } catch (err) {
      logger.error({ err }, "Registry watch stream failed");
    }
  }

  private handle(change: RegistryChange): void {
    const { agentId, platform, version } = change.type === "upsert" ? change.binding : change;
    const key = bindingKey(agentId, platform);
    if ((this.applied.get(key) ?? 0) >= version) {
      return;
    }
    this.applied.set(key, version);
    if (change.type === "upsert") {
      this.track(this.reconcile(change.binding));
    } else {
      this.track(this.remove(agentId, platform, version));
    }
  }

  private async reconcile(binding: AgentBotBinding): Promise<void> {
    const state = await this.options.supervisor.reconcile(binding);
    logger.debug(
      {
        agentId: binding.agentId,
        platform: binding.platform,
        version: binding.version,
        status: state.status,
      },
      "Binding reconciled",
    );
  }

  private async remove(agentId: string, platform: Platform, version: number): Promise<void> {
    await this.options.supervisor.remove(agentId, platform, version);
  }

  private track(task: Promise<void>): void {
    const guarded = task.catch((err: unknown) => {
      logger.error({ err }, "Reconcile failed");
    });
    this.inflight.add(guarded);
    void guarded.finally(() => {
      this.inflight.delete(guarded);
    });
  }
}
