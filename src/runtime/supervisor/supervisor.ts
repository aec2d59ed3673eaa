import { EventEmitter } from "node:events";
import type { EffectiveRelaySettings } from "../../config/settings";
import { logger } from "../../logger";
import type { PlatformAdapter } from "../adapters/adapter";
import type { AdapterFactory } from "../adapters/factory";
import type { AdapterLiveness, RawPlatformEvent } from "../adapters/types";
import { raceTimeout, withDeadline } from "../core/async";
import { computeBackoffDelay } from "../core/backoff";
import { KeyedMutex } from "../core/keyed-mutex";
import { classifyError } from "../error-classify";
import { type RelayError, TransientNetworkError } from "../errors";
import { TokenBucket } from "../outbound/token-bucket";
import {
  type AgentBotBinding,
  type BindingCredentials,
  type ConnectionState,
  type ConnectionStatus,
  type Platform,
  bindingKey,
  sameCredentials,
} from "../types";

export interface ConnectionSource {
  agentId: string;
  platform: Platform;
  version: number;
}

/** Receives every raw event of every live connection. Must not block. */
export type EventSink = (source: ConnectionSource, event: RawPlatformEvent) => void;

export interface ConnectionHandle {
  readonly agentId: string;
  readonly platform: Platform;
  readonly adapter: PlatformAdapter;
  readonly credentials: BindingCredentials;
  readonly bucket: TokenBucket;
  readonly controller: AbortController;
  readonly startedAt: Date;
  /** Binding version this connection serves */
  version: number;
  pump: Promise<void>;
}

export interface ConnectionSupervisorOptions {
  settings: EffectiveRelaySettings["supervisor"];
  rateLimits: EffectiveRelaySettings["outbound"]["rateLimits"];
  createAdapter: AdapterFactory;
  sink: EventSink;
  /** Receives events an active connection dropped because its buffer was full */
  onOverflow?: EventSink;
  random?: () => number;
  now?: () => Date;
}

type Entry = {
  readonly key: string;
  readonly agentId: string;
  readonly platform: Platform;
  state: ConnectionState;
  binding: AgentBotBinding | null;
  /** Highest version accepted by reconcile/remove; older calls are no-ops */
  appliedVersion: number;
  handle: ConnectionHandle | null;
  /** Present only while a connect is in flight */
  startController: AbortController | null;
  retryTimer: ReturnType<typeof setTimeout> | null;
  removed: boolean;
};

/**
 * Owns every live platform connection. Lifecycle transitions are serialized
 * per (agentId, platform) with a promise-chain mutex and run in parallel
 * across keys.
 *
 * Events:
 * - 'state' - (state: ConnectionState) => void, on every state change
 * - 'removed' - (key: { agentId, platform }) => void, once a removed key is forgotten
 */
export class ConnectionSupervisor extends EventEmitter {
  private readonly entries = new Map<string, Entry>();
  /** Last applied version of removed keys, so late stale events stay no-ops */
  private readonly removedVersions = new Map<string, number>();
  private readonly mutex = new KeyedMutex();
  private readonly random: () => number;
  private readonly now: () => Date;
  private healthTimer: ReturnType<typeof setInterval> | null = null;
  private shuttingDown = false;

  constructor(private readonly options: ConnectionSupervisorOptions) {
    super();
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Converges the connection for `binding`'s key towards its desired state.
   * Calls carrying a version that is not newer than the last accepted one
   * change nothing.
   */
  async reconcile(binding: AgentBotBinding): Promise<ConnectionState> {
    if (this.shuttingDown) {
      return this.snapshotOf(binding.agentId, binding.platform);
    }
    const entry = this.ensureEntry(binding.agentId, binding.platform);
    if (binding.version <= entry.appliedVersion) {
      logger.debug(
        {
          agentId: binding.agentId,
          platform: binding.platform,
          version: binding.version,
          applied: entry.appliedVersion,
        },
        "Ignoring stale binding version",
      );
      return { ...entry.state };
    }

    entry.appliedVersion = binding.version;
    entry.binding = binding;
    entry.removed = false;
    // A connect still running for an older version must not hold the key.
    entry.startController?.abort(
      new TransientNetworkError(`superseded by binding version ${binding.version}`),
    );

    await this.mutex.runExclusive(entry.key, () => this.apply(entry, binding.version));
    return { ...entry.state };
  }

  /** Binding deleted: stops the connection and forgets the key. */
  async remove(agentId: string, platform: Platform, version?: number): Promise<void> {
    const key = bindingKey(agentId, platform);
    const entry = this.entries.get(key);
    if (!entry) {
      if (version !== undefined && version > (this.removedVersions.get(key) ?? 0)) {
        this.removedVersions.set(key, version);
      }
      return;
    }
    if (version !== undefined) {
      if (version <= entry.appliedVersion) {
        return;
      }
      entry.appliedVersion = version;
    }
    entry.removed = true;
    entry.binding = null;
    this.clearRetry(entry);
    entry.startController?.abort(new TransientNetworkError("binding removed"));

    await this.mutex.runExclusive(entry.key, async () => {
      if (!entry.removed) {
        return;
      }
      await this.stopHandle(entry, this.options.settings.timeouts.disconnectMs);
      this.setState(entry, { status: "stopped", retryCount: 0 });
      if (entry.removed && this.entries.get(entry.key) === entry) {
        this.entries.delete(entry.key);
        this.removedVersions.set(entry.key, entry.appliedVersion);
        logger.info({ agentId, platform }, "Connection removed");
        this.emit("removed", { agentId, platform });
      }
    });
  }

  /**
   * Operator override: full stop/start of the current binding regardless of
   * version or previous failures. Returns null for unknown keys.
   */
  async restart(agentId: string, platform: Platform): Promise<ConnectionState | null> {
    const entry = this.entries.get(bindingKey(agentId, platform));
    if (!entry || entry.removed || !entry.binding || this.shuttingDown) {
      return null;
    }
    this.clearRetry(entry);
    entry.startController?.abort(new TransientNetworkError("restart requested"));

    await this.mutex.runExclusive(entry.key, async () => {
      const binding = entry.binding;
      if (!binding || entry.removed) {
        return;
      }
      logger.info({ agentId, platform, version: binding.version }, "Restarting connection");
      await this.stopHandle(entry, this.options.settings.timeouts.disconnectMs);
      this.setState(entry, { status: "stopped", retryCount: 0, lastError: null });
      if (binding.desiredState === "enabled") {
        await this.startConnection(entry, binding);
      }
    });
    return { ...entry.state };
  }

  /** Probes every running connection once; failed probes enter backoff. */
  async healthCheck(): Promise<void> {
    const running = [...this.entries.values()].filter(
      (entry) => entry.state.status === "running" && entry.handle,
    );
    await Promise.all(running.map((entry) => this.probeEntry(entry)));
  }

  startHealthLoop(): void {
    if (this.healthTimer) {
      return;
    }
    this.healthTimer = setInterval(() => {
      this.healthCheck().catch((err: unknown) => {
        logger.error({ err }, "Connection health check failed");
      });
    }, this.options.settings.healthIntervalMs);
  }

  stopHealthLoop(): void {
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = null;
    }
  }

  /**
   * Stops every connection. In-flight sends get `graceMs` to finish, after
   * which teardown is forced.
   */
  async shutdownAll(graceMs: number = this.options.settings.shutdownGraceMs): Promise<void> {
    this.shuttingDown = true;
    this.stopHealthLoop();
    const entries = [...this.entries.values()];
    for (const entry of entries) {
      this.clearRetry(entry);
      entry.startController?.abort(new TransientNetworkError("shutting down"));
    }
    await Promise.all(
      entries.map((entry) =>
        this.mutex.runExclusive(entry.key, async () => {
          await this.stopHandle(entry, graceMs);
          if (entry.state.status !== "error") {
            this.setState(entry, { status: "stopped" });
          }
        }),
      ),
    );
    logger.info({ connections: entries.length }, "All connections stopped");
  }

  getState(agentId: string, platform: Platform): ConnectionState | null {
    const entry = this.entries.get(bindingKey(agentId, platform));
    return entry ? { ...entry.state } : null;
  }

  listStates(): ConnectionState[] {
    return [...this.entries.values()].map((entry) => ({ ...entry.state }));
  }

  /** Latest binding the supervisor was asked to serve, if any. */
  getBinding(agentId: string, platform: Platform): AgentBotBinding | null {
    const entry = this.entries.get(bindingKey(agentId, platform));
    return entry && !entry.removed ? entry.binding : null;
  }

  /** The live handle, only while the connection is running. */
  getHandle(agentId: string, platform: Platform): ConnectionHandle | null {
    const entry = this.entries.get(bindingKey(agentId, platform));
    if (!entry || entry.state.status !== "running") {
      return null;
    }
    return entry.handle;
  }

  /** Resolves with the handle once running, or null after `timeoutMs`. */
  waitForRunning(
    agentId: string,
    platform: Platform,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<ConnectionHandle | null> {
    const current = this.getHandle(agentId, platform);
    if (current || timeoutMs <= 0 || signal?.aborted) {
      return Promise.resolve(current);
    }
    return new Promise((resolve) => {
      const finish = (handle: ConnectionHandle | null) => {
        clearTimeout(timer);
        this.off("state", onState);
        signal?.removeEventListener("abort", onAbort);
        resolve(handle);
      };
      const onState = (state: ConnectionState) => {
        if (state.agentId === agentId && state.platform === platform && state.status === "running") {
          finish(this.getHandle(agentId, platform));
        }
      };
      const onAbort = () => finish(null);
      const timer = setTimeout(() => finish(null), timeoutMs);
      this.on("state", onState);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private async apply(entry: Entry, version: number): Promise<void> {
    const binding = entry.binding;
    // A newer version is queued behind this one and will do the work.
    if (!binding || binding.version !== version || entry.removed || this.shuttingDown) {
      return;
    }
    this.clearRetry(entry);
    const log = { agentId: entry.agentId, platform: entry.platform, version };

    if (binding.desiredState === "disabled") {
      await this.stopHandle(entry, this.options.settings.timeouts.disconnectMs);
      this.setState(entry, { status: "stopped", boundVersion: version, retryCount: 0 });
      logger.info(log, "Connection disabled");
      return;
    }

    const handle = entry.handle;
    if (handle && sameCredentials(handle.credentials, binding.credentials)) {
      // Versions coalesced back to the credentials already live.
      handle.version = version;
      this.setState(entry, { boundVersion: version });
      return;
    }

    if (handle) {
      logger.info(log, "Credentials changed; restarting connection");
      await this.stopHandle(entry, this.options.settings.timeouts.disconnectMs);
    }
    this.setState(entry, { retryCount: 0 });
    await this.startConnection(entry, binding);
  }

  private async startConnection(entry: Entry, binding: AgentBotBinding): Promise<void> {
    const controller = new AbortController();
    entry.startController = controller;
    this.setState(entry, { status: "starting", boundVersion: binding.version });
    const log = { agentId: entry.agentId, platform: entry.platform, version: binding.version };

    let adapter: PlatformAdapter | null = null;
    try {
      const created = this.options.createAdapter(binding);
      adapter = created;
      await withDeadline(
        this.options.settings.timeouts.connectMs,
        (signal) => created.connect(signal, binding.credentials),
        {
          parent: controller.signal,
          timeoutError: () =>
            new TransientNetworkError(
              `connect timed out after ${this.options.settings.timeouts.connectMs}ms`,
            ),
        },
      );
    } catch (err) {
      entry.startController = null;
      if (adapter) {
        await adapter.forceClose();
      }
      if (controller.signal.aborted) {
        logger.info(log, "Connect cancelled");
        this.setState(entry, { status: "stopped" });
        return;
      }
      this.handleFailure(entry, binding, classifyError(err));
      return;
    }

    entry.startController = null;
    const source: ConnectionSource = {
      agentId: entry.agentId,
      platform: entry.platform,
      version: binding.version,
    };
    const limit = this.options.rateLimits[entry.platform];
    const handle: ConnectionHandle = {
      agentId: entry.agentId,
      platform: entry.platform,
      adapter,
      credentials: binding.credentials,
      bucket: new TokenBucket({ ratePerSecond: limit.ratePerSecond, burst: limit.burst }),
      controller: new AbortController(),
      startedAt: this.now(),
      version: binding.version,
      pump: Promise.resolve(),
    };
    handle.pump = this.pump(handle, source);
    const onOverflow = this.options.onOverflow;
    if (onOverflow) {
      handle.adapter.on("overflow", (event: RawPlatformEvent) => {
        onOverflow({ ...source, version: handle.version }, event);
      });
    }
    entry.handle = handle;
    this.setState(entry, { status: "running", retryCount: 0, lastError: null });
    logger.info(log, "Connection running");
  }

  private async pump(handle: ConnectionHandle, source: ConnectionSource): Promise<void> {
    try {
      for await (const event of handle.adapter.events()) {
        try {
          this.options.sink({ ...source, version: handle.version }, event);
        } catch (err) {
          logger.error(
            { err, agentId: source.agentId, platform: source.platform },
            "Inbound event handler threw; event skipped",
          );
        }
      }
    } catch (err) {
      logger.error(
        { err, agentId: source.agentId, platform: source.platform },
        "Event pump stopped unexpectedly",
      );
    }
  }

  private async probeEntry(entry: Entry): Promise<void> {
    const handle = entry.handle;
    if (!handle) {
      return;
    }
    const timeoutMs = this.options.settings.timeouts.healthMs;
    let liveness: AdapterLiveness;
    try {
      liveness = await withDeadline(timeoutMs, (signal) => handle.adapter.probe(signal), {
        timeoutError: () => new TransientNetworkError(`health probe timed out after ${timeoutMs}ms`),
      });
    } catch (err) {
      liveness = { alive: false, detail: "probe failed", error: err };
    }
    if (liveness.alive) {
      return;
    }

    await this.mutex.runExclusive(entry.key, async () => {
      const binding = entry.binding;
      if (entry.handle !== handle || !binding) {
        return;
      }
      logger.warn(
        { agentId: entry.agentId, platform: entry.platform, detail: liveness.detail },
        "Health probe failed",
      );
      await this.stopHandle(entry, 0);
      this.handleFailure(
        entry,
        binding,
        classifyError(liveness.error ?? new TransientNetworkError(liveness.detail ?? "probe failed")),
      );
    });
  }

  private handleFailure(entry: Entry, binding: AgentBotBinding, error: RelayError): void {
    const lastError = {
      kind: error.kind,
      message: error.message,
      permanent: error.permanent,
      at: this.now(),
    };
    const log = {
      agentId: entry.agentId,
      platform: entry.platform,
      version: binding.version,
      err: error,
    };

    if (error.permanent) {
      this.setState(entry, { status: "error", lastError });
      logger.error(log, "Connection failed permanently; waiting for a binding update");
      return;
    }

    const retryCount = entry.state.retryCount + 1;
    const { maxRetries, backoff } = this.options.settings;
    if (retryCount > maxRetries) {
      this.setState(entry, { status: "stopped", lastError, retryCount });
      logger.error(log, "Connection gave up after exhausting retries");
      return;
    }

    const delayMs = computeBackoffDelay(retryCount, backoff, this.random);
    this.setState(entry, { status: "error", lastError, retryCount });
    logger.warn({ ...log, retryCount, delayMs }, "Connection failed; retrying after backoff");

    this.clearRetry(entry);
    entry.retryTimer = setTimeout(() => {
      entry.retryTimer = null;
      this.mutex
        .runExclusive(entry.key, () => this.retry(entry, binding.version))
        .catch((err: unknown) => {
          logger.error(
            { err, agentId: entry.agentId, platform: entry.platform },
            "Connection retry failed",
          );
        });
    }, delayMs);
  }

  private async retry(entry: Entry, version: number): Promise<void> {
    const binding = entry.binding;
    if (
      !binding ||
      binding.version !== version ||
      entry.removed ||
      this.shuttingDown ||
      entry.state.status !== "error"
    ) {
      return;
    }
    await this.startConnection(entry, binding);
  }

  /** Caller holds the key's mutex. */
  private async stopHandle(entry: Entry, graceMs: number): Promise<void> {
    const handle = entry.handle;
    if (!handle) {
      return;
    }
    entry.handle = null;
    this.setState(entry, { status: "stopping" });
    const log = { agentId: entry.agentId, platform: entry.platform, version: handle.version };

    const budget = graceMs + this.options.settings.timeouts.disconnectMs;
    let graceful = false;
    try {
      const outcome = await raceTimeout(
        handle.adapter.disconnectGracefully(handle.controller.signal, graceMs),
        budget,
      );
      graceful = !outcome.timedOut;
    } catch (err) {
      logger.warn({ ...log, err }, "Graceful disconnect failed");
    }
    if (!graceful) {
      handle.controller.abort(new TransientNetworkError("stop deadline exceeded"));
      await handle.adapter.forceClose();
      logger.warn(log, "Connection force-closed");
    }
    handle.bucket.close(new TransientNetworkError("connection stopped"));
    await handle.pump;
    logger.info(log, "Connection stopped");
  }

  private clearRetry(entry: Entry): void {
    if (entry.retryTimer) {
      clearTimeout(entry.retryTimer);
      entry.retryTimer = null;
    }
  }

  private ensureEntry(agentId: string, platform: Platform): Entry {
    const key = bindingKey(agentId, platform);
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }
    const entry: Entry = {
      key,
      agentId,
      platform,
      state: {
        agentId,
        platform,
        status: "stopped",
        boundVersion: null,
        lastError: null,
        retryCount: 0,
        updatedAt: this.now(),
      },
      binding: null,
      appliedVersion: this.removedVersions.get(key) ?? 0,
      handle: null,
      startController: null,
      retryTimer: null,
      removed: false,
    };
    this.entries.set(key, entry);
    return entry;
  }

  private snapshotOf(agentId: string, platform: Platform): ConnectionState {
    return (
      this.getState(agentId, platform) ?? {
        agentId,
        platform,
        status: "stopped",
        boundVersion: null,
        lastError: null,
        retryCount: 0,
        updatedAt: this.now(),
      }
    );
  }

  private setState(
    entry: Entry,
    patch: Partial<Omit<ConnectionState, "agentId" | "platform" | "updatedAt">>,
  ): void {
    const previous: ConnectionStatus = entry.state.status;
    entry.state = { ...entry.state, ...patch, updatedAt: this.now() };
    if (patch.status && patch.status !== previous) {
      logger.debug(
        {
          agentId: entry.agentId,
          platform: entry.platform,
          from: previous,
          to: patch.status,
          version: entry.state.boundVersion,
        },
        "Connection state changed",
      );
    }
    this.emit("state", { ...entry.state });
  }
}

