import {
  type EffectiveRelaySettings,
  type RelayConfig,
  loadConfig,
  resolveRelaySettings,
} from "../../config";
import { configureLogger, logger } from "../../logger";
import { closeDb, initDb, withConnection } from "../../storage/db";
import { type AdapterFactory, createAdapterFactory } from "../adapters/factory";
import { type DeadLetterSink, SqliteDeadLetterSink } from "../inbound/dead-letter";
import { HttpReasoningClient, type ReasoningService } from "../inbound/reasoning-client";
import { InboundRouter } from "../inbound/router";
import { OutboundDispatcher } from "../outbound/dispatcher";
import { SqliteTenantRegistry } from "../registry/tenant-registry";
import { ConnectionSupervisor } from "../supervisor/supervisor";
import type { Platform } from "../types";
import { CredentialWatcher } from "../watcher/credential-watcher";
import type { ComponentStatus, RuntimeStatus } from "./types";
import { HealthCheck } from "./health";
import { registerProcessErrorHandlers } from "./process-error-handlers";
import { RelayHttpServer } from "./server";

export interface RuntimeHostOptions {
  /** Config file path; ignored when `config` is given */
  configPath?: string;
  config?: RelayConfig;
  reasoning?: ReasoningService;
  createAdapter?: AdapterFactory;
  deadLetters?: DeadLetterSink;
}

type Components = {
  settings: EffectiveRelaySettings;
  registry: SqliteTenantRegistry;
  supervisor: ConnectionSupervisor;
  router: InboundRouter;
  dispatcher: OutboundDispatcher;
  watcher: CredentialWatcher;
  server: RelayHttpServer;
};

/**
 * Composition root. Owns every long-lived component and tears them down in
 * dependency order.
 */
export class RuntimeHost {
  private running = false;
  private startedAt: Date | null = null;
  private readonly health = new HealthCheck();
  private components: Components | null = null;

  constructor(private readonly options: RuntimeHostOptions = {}) {}

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    registerProcessErrorHandlers();
    logger.info("Starting tenant relay...");

    const config = this.options.config ?? this.loadConfigOrThrow();
    configureLogger(config.logging?.level);
    const settings = resolveRelaySettings(config);

    initDb(settings.paths.database);
    logger.info({ path: settings.paths.database }, "Database initialized");

    const registry = new SqliteTenantRegistry({ pollIntervalMs: settings.registry.pollIntervalMs });
    registry.seed(config.bindings ?? []);

    const router = new InboundRouter({
      reasoning:
        this.options.reasoning ??
        new HttpReasoningClient({
          baseUrl: settings.reasoning.baseUrl,
          timeoutMs: settings.reasoning.timeoutMs,
          headers: settings.reasoning.headers,
        }),
      deadLetters: this.options.deadLetters ?? new SqliteDeadLetterSink(),
      dedupCacheSize: settings.inbound.dedupCacheSize,
      maxAttempts: settings.reasoning.maxAttempts,
      backoff: settings.reasoning.backoff,
    });

    const supervisor = new ConnectionSupervisor({
      settings: settings.supervisor,
      rateLimits: settings.outbound.rateLimits,
      createAdapter: this.options.createAdapter ?? createAdapterFactory(settings),
      sink: (source, event) => {
        router.onEvent(source, event);
      },
      onOverflow: (source, event) => {
        router.onOverflow(source, event);
      },
    });
    supervisor.on("removed", (key: { agentId: string; platform: Platform }) => {
      router.forget(key.agentId, key.platform);
    });

    const dispatcher = new OutboundDispatcher({
      supervisor,
      routingWaitMs: settings.outbound.routingWaitMs,
    });

    const server = new RelayHttpServer({
      host: settings.server.host,
      port: settings.server.port,
      authToken: settings.server.authToken,
      maxBodyBytes: settings.server.maxBodyBytes,
      supervisor,
      dispatcher,
      registry,
      health: this.health,
    });

    const watcher = new CredentialWatcher({ registry, supervisor });
    this.components = { settings, registry, supervisor, router, dispatcher, watcher, server };

    // Webhook ingress must be reachable before Telegram connections register.
    await server.start();
    watcher.start();
    supervisor.startHealthLoop();

    this.setupHealthChecks();
    await this.health.check();
    this.health.startLoop(settings.supervisor.healthIntervalMs);

    this.running = true;
    this.startedAt = new Date();
    logger.info({ pid: process.pid, port: server.getPort() }, "Tenant relay started");
  }

  async stop(): Promise<void> {
    const components = this.components;
    if (!this.running || !components) {
      return;
    }
    this.running = false;
    logger.info("Shutting down...");
    const { settings, watcher, supervisor, router, server } = components;
    const graceMs = settings.supervisor.shutdownGraceMs;

    this.health.stopLoop();
    await watcher.stop();
    await supervisor.shutdownAll(graceMs);
    await router.drain(graceMs);
    await server.stop();
    closeDb();

    this.components = null;
    this.startedAt = null;
    logger.info("Tenant relay stopped cleanly.");
  }

  getPort(): number | null {
    return this.components?.server.getPort() ?? null;
  }

  getStatus(): RuntimeStatus {
    const states = this.components?.supervisor.listStates() ?? [];
    return {
      running: this.running,
      pid: this.running ? process.pid : null,
      uptime: this.startedAt ? Math.floor((Date.now() - this.startedAt.getTime()) / 1000) : 0,
      startedAt: this.startedAt,
      health: {
        overall: this.health.getOverallStatus(),
        components: this.health.getResults(),
      },
      connections: {
        total: states.length,
        running: states.filter((state) => state.status === "running").length,
        error: states.filter((state) => state.status === "error").length,
      },
      inbound: {
        pending: this.components?.router.pendingCount ?? 0,
      },
    };
  }

  private loadConfigOrThrow(): RelayConfig {
    const result = loadConfig(this.options.configPath);
    if (!result.success || !result.config) {
      throw new Error(
        `Failed to load configuration from ${result.path}: ${(result.errors ?? []).join("; ")}`,
      );
    }
    logger.info({ path: result.path }, "Configuration loaded");
    return result.config;
  }

  private setupHealthChecks(): void {
    this.health.register("database", async () => {
      withConnection((conn) => conn.prepare("SELECT 1").get());
      return { name: "database", status: "healthy", lastCheck: new Date() };
    });

    this.health.register("connections", async (): Promise<ComponentStatus> => {
      const states = this.components?.supervisor.listStates() ?? [];
      const failing = states.filter((state) => state.status === "error");
      return {
        name: "connections",
        status: failing.length > 0 ? "degraded" : "healthy",
        lastCheck: new Date(),
        details: {
          total: states.length,
          running: states.filter((state) => state.status === "running").length,
          failing: failing.map((state) => `${state.platform}/${state.agentId}`),
        },
      };
    });

    this.health.register("inbound", async () => ({
      name: "inbound",
      status: "healthy",
      lastCheck: new Date(),
      details: { pending: this.components?.router.pendingCount ?? 0 },
    }));
  }
}
