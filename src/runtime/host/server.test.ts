import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { closeDb, initDb } from "../../storage/db";
import type { PlatformAdapter } from "../adapters/adapter";
import { OutboundDispatcher } from "../outbound/dispatcher";
import { SqliteTenantRegistry } from "../registry/tenant-registry";
import { type ConnectionSource, ConnectionSupervisor } from "../supervisor/supervisor";
import { FakeActiveAdapter, FakePassiveAdapter, fakeContext } from "../testing/fake-adapters";
import type { AgentBotBinding } from "../types";
import type { RawPlatformEvent } from "../adapters/types";
import { HealthCheck } from "./health";
import { RelayHttpServer, TELEGRAM_SECRET_HEADER } from "./server";

vi.mock("../../logger", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const NOW = new Date("2026-04-01T10:00:00.000Z");
const AUTH = { authorization: "Bearer test-secret" };

const UPDATE = {
  update_id: 10,
  message: {
    message_id: 1,
    date: 1_700_000_000,
    chat: { id: 5, type: "private", first_name: "Ann" },
    from: { id: 5, is_bot: false, first_name: "Ann" },
    text: "hi",
  },
};

function binding(
  agentId: string,
  platform: AgentBotBinding["platform"],
  desiredState: AgentBotBinding["desiredState"] = "enabled",
): AgentBotBinding {
  return {
    agentId,
    platform,
    credentials: { botToken: `${agentId}-token` },
    desiredState,
    version: 1,
    updatedAt: NOW,
  };
}

type Reply = { status: number; body: unknown };

describe("RelayHttpServer", () => {
  let server: RelayHttpServer;
  let supervisor: ConnectionSupervisor;
  let adapters: PlatformAdapter[];
  let events: Array<{ source: ConnectionSource; event: RawPlatformEvent }>;
  let baseUrl: string;

  async function request(
    method: string,
    path: string,
    options: { body?: unknown; headers?: Record<string, string> } = {},
  ): Promise<Reply> {
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers: { "content-type": "application/json", ...options.headers },
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    return { status: response.status, body: await response.json() };
  }

  function secretOf(index: number): string {
    const adapter = adapters[index];
    if (!(adapter instanceof FakePassiveAdapter) || !adapter.registeredSecret) {
      throw new Error("expected a connected passive adapter");
    }
    return adapter.registeredSecret;
  }

  beforeEach(async () => {
    initDb(":memory:");
    adapters = [];
    events = [];
    supervisor = new ConnectionSupervisor({
      settings: {
        maxRetries: 0,
        backoff: { baseMs: 5, capMs: 5, jitterRatio: 0 },
        healthIntervalMs: 60_000,
        shutdownGraceMs: 50,
        timeouts: { connectMs: 500, sendMs: 500, disconnectMs: 50, healthMs: 50 },
      },
      rateLimits: {
        discord: { ratePerSecond: 50, burst: 50 },
        telegram: { ratePerSecond: 50, burst: 50 },
      },
      sink: (source, event) => {
        events.push({ source, event });
      },
      createAdapter: (b) => {
        const adapter =
          b.platform === "telegram"
            ? new FakePassiveAdapter(fakeContext(b))
            : new FakeActiveAdapter(fakeContext(b));
        adapters.push(adapter);
        return adapter;
      },
    });
    const health = new HealthCheck(() => NOW);
    health.register("database", async () => ({
      name: "database",
      status: "healthy",
      lastCheck: NOW,
    }));
    server = new RelayHttpServer({
      host: "127.0.0.1",
      port: 0,
      authToken: "test-secret",
      maxBodyBytes: 1_024,
      supervisor,
      dispatcher: new OutboundDispatcher({ supervisor, routingWaitMs: 0 }),
      registry: new SqliteTenantRegistry({ pollIntervalMs: 60_000, now: () => NOW }),
      health,
    });
    await server.start();
    baseUrl = `http://127.0.0.1:${server.getPort()}`;
  });

  afterEach(async () => {
    await server.stop();
    await supervisor.shutdownAll(0);
    closeDb();
  });

  describe("webhooks", () => {
    it("hands an update with the right secret to the connection", async () => {
      await supervisor.reconcile(binding("agent-a", "telegram"));

      const reply = await request("POST", "/webhook/telegram/agent-a", {
        body: UPDATE,
        headers: { [TELEGRAM_SECRET_HEADER]: secretOf(0) },
      });

      expect(reply).toEqual({ status: 200, body: { ok: true } });
      await vi.waitFor(() => {
        expect(events).toHaveLength(1);
      });
      expect(events[0]?.source).toEqual({ agentId: "agent-a", platform: "telegram", version: 1 });
    });

    it("rejects a secret registered for another agent", async () => {
      await supervisor.reconcile(binding("agent-a", "telegram"));
      await supervisor.reconcile(binding("agent-b", "telegram"));

      const reply = await request("POST", "/webhook/telegram/agent-a", {
        body: UPDATE,
        headers: { [TELEGRAM_SECRET_HEADER]: secretOf(1) },
      });

      expect(reply).toEqual({
        status: 401,
        body: { error: "unauthorized", message: "Webhook secret mismatch" },
      });
      expect(events).toEqual([]);
    });

    it("asks Telegram to redeliver when the connection buffer is full", async () => {
      await supervisor.reconcile(binding("agent-a", "telegram"));
      const adapter = adapters[0];
      if (!(adapter instanceof FakePassiveAdapter)) {
        throw new Error("expected a passive adapter");
      }
      vi.spyOn(adapter, "ingest").mockReturnValue("busy");

      const reply = await request("POST", "/webhook/telegram/agent-a", {
        body: UPDATE,
        headers: { [TELEGRAM_SECRET_HEADER]: secretOf(0) },
      });

      expect(reply).toEqual({
        status: 503,
        body: { error: "busy", message: "Event buffer for telegram/agent-a is full" },
      });
    });

    it("rejects a payload that is not an update", async () => {
      await supervisor.reconcile(binding("agent-a", "telegram"));

      const reply = await request("POST", "/webhook/telegram/agent-a", {
        body: { hello: "world" },
        headers: { [TELEGRAM_SECRET_HEADER]: secretOf(0) },
      });

      expect(reply.status).toBe(400);
    });

    it("answers 404 for unknown agents and non-webhook platforms", async () => {
      await supervisor.reconcile(binding("agent-a", "discord"));

      expect((await request("POST", "/webhook/telegram/ghost", { body: UPDATE })).status).toBe(404);
      expect((await request("POST", "/webhook/discord/agent-a", { body: UPDATE })).status).toBe(404);
      expect((await request("POST", "/webhook/slack/agent-a", { body: UPDATE })).status).toBe(404);
    });

    it("answers 503 while the bound connection is not running", async () => {
      await supervisor.reconcile(binding("agent-a", "telegram", "disabled"));

      const reply = await request("POST", "/webhook/telegram/agent-a", { body: UPDATE });

      expect(reply).toEqual({
        status: 503,
        body: { error: "not_running", message: "Connection for telegram/agent-a is not running" },
      });
    });

    it("refuses bodies over the size limit", async () => {
      await supervisor.reconcile(binding("agent-a", "telegram"));

      const reply = await request("POST", "/webhook/telegram/agent-a", {
        body: { update_id: 1, padding: "x".repeat(2_000) },
        headers: { [TELEGRAM_SECRET_HEADER]: secretOf(0) },
      });

      expect(reply).toEqual({
        status: 413,
        body: { error: "payload_too_large", message: "Body exceeds 1024 bytes" },
      });
    });
  });

  describe("replies", () => {
    it("sends through the bound connection", async () => {
      await supervisor.reconcile(binding("agent-a", "telegram"));

      const reply = await request("POST", "/replies", {
        headers: AUTH,
        body: { agent_id: "agent-a", platform: "telegram", external_chat_id: "5", content: "hey" },
      });

      expect(reply).toEqual({ status: 200, body: { ok: true, version: 1, message_ids: ["1"] } });
    });

    it("reports a routing error for an agent without a binding", async () => {
      await supervisor.reconcile(binding("agent-a", "telegram"));

      const reply = await request("POST", "/replies", {
        headers: AUTH,
        body: { agent_id: "agent-x", platform: "telegram", external_chat_id: "5", content: "hey" },
      });

      expect(reply).toEqual({
        status: 503,
        body: {
          error: "routing_error",
          reason: "unknown_binding",
          message: "No telegram binding for agent agent-x",
        },
      });
    });

    it("validates the reply body", async () => {
      const reply = await request("POST", "/replies", {
        headers: AUTH,
        body: { agent_id: "agent-a", platform: "telegram", external_chat_id: "5" },
      });

      expect(reply).toEqual({
        status: 400,
        body: { error: "bad_request", message: "content: Required" },
      });
    });
  });

  describe("management", () => {
    it("requires the bearer token", async () => {
      expect(await request("GET", "/connections")).toEqual({
        status: 401,
        body: { error: "unauthorized", message: "Missing or invalid bearer token" },
      });
      expect(
        (await request("GET", "/connections", { headers: { authorization: "Bearer wrong" } })).status,
      ).toBe(401);
    });

    it("lists connection states", async () => {
      await supervisor.reconcile(binding("agent-a", "discord"));

      const reply = await request("GET", "/connections", { headers: AUTH });

      expect(reply.status).toBe(200);
      expect(reply.body).toMatchObject({
        connections: [{ agentId: "agent-a", platform: "discord", status: "running", boundVersion: 1 }],
      });
      expect((await request("GET", "/connections/agent-b/discord", { headers: AUTH })).status).toBe(
        404,
      );
    });

    it("restarts a connection on a fresh adapter", async () => {
      await supervisor.reconcile(binding("agent-a", "discord"));

      const reply = await request("POST", "/connections/agent-a/discord/restart", { headers: AUTH });

      expect(reply.status).toBe(200);
      expect(reply.body).toMatchObject({ connection: { status: "running" } });
      expect(adapters).toHaveLength(2);
    });

    it("creates, reads and removes bindings without exposing credentials", async () => {
      const put = await request("PUT", "/bindings/agent-b/discord", {
        headers: AUTH,
        body: { credentials: { botToken: "test-secret-bot" } },
      });
      const expected = {
        agentId: "agent-b",
        platform: "discord",
        desiredState: "enabled",
        version: 1,
        updatedAt: "2026-04-01T10:00:00.000Z",
        credentialKeys: ["botToken"],
      };
      expect(put).toEqual({ status: 200, body: { binding: expected } });
      expect(await request("GET", "/bindings", { headers: AUTH })).toEqual({
        status: 200,
        body: { bindings: [expected] },
      });

      const removed = await request("DELETE", "/bindings/agent-b/discord", { headers: AUTH });
      expect(removed).toEqual({ status: 200, body: { removed: true, version: 2 } });
      expect((await request("GET", "/bindings/agent-b/discord", { headers: AUTH })).status).toBe(404);
      expect((await request("PATCH", "/bindings/agent-b/discord", { headers: AUTH })).status).toBe(405);
    });

    it("rejects unknown fields in a binding body", async () => {
      const reply = await request("PUT", "/bindings/agent-b/telegram", {
        headers: AUTH,
        body: { credentials: { botToken: "t" }, owner: "me" },
      });
      expect(reply.status).toBe(400);
    });
  });

  it("serves health without auth", async () => {
    expect(await request("GET", "/health")).toEqual({
      status: 200,
      body: {
        status: "healthy",
        components: [{ name: "database", status: "healthy", lastCheck: NOW.toISOString() }],
      },
    });
  });
});
