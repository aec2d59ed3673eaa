import { type Mock, afterEach, describe, expect, it, vi } from "vitest";
import type { EffectiveRelaySettings } from "../../config/settings";
import type { PlatformAdapter } from "../adapters/adapter";
import { TelegramAdapter } from "../adapters/telegram/adapter";
import type { RawPlatformEvent } from "../adapters/types";
import { createDeferred } from "../core/async";
import { TransientNetworkError } from "../errors";
import {
  type FakeBehavior,
  FakeActiveAdapter,
  FakePassiveAdapter,
  fakeContext,
  hangUntilAborted,
} from "../testing/fake-adapters";
import type { AgentBotBinding, DesiredState } from "../types";
import { type ConnectionSource, ConnectionSupervisor } from "./supervisor";

vi.mock("../../logger", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), fatal: vi.fn() },
}));

const SETTINGS: EffectiveRelaySettings["supervisor"] = {
  maxRetries: 2,
  backoff: { baseMs: 5, capMs: 5, jitterRatio: 0 },
  healthIntervalMs: 60_000,
  shutdownGraceMs: 100,
  timeouts: { connectMs: 500, sendMs: 500, disconnectMs: 100, healthMs: 100 },
};

const RATE_LIMITS: EffectiveRelaySettings["outbound"]["rateLimits"] = {
  discord: { ratePerSecond: 100, burst: 100 },
  telegram: { ratePerSecond: 100, burst: 100 },
};

function binding(
  version: number,
  overrides: Partial<Pick<AgentBotBinding, "agentId" | "platform" | "credentials">> & {
    desiredState?: DesiredState;
  } = {},
): AgentBotBinding {
  return {
    agentId: overrides.agentId ?? "agent-a",
    platform: overrides.platform ?? "discord",
    credentials: overrides.credentials ?? { botToken: `tok-${version}` },
    desiredState: overrides.desiredState ?? "enabled",
    version,
    updatedAt: new Date("2026-01-01T00:00:00.000Z"),
  };
}

type Harness = {
  supervisor: ConnectionSupervisor;
  adapters: FakeActiveAdapter[];
  sink: Mock<(source: ConnectionSource, event: RawPlatformEvent) => void>;
  maxLive: () => number;
};

function createHarness(behaviors: FakeBehavior[] = []): Harness {
  const adapters: FakeActiveAdapter[] = [];
  let maxLive = 0;
  const sink = vi.fn<(source: ConnectionSource, event: RawPlatformEvent) => void>();
  const supervisor = new ConnectionSupervisor({
    settings: SETTINGS,
    rateLimits: RATE_LIMITS,
    random: () => 0.5,
    sink,
    createAdapter: (b) => {
      const adapter = new FakeActiveAdapter(fakeContext(b), behaviors[adapters.length] ?? {});
      adapters.push(adapter);
      return adapter;
    },
  });
  supervisor.on("state", () => {
    const live = adapters.filter((adapter) => adapter.isConnected()).length;
    maxLive = Math.max(maxLive, live);
  });
  return { supervisor, adapters, sink, maxLive: () => maxLive };
}

let active: ConnectionSupervisor | null = null;

function track(harness: Harness): Harness {
  active = harness.supervisor;
  return harness;
}

afterEach(async () => {
  await active?.shutdownAll(0);
  active = null;
});

describe("ConnectionSupervisor", () => {
  it("starts an enabled binding and reports it running", async () => {
    const { supervisor, adapters } = track(createHarness());

    const state = await supervisor.reconcile(binding(1));

    expect(state.status).toBe("running");
    expect(state.boundVersion).toBe(1);
    expect(adapters).toHaveLength(1);
    expect(adapters[0]?.credentials).toEqual({ botToken: "tok-1" });
    expect(supervisor.getHandle("agent-a", "discord")?.version).toBe(1);
  });

  it("ignores versions that are not newer than the last applied one", async () => {
    const { supervisor, adapters } = track(createHarness());
    await supervisor.reconcile(binding(2));

    const stale = await supervisor.reconcile(binding(1));
    const equal = await supervisor.reconcile(binding(2, { credentials: { botToken: "other" } }));

    expect(stale.boundVersion).toBe(2);
    expect(equal.boundVersion).toBe(2);
    expect(adapters).toHaveLength(1);
    expect(adapters[0]?.credentials).toEqual({ botToken: "tok-2" });
  });

  it("keeps at most one live connection when versions race", async () => {
    const { supervisor, adapters, maxLive } = track(
      createHarness([{ open: (signal) => hangUntilAborted(signal) }]),
    );

    const first = supervisor.reconcile(binding(1));
    await vi.waitFor(() => {
      expect(supervisor.getState("agent-a", "discord")?.status).toBe("starting");
    });
    const second = supervisor.reconcile(binding(2));
    const third = supervisor.reconcile(binding(3));
    await Promise.all([first, second, third]);

    expect(supervisor.getState("agent-a", "discord")?.status).toBe("running");
    expect(adapters.map((adapter) => adapter.credentials?.botToken)).toEqual(["tok-1", "tok-3"]);
    expect(adapters[0]?.getStatus()).toBe("closed");
    expect(maxLive()).toBe(1);
  });

  it("rotates credentials by stopping the old connection before starting the new one", async () => {
    const { supervisor, adapters } = track(createHarness());
    await supervisor.reconcile(binding(1));

    await Promise.all([supervisor.reconcile(binding(2)), supervisor.reconcile(binding(3))]);

    expect(adapters.map((adapter) => adapter.credentials?.botToken)).toEqual(["tok-1", "tok-3"]);
    expect(adapters[0]?.tornDown).toBe(true);
    const handle = supervisor.getHandle("agent-a", "discord");
    await handle?.adapter.send("chan-9", "after rotation");
    expect(adapters[1]?.sent).toEqual([
      { chatId: "chan-9", content: "after rotation", token: "tok-3" },
    ]);
    expect(adapters[0]?.sent).toEqual([]);
  });

  it("rebinds the version without reconnecting when credentials are unchanged", async () => {
    const { supervisor, adapters } = track(createHarness());
    await supervisor.reconcile(binding(1, { credentials: { botToken: "same" } }));

    const state = await supervisor.reconcile(binding(2, { credentials: { botToken: "same" } }));

    expect(adapters).toHaveLength(1);
    expect(state.boundVersion).toBe(2);
    expect(supervisor.getHandle("agent-a", "discord")?.version).toBe(2);
  });

  it("stops the connection when the binding is disabled", async () => {
    const { supervisor, adapters } = track(createHarness());
    await supervisor.reconcile(binding(1));

    const state = await supervisor.reconcile(binding(2, { desiredState: "disabled" }));

    expect(state.status).toBe("stopped");
    expect(adapters[0]?.getStatus()).toBe("closed");
    expect(supervisor.getHandle("agent-a", "discord")).toBeNull();
    expect(supervisor.getBinding("agent-a", "discord")?.desiredState).toBe("disabled");
  });

  it("forgets removed keys and stays deaf to their stale versions", async () => {
    const { supervisor, adapters } = track(createHarness());
    await supervisor.reconcile(binding(1));

    const removed = vi.fn();
    supervisor.on("removed", removed);

    await supervisor.remove("agent-a", "discord", 2);
    expect(removed).toHaveBeenCalledWith({ agentId: "agent-a", platform: "discord" });
    expect(supervisor.getState("agent-a", "discord")).toBeNull();
    expect(adapters[0]?.getStatus()).toBe("closed");

    await supervisor.reconcile(binding(1));
    expect(adapters).toHaveLength(1);

    const recreated = await supervisor.reconcile(binding(3));
    expect(recreated.status).toBe("running");
    expect(adapters).toHaveLength(2);
  });

  it("does not retry a malformed Telegram token", async () => {
    const createAdapter = vi.fn(
      (b: AgentBotBinding): PlatformAdapter =>
        new TelegramAdapter(fakeContext(b), { publicBaseUrl: "https://relay.example.test" }),
    );
    const supervisor = new ConnectionSupervisor({
      settings: SETTINGS,
      rateLimits: RATE_LIMITS,
      sink: vi.fn(),
      createAdapter,
    });
    active = supervisor;

    const state = await supervisor.reconcile(
      binding(1, { platform: "telegram", credentials: { botToken: "not-a-token" } }),
    );

    expect(state.status).toBe("error");
    expect(state.lastError).toMatchObject({ kind: "credential_invalid", permanent: true });
    expect(state.retryCount).toBe(0);
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(createAdapter).toHaveBeenCalledTimes(1);
    expect(supervisor.getState("agent-a", "telegram")?.status).toBe("error");
  });

  it("detects a silently dropped socket on the next probe and reconnects", async () => {
    const { supervisor, adapters } = track(createHarness());
    await supervisor.reconcile(binding(1));

    adapters[0]?.dropSocket();
    await supervisor.healthCheck();

    const afterProbe = supervisor.getState("agent-a", "discord");
    expect(afterProbe?.status).toBe("error");
    expect(afterProbe?.retryCount).toBe(1);
    expect(afterProbe?.lastError?.kind).toBe("transient_network");

    await vi.waitFor(() => {
      expect(supervisor.getState("agent-a", "discord")?.status).toBe("running");
    });
    expect(adapters).toHaveLength(2);
    expect(supervisor.getState("agent-a", "discord")?.retryCount).toBe(0);
  });

  it("gives up after maxRetries consecutive transient failures", async () => {
    const failing: FakeBehavior = {
      open: async () => {
        throw new TransientNetworkError("gateway unreachable");
      },
    };
    const { supervisor, adapters } = track(createHarness([failing, failing, failing, failing]));

    await supervisor.reconcile(binding(1));

    await vi.waitFor(() => {
      expect(supervisor.getState("agent-a", "discord")?.status).toBe("stopped");
    });
    const state = supervisor.getState("agent-a", "discord");
    expect(state?.retryCount).toBe(3);
    expect(state?.lastError?.message).toBe("gateway unreachable");
    expect(adapters).toHaveLength(3);
  });

  it("restarts on operator request even after giving up", async () => {
    const failing: FakeBehavior = {
      open: async () => {
        throw new TransientNetworkError("gateway unreachable");
      },
    };
    const { supervisor, adapters } = track(createHarness([failing, failing, failing]));
    await supervisor.reconcile(binding(1));
    await vi.waitFor(() => {
      expect(supervisor.getState("agent-a", "discord")?.status).toBe("stopped");
    });

    const state = await supervisor.restart("agent-a", "discord");

    expect(state?.status).toBe("running");
    expect(state?.retryCount).toBe(0);
    expect(state?.lastError).toBeNull();
    expect(adapters).toHaveLength(4);
    expect(await supervisor.restart("ghost", "discord")).toBeNull();
  });

  it("lets an in-flight send finish during a graceful stop", async () => {
    const reply = createDeferred<{ messageId: string }>();
    const { supervisor } = track(createHarness([{ deliver: () => reply.promise }]));
    await supervisor.reconcile(binding(1));
    const handle = supervisor.getHandle("agent-a", "discord");
    const sending = handle?.adapter.send("chan-1", "slow reply");

    const removing = supervisor.remove("agent-a", "discord", 2);
    reply.resolve({ messageId: "m-42" });

    await expect(sending).resolves.toEqual({ messageId: "m-42" });
    await removing;
    expect(handle?.adapter.getStatus()).toBe("closed");
  });

  it("aborts a send still in flight once the shutdown grace passes", async () => {
    const { supervisor } = track(
      createHarness([{ deliver: (_chat, _content, signal) => hangUntilAborted(signal) }]),
    );
    await supervisor.reconcile(binding(1));
    const outcome = supervisor
      .getHandle("agent-a", "discord")
      ?.adapter.send("chan-1", "stuck")
      .catch((err: unknown) => err);

    const startedAt = Date.now();
    await supervisor.shutdownAll(20);

    expect(await outcome).toBeInstanceOf(TransientNetworkError);
    expect(Date.now() - startedAt).toBeLessThan(1_000);
    expect(supervisor.getState("agent-a", "discord")?.status).toBe("stopped");
  });

  it("keeps pumping events after the sink throws", async () => {
    const { supervisor, adapters, sink } = track(createHarness());
    sink.mockImplementationOnce(() => {
      throw new Error("handler bug");
    });
    await supervisor.reconcile(binding(4));

    adapters[0]?.push({ messageId: "1" });
    adapters[0]?.push({ messageId: "2" });

    await vi.waitFor(() => {
      expect(sink).toHaveBeenCalledTimes(2);
    });
    const [source] = sink.mock.calls[1] ?? [];
    expect(source).toEqual({ agentId: "agent-a", platform: "discord", version: 4 });
  });

  it("forwards events an active connection could not buffer", async () => {
    const onOverflow = vi.fn<(source: ConnectionSource, event: RawPlatformEvent) => void>();
    const adapters: FakeActiveAdapter[] = [];
    const supervisor = new ConnectionSupervisor({
      settings: SETTINGS,
      rateLimits: RATE_LIMITS,
      sink: vi.fn(),
      onOverflow,
      createAdapter: (b) => {
        const adapter = new FakeActiveAdapter(fakeContext(b));
        adapters.push(adapter);
        return adapter;
      },
    });
    active = supervisor;
    await supervisor.reconcile(binding(7));
    const dropped: RawPlatformEvent = {
      platform: "discord",
      receivedAt: new Date("2026-01-01T00:00:00.000Z"),
      message: {
        messageId: "lost-1",
        channelId: "chan-1",
        authorId: "user-1",
        authorBot: false,
        content: "hello",
        timestamp: "2026-01-01T00:00:00.000Z",
        attachments: [],
      },
    };

    adapters[0]?.emit("overflow", dropped);

    expect(onOverflow).toHaveBeenCalledWith(
      { agentId: "agent-a", platform: "discord", version: 7 },
      dropped,
    );
  });

  it("runs keys independently", async () => {
    const gate = createDeferred<void>();
    const { supervisor } = track(createHarness([{ open: () => gate.promise }]));

    const slow = supervisor.reconcile(binding(1, { agentId: "slow" }));
    const fast = await supervisor.reconcile(binding(1, { agentId: "fast" }));

    expect(fast.status).toBe("running");
    expect(supervisor.getState("slow", "discord")?.status).toBe("starting");
    gate.resolve();
    expect((await slow).status).toBe("running");
  });

  it("resolves waitForRunning once a restarting key comes back", async () => {
    const gate = createDeferred<void>();
    const { supervisor } = track(createHarness([{}, { open: () => gate.promise }]));
    await supervisor.reconcile(binding(1));
    const rotating = supervisor.reconcile(binding(2));
    await vi.waitFor(() => {
      expect(supervisor.getState("agent-a", "discord")?.status).toBe("starting");
    });

    const waiting = supervisor.waitForRunning("agent-a", "discord", 1_000);
    gate.resolve();

    expect((await waiting)?.version).toBe(2);
    await rotating;
    expect(await supervisor.waitForRunning("ghost", "telegram", 10)).toBeNull();
  });

  it("routes passive adapters through the same lifecycle", async () => {
    const supervisor = new ConnectionSupervisor({
      settings: SETTINGS,
      rateLimits: RATE_LIMITS,
      sink: vi.fn(),
      createAdapter: (b) => new FakePassiveAdapter(fakeContext(b)),
    });
    active = supervisor;

    await supervisor.reconcile(binding(1, { platform: "telegram" }));

    const adapter = supervisor.getHandle("agent-a", "telegram")?.adapter;
    expect(adapter?.kind).toBe("passive");
  });
});
