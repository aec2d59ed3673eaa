import { randomBytes, timingSafeEqual } from "node:crypto";
import { EventEmitter } from "node:events";
import { logger } from "../../logger";
import { abortReason, raceTimeout, withDeadline } from "../core/async";
import { EventChannel } from "../core/event-channel";
import { AdapterCrashError, TransientNetworkError } from "../errors";
import type { BindingCredentials, Platform } from "../types";
import type {
  AdapterContext,
  AdapterLiveness,
  AdapterStatus,
  IngestResult,
  RawPlatformEvent,
  SendReceipt,
} from "./types";

const EVENT_BUFFER_CAPACITY = 1_000;

/**
 * Lifecycle shared by both transport models. One instance serves exactly one
 * connection attempt: after it is closed a new adapter must be created.
 *
 * Events:
 * - 'status' - (status: AdapterStatus) => void
 * - 'error'  - (error: Error) => void, only emitted when a listener exists
 */
export abstract class BaseAdapter extends EventEmitter {
  abstract readonly kind: "active" | "passive";
  readonly platform: Platform;
  readonly agentId: string;

  protected status: AdapterStatus = "idle";
  private readonly channel = new EventChannel<RawPlatformEvent>(EVENT_BUFFER_CAPACITY);
  private readonly inFlight = new Set<Promise<unknown>>();
  private readonly sendControllers = new Set<AbortController>();
  private accepting = false;

  constructor(protected readonly context: AdapterContext) {
    super();
    this.platform = context.platform;
    this.agentId = context.agentId;
  }

  /** Opens the platform session; resolves once it can receive and send. */
  protected abstract open(signal: AbortSignal, credentials: BindingCredentials): Promise<void>;

  protected abstract deliver(
    externalChatId: string,
    content: string,
    signal: AbortSignal,
  ): Promise<SendReceipt>;

  /** Releases platform resources. Called at most once. */
  protected abstract teardown(signal: AbortSignal): Promise<void>;

  protected abstract checkLiveness(signal: AbortSignal): Promise<AdapterLiveness>;

  getStatus(): AdapterStatus {
    return this.status;
  }

  isConnected(): boolean {
    return this.status === "connected";
  }

  get pendingSends(): number {
    return this.inFlight.size;
  }

  async connect(signal: AbortSignal, credentials: BindingCredentials): Promise<void> {
    if (this.status !== "idle") {
      throw new AdapterCrashError(`${this.platform} adapter for ${this.agentId} was already used`);
    }
    this.setStatus("connecting");
    try {
      await this.open(signal, credentials);
      if (signal.aborted) {
        throw abortReason(signal);
      }
    } catch (err) {
      await this.close();
      throw err;
    }
    this.accepting = true;
    this.setStatus("connected");
  }

  events(): AsyncIterable<RawPlatformEvent> {
    return this.channel;
  }

  async send(externalChatId: string, content: string, signal?: AbortSignal): Promise<SendReceipt> {
    if (!this.accepting) {
      throw new TransientNetworkError(
        `${this.platform} connection for ${this.agentId} is not accepting sends`,
      );
    }

    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener("abort", onCallerAbort, { once: true });
    }
    this.sendControllers.add(controller);

    const task = withDeadline(
      this.context.sendTimeoutMs,
      (deadline) => this.deliver(externalChatId, content, deadline),
      {
        parent: controller.signal,
        timeoutError: () =>
          new TransientNetworkError(
            `${this.platform} send timed out after ${this.context.sendTimeoutMs}ms`,
          ),
      },
    );
    this.inFlight.add(task);
    try {
      return await task;
    } finally {
      this.inFlight.delete(task);
      this.sendControllers.delete(controller);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  /**
   * Stops accepting sends, gives in-flight sends up to `timeoutMs` to finish,
   * aborts whatever is left and releases the session.
   */
  async disconnectGracefully(signal: AbortSignal, timeoutMs: number): Promise<void> {
    if (this.status === "closed" || this.status === "draining") {
      return;
    }
    this.accepting = false;
    this.setStatus("draining");

    const pending = [...this.inFlight];
    if (pending.length > 0) {
      const outcome = await raceTimeout(Promise.allSettled(pending), signal.aborted ? 0 : timeoutMs);
      if (outcome.timedOut) {
        logger.warn(
          { agentId: this.agentId, platform: this.platform, pending: pending.length },
          "Aborting in-flight sends past the drain timeout",
        );
        this.abortSends();
        await Promise.allSettled(pending);
      }
    }

    await this.close();
  }

  /** Immediate teardown: aborts sends, skips draining. */
  async forceClose(): Promise<void> {
    this.accepting = false;
    this.abortSends();
    await this.close();
  }

  async probe(signal: AbortSignal): Promise<AdapterLiveness> {
    if (this.status !== "connected") {
      return { alive: false, detail: `adapter is ${this.status}` };
    }
    return this.checkLiveness(signal);
  }

  /** Hands a platform event to the consumer; false once closed or full. */
  protected emitEvent(event: RawPlatformEvent): boolean {
    if (this.status === "closed") {
      return false;
    }
    const accepted = this.channel.push(event);
    if (!accepted) {
      logger.warn(
        { agentId: this.agentId, platform: this.platform, buffered: this.channel.size },
        "Dropping platform event: event buffer is full",
      );
    }
    return accepted;
  }

  protected setStatus(status: AdapterStatus): void {
    this.status = status;
    this.emit("status", status);
  }

  protected emitError(error: Error): void {
    if (this.listenerCount("error") === 0) {
      return;
    }
    this.emit("error", error);
  }

  private abortSends(): void {
    for (const controller of this.sendControllers) {
      controller.abort(
        new TransientNetworkError(`${this.platform} connection for ${this.agentId} is closing`),
      );
    }
  }

  private async close(): Promise<void> {
    if (this.status === "closed") {
      return;
    }
    this.setStatus("closed");
    this.channel.close();
    const controller = new AbortController();
    const outcome = await raceTimeout(
      this.teardown(controller.signal).catch((err: unknown) => {
        logger.warn(
          { err, agentId: this.agentId, platform: this.platform },
          "Adapter teardown failed",
        );
      }),
      this.context.disconnectTimeoutMs,
    );
    if (outcome.timedOut) {
      controller.abort();
      logger.warn(
        { agentId: this.agentId, platform: this.platform },
        "Adapter teardown did not finish in time",
      );
    }
  }
}

/**
 * Keeps a socket open to the platform. Silent socket loss is recorded by the
 * subclass and reported by the next probe.
 *
 * Events:
 * - 'overflow' - (event: RawPlatformEvent) => void, an event the full buffer
 *   could not take; the platform will not deliver it again
 */
export abstract class ActiveAdapter extends BaseAdapter {
  readonly kind = "active" as const;
  private lost: { reason: string; error?: unknown } | null = null;

  protected emitEvent(event: RawPlatformEvent): boolean {
    const accepted = super.emitEvent(event);
    if (!accepted && this.status !== "closed") {
      this.emit("overflow", event);
    }
    return accepted;
  }

  protected markConnectionLost(reason: string, error?: unknown): void {
    if (this.lost) {
      return;
    }
    this.lost = { reason, error };
    logger.warn({ agentId: this.agentId, platform: this.platform, reason }, "Connection lost");
    this.emitError(error instanceof Error ? error : new TransientNetworkError(reason));
  }

  protected async checkLiveness(signal: AbortSignal): Promise<AdapterLiveness> {
    if (this.lost) {
      return { alive: false, detail: this.lost.reason, error: this.lost.error };
    }
    return this.checkSocket(signal);
  }

  protected abstract checkSocket(signal: AbortSignal): Promise<AdapterLiveness>;
}

/**
 * Receives platform pushes through the HTTP webhook route instead of a
 * socket. Each connection registers its own secret; `ingest` rejects updates
 * that do not present it.
 */
export abstract class PassiveAdapter extends BaseAdapter {
  readonly kind = "passive" as const;
  private secret: Buffer | null = null;

  ingest(payload: unknown, presentedSecret: string | undefined): IngestResult {
    if (!this.secret) {
      return "not_running";
    }
    if (!presentedSecret || !secretsMatch(this.secret, presentedSecret)) {
      return "unauthorized";
    }
    if (!this.isConnected()) {
      return "not_running";
    }
    const event = this.toRawEvent(payload);
    if (!event) {
      return "invalid";
    }
    return this.emitEvent(event) ? "accepted" : "busy";
  }

  protected issueSecret(): string {
    const token = randomBytes(24).toString("hex");
    this.secret = Buffer.from(token, "utf8");
    return token;
  }

  protected revokeSecret(): void {
    this.secret = null;
  }

  protected abstract toRawEvent(payload: unknown): RawPlatformEvent | null;
}

function secretsMatch(expected: Buffer, presented: string): boolean {
  const candidate = Buffer.from(presented, "utf8");
  return candidate.length === expected.length && timingSafeEqual(candidate, expected);
}

export type PlatformAdapter = ActiveAdapter | PassiveAdapter;
