import type { BackoffSettings } from "../../config/settings";
import { logger } from "../../logger";
import type { RawPlatformEvent } from "../adapters/types";
import { sleep } from "../core/async";
import { computeBackoffDelay } from "../core/backoff";
import { KeyedMutex } from "../core/keyed-mutex";
import { formatError } from "../error-classify";
import type { ConnectionSource } from "../supervisor/supervisor";
import { type MessageEnvelope, type Platform, bindingKey } from "../types";
import type { DeadLetterEntry, DeadLetterSink } from "./dead-letter";
import { RecentIdCache } from "./dedup-cache";
import { type DropReason, normalizeEvent } from "./normalize";
import { ReasoningHttpError, type ReasoningService, isRetryableForwardError } from "./reasoning-client";

export type RouteOutcome =
  | { status: "accepted"; envelope: MessageEnvelope }
  | { status: "dropped"; reason: DropReason };

export interface InboundRouterOptions {
  reasoning: ReasoningService;
  deadLetters: DeadLetterSink;
  dedupCacheSize: number;
  maxAttempts: number;
  backoff: BackoffSettings;
  random?: () => number;
}

/**
 * Turns raw platform events into envelopes and forwards them to the
 * reasoning service. Envelopes of one external chat are forwarded strictly
 * in receipt order; chats proceed independently.
 */
export class InboundRouter {
  private readonly recent = new Map<string, RecentIdCache>();
  private readonly chats = new KeyedMutex();
  private readonly pending = new Set<Promise<void>>();
  private readonly random: () => number;
  private readonly stopController = new AbortController();
  private closed = false;

  constructor(private readonly options: InboundRouterOptions) {
    this.random = options.random ?? Math.random;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  onEvent(source: ConnectionSource, event: RawPlatformEvent): RouteOutcome {
    if (this.closed) {
      return { status: "dropped", reason: "router_closed" };
    }
    const normalized = normalizeEvent(source, event);
    if (!normalized.ok) {
      logger.debug(
        { agentId: source.agentId, platform: source.platform, reason: normalized.reason },
        "Inbound event dropped",
      );
      return { status: "dropped", reason: normalized.reason };
    }

    const { envelope } = normalized;
    const key = bindingKey(source.agentId, source.platform);
    let cache = this.recent.get(key);
    if (!cache) {
      cache = new RecentIdCache(this.options.dedupCacheSize);
      this.recent.set(key, cache);
    }
    if (!cache.remember(`${envelope.platform}:${envelope.externalMessageId}`)) {
      logger.debug(
        {
          agentId: envelope.agentId,
          platform: envelope.platform,
          externalMessageId: envelope.externalMessageId,
        },
        "Duplicate inbound message dropped",
      );
      return { status: "dropped", reason: "duplicate" };
    }

    this.track(
      this.chats
        .runExclusive(`${key}|${envelope.externalChatId}`, () => this.forward(envelope))
        .catch((err: unknown) => {
          logger.error(
            { err, agentId: envelope.agentId, platform: envelope.platform },
            "Inbound forward crashed",
          );
        }),
    );
    return { status: "accepted", envelope };
  }

  /**
   * Dead-letters an event its connection could not buffer. Events that would
   * have been dropped anyway (bot authors, unsupported updates) are ignored.
   */
  onOverflow(source: ConnectionSource, event: RawPlatformEvent): void {
    const normalized = normalizeEvent(source, event);
    if (!normalized.ok) {
      return;
    }
    const { envelope } = normalized;
    const log = {
      agentId: envelope.agentId,
      platform: envelope.platform,
      externalChatId: envelope.externalChatId,
      externalMessageId: envelope.externalMessageId,
    };
    logger.error({ ...log, reason: "buffer_full" }, "Dead-lettering envelope");
    this.track(
      this.writeDeadLetter({ envelope, reason: "buffer_full", attempts: 0, lastError: null }, log),
    );
  }

  /** Forgets the seen ids of a connection whose binding is gone. */
  forget(agentId: string, platform: Platform): void {
    this.recent.delete(bindingKey(agentId, platform));
  }

  /**
   * Stops accepting events and waits for queued forwards. Past `timeoutMs`
   * the remaining backoff waits are cut short, which sends those envelopes
   * to the dead-letter sink.
   */
  async drain(timeoutMs?: number): Promise<void> {
    this.closed = true;
    let timer: ReturnType<typeof setTimeout> | undefined;
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => this.stopController.abort(), timeoutMs);
    }
    try {
      while (this.pending.size > 0) {
        await Promise.allSettled([...this.pending]);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private async forward(envelope: MessageEnvelope): Promise<void> {
    const { maxAttempts, backoff } = this.options;
    const log = {
      agentId: envelope.agentId,
      platform: envelope.platform,
      externalChatId: envelope.externalChatId,
      externalMessageId: envelope.externalMessageId,
    };
    let lastError: unknown = null;
    let attempts = 0;
    let retryable = false;

    while (attempts < maxAttempts) {
      attempts += 1;
      try {
        await this.options.reasoning.receiveMessage(envelope, this.stopController.signal);
        logger.debug({ ...log, attempts }, "Inbound message forwarded");
        return;
      } catch (err) {
        lastError = err;
        retryable = isRetryableForwardError(err);
        if (!retryable || attempts >= maxAttempts || this.stopController.signal.aborted) {
          break;
        }
        const delayMs = Math.max(
          computeBackoffDelay(attempts, backoff, this.random),
          err instanceof ReasoningHttpError ? (err.retryAfterMs ?? 0) : 0,
        );
        logger.warn(
          { ...log, attempts, delayMs, error: formatError(err) },
          "Forward to reasoning service failed; retrying",
        );
        try {
          await sleep(delayMs, this.stopController.signal);
        } catch {
          // drain deadline passed
          break;
        }
      }
    }

    const reason = retryable ? "retries_exhausted" : "rejected";
    logger.error({ ...log, attempts, reason, error: formatError(lastError) }, "Dead-lettering envelope");
    await this.writeDeadLetter(
      {
        envelope,
        reason,
        attempts,
        lastError: lastError === null ? null : formatError(lastError),
      },
      log,
    );
  }

  private async writeDeadLetter(entry: DeadLetterEntry, log: Record<string, string>): Promise<void> {
    try {
      await this.options.deadLetters.record(entry);
    } catch (err) {
      logger.error({ ...log, err }, "Failed to write dead letter");
    }
  }

  private track(task: Promise<void>): void {
    this.pending.add(task);
    void task.finally(() => {
      this.pending.delete(task);
    });
  }
}
