import { logger } from "../../logger";
import { TransientNetworkError } from "../errors";
import type { MessageEnvelope } from "../types";

export interface ReasoningService {
  receiveMessage(envelope: MessageEnvelope, signal?: AbortSignal): Promise<void>;
}

/** Non-2xx answer from the reasoning service. */
export class ReasoningHttpError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    readonly retryAfterMs?: number,
  ) {
    super(`Reasoning service responded ${status}`);
    this.name = "ReasoningHttpError";
  }
}

export function isRetryableForwardError(err: unknown): boolean {
  if (err instanceof ReasoningHttpError) {
    return err.status === 429 || err.status >= 500;
  }
  return err instanceof TransientNetworkError;
}

export interface HttpReasoningClientOptions {
  baseUrl: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  fetch?: typeof fetch;
}

export class HttpReasoningClient implements ReasoningService {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpReasoningClientOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async receiveMessage(envelope: MessageEnvelope, signal?: AbortSignal): Promise<void> {
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.options.baseUrl}/receive_message`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          ...this.options.headers,
        },
        body: JSON.stringify({
          platform: envelope.platform,
          agent_id: envelope.agentId,
          external_chat_id: envelope.externalChatId,
          external_message_id: envelope.externalMessageId,
          sender_id: envelope.senderId,
          content: envelope.content,
        }),
        signal: controller.signal,
      });
    } catch (err) {
      throw new TransientNetworkError(
        controller.signal.aborted && !signal?.aborted
          ? `Reasoning service timed out after ${this.options.timeoutMs}ms`
          : "Reasoning service unreachable",
        { cause: err },
      );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }

    if (!response.ok) {
      const body = await response.text().catch((err: unknown) => {
        logger.debug({ err }, "Failed to read reasoning service error body");
        return "";
      });
      throw new ReasoningHttpError(response.status, body.slice(0, 500), parseRetryAfter(response));
    }
  }
}

function parseRetryAfter(response: Response): number | undefined {
  const raw = response.headers.get("retry-after");
  if (!raw) {
    return undefined;
  }
  const seconds = Number(raw);
  return Number.isFinite(seconds) && seconds >= 0 ? Math.ceil(seconds * 1000) : undefined;
}
