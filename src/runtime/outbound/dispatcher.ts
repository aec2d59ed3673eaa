import { chunkForPlatform } from "../../utils/text-chunk";
import { logger } from "../../logger";
import { classifyError } from "../error-classify";
import { RateLimitedError, RoutingError } from "../errors";
import type { ConnectionHandle, ConnectionSupervisor } from "../supervisor/supervisor";
import { type MessageEnvelope, type Platform, createEnvelope } from "../types";

type HandleLocator = Pick<ConnectionSupervisor, "getBinding" | "getHandle" | "waitForRunning">;

export interface DispatchAck {
  envelope: MessageEnvelope;
  /** Binding version of the connection that sent the reply */
  version: number;
  messageIds: string[];
}

export interface OutboundDispatcherOptions {
  supervisor: HandleLocator;
  /** How long a reply waits for a connection that is (re)starting */
  routingWaitMs: number;
  now?: () => Date;
}

/**
 * Sends replies through the exact connection bound to (agentId, platform).
 */
export class OutboundDispatcher {
  private readonly now: () => Date;

  constructor(private readonly options: OutboundDispatcherOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async dispatch(
    agentId: string,
    platform: Platform,
    externalChatId: string,
    content: string,
    signal?: AbortSignal,
  ): Promise<DispatchAck> {
    const { supervisor } = this.options;
    const binding = supervisor.getBinding(agentId, platform);
    if (!binding) {
      throw new RoutingError("unknown_binding", `No ${platform} binding for agent ${agentId}`);
    }
    if (binding.desiredState === "disabled") {
      throw new RoutingError("binding_disabled", `${platform} binding for agent ${agentId} is disabled`);
    }

    const handle =
      supervisor.getHandle(agentId, platform) ??
      (await supervisor.waitForRunning(agentId, platform, this.options.routingWaitMs, signal));
    if (!handle) {
      throw new RoutingError(
        "not_running",
        `${platform} connection for agent ${agentId} is not running`,
      );
    }

    const messageIds: string[] = [];
    for (const chunk of chunkForPlatform(platform, content)) {
      messageIds.push(await this.sendChunk(handle, externalChatId, chunk, signal));
    }

    logger.debug(
      { agentId, platform, externalChatId, chunks: messageIds.length, version: handle.version },
      "Reply dispatched",
    );
    return {
      envelope: createEnvelope({
        platform,
        agentId,
        externalChatId,
        externalMessageId: messageIds[0] ?? "",
        senderId: agentId,
        content,
        attachments: [],
        direction: "outbound",
        timestamp: this.now(),
      }),
      version: handle.version,
      messageIds,
    };
  }

  /** One token per platform message; a 429 pauses the bucket and retries once. */
  private async sendChunk(
    handle: ConnectionHandle,
    externalChatId: string,
    chunk: string,
    signal?: AbortSignal,
  ): Promise<string> {
    for (let attempt = 1; ; attempt += 1) {
      await handle.bucket.acquire(signal);
      try {
        const receipt = await handle.adapter.send(externalChatId, chunk, signal);
        return receipt.messageId;
      } catch (err) {
        const classified = classifyError(err);
        if (!(classified instanceof RateLimitedError) || attempt > 1) {
          throw classified;
        }
        logger.warn(
          {
            agentId: handle.agentId,
            platform: handle.platform,
            retryAfterMs: classified.retryAfterMs,
          },
          "Platform rate limit hit; pausing connection bucket",
        );
        handle.bucket.pause(classified.retryAfterMs ?? 1_000);
      }
    }
  }
}
