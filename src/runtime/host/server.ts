import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { z } from "zod";
import { CredentialsSchema, DesiredStateSchema, PlatformSchema } from "../../config";
import { logger } from "../../logger";
import type { OutboundDispatcher } from "../outbound/dispatcher";
import type { TenantRegistry } from "../registry/tenant-registry";
import type { ConnectionSupervisor } from "../supervisor/supervisor";
import { RoutingError, isRelayError } from "../errors";
import { type AgentBotBinding, type Platform, isPlatform } from "../types";
import type { HealthCheck } from "./health";

export const TELEGRAM_SECRET_HEADER = "x-telegram-bot-api-secret-token";

const ReplyBodySchema = z
  .object({
    agent_id: z.string().min(1),
    platform: PlatformSchema,
    external_chat_id: z.string().min(1),
    content: z.string().min(1),
  })
  .strict();

const BindingBodySchema = z
  .object({
    credentials: CredentialsSchema,
    desiredState: DesiredStateSchema.optional(),
  })
  .strict();

export interface RelayHttpServerOptions {
  host: string;
  port: number;
  /** Bearer token for every route except webhooks and /health */
  authToken?: string;
  maxBodyBytes: number;
  supervisor: Pick<
    ConnectionSupervisor,
    "getBinding" | "getHandle" | "getState" | "listStates" | "restart"
  >;
  dispatcher: Pick<OutboundDispatcher, "dispatch">;
  registry: Pick<TenantRegistry, "put" | "remove" | "get" | "list">;
  health: Pick<HealthCheck, "check" | "getOverallStatus">;
}

class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

function publicBinding(binding: AgentBotBinding): Record<string, unknown> {
  return {
    agentId: binding.agentId,
    platform: binding.platform,
    desiredState: binding.desiredState,
    version: binding.version,
    updatedAt: binding.updatedAt.toISOString(),
    credentialKeys: Object.keys(binding.credentials).sort(),
  };
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new HttpError(400, "bad_request", "Malformed path segment");
  }
}

function parsePlatform(segment: string): Platform {
  if (!isPlatform(segment)) {
    throw new HttpError(404, "not_found", `Unknown platform ${segment}`);
  }
  return segment;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
}

/**
 * Webhook ingress, reply ingress and the management API on one node:http
 * server.
 */
export class RelayHttpServer {
  private server: Server | null = null;

  constructor(private readonly options: RelayHttpServerOptions) {}

  async start(): Promise<void> {
    if (this.server) {
      return;
    }
    const server = createServer(async (req, res) => {
      try {
        await this.handleRequest(req, res);
      } catch (error) {
        if (error instanceof HttpError) {
          this.writeJson(res, error.statusCode, { error: error.code, message: error.message });
          return;
        }
        logger.warn({ err: error, method: req.method, url: req.url }, "HTTP request failed");
        this.writeJson(res, 500, { error: "internal_error" });
      }
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    logger.info({ host: this.options.host, port: this.getPort() }, "HTTP server listening");
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeIdleConnections();
    });
  }

  getPort(): number | null {
    const address = this.server?.address();
    if (!address || typeof address === "string") {
      return null;
    }
    return address.port;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    const segments = url.pathname.split("/").filter(Boolean).map(decodeSegment);
    const [root, first, second, third] = segments;

    if (root === "webhook" && segments.length === 3 && first && second) {
      this.requireMethod(method, "POST");
      await this.handleWebhook(req, res, parsePlatform(first), second);
      return;
    }

    if (root === "health" && segments.length === 1) {
      this.requireMethod(method, "GET");
      const components = await this.options.health.check();
      const overall = this.options.health.getOverallStatus();
      this.writeJson(res, overall === "unhealthy" ? 503 : 200, { status: overall, components });
      return;
    }

    if (!this.isAuthorized(req)) {
      throw new HttpError(401, "unauthorized", "Missing or invalid bearer token");
    }

    if (root === "connections") {
      if (segments.length === 1) {
        this.requireMethod(method, "GET");
        this.writeJson(res, 200, { connections: this.options.supervisor.listStates() });
        return;
      }
      if (first && second && segments.length === 3) {
        this.requireMethod(method, "GET");
        const state = this.options.supervisor.getState(first, parsePlatform(second));
        if (!state) {
          throw new HttpError(404, "not_found", `No connection for ${second}/${first}`);
        }
        this.writeJson(res, 200, { connection: state });
        return;
      }
      if (first && second && third === "restart" && segments.length === 4) {
        this.requireMethod(method, "POST");
        const state = await this.options.supervisor.restart(first, parsePlatform(second));
        if (!state) {
          throw new HttpError(404, "not_found", `No binding for ${second}/${first}`);
        }
        this.writeJson(res, 200, { connection: state });
        return;
      }
    }

    if (root === "replies" && segments.length === 1) {
      this.requireMethod(method, "POST");
      await this.handleReply(req, res);
      return;
    }

    if (root === "bindings") {
      if (segments.length === 1) {
        this.requireMethod(method, "GET");
        this.writeJson(res, 200, { bindings: this.options.registry.list().map(publicBinding) });
        return;
      }
      if (first && second && segments.length === 3) {
        await this.handleBinding(req, res, method, first, parsePlatform(second));
        return;
      }
    }

    throw new HttpError(404, "not_found", `No route for ${method} ${url.pathname}`);
  }

  private async handleWebhook(
    req: IncomingMessage,
    res: ServerResponse,
    platform: Platform,
    agentId: string,
  ): Promise<void> {
    const { supervisor } = this.options;
    const binding = supervisor.getBinding(agentId, platform);
    if (!binding || platform !== "telegram") {
      throw new HttpError(404, "not_found", `No webhook binding for ${platform}/${agentId}`);
    }
    const handle = supervisor.getHandle(agentId, platform);
    if (!handle) {
      throw new HttpError(503, "not_running", `Connection for ${platform}/${agentId} is not running`);
    }
    const adapter = handle.adapter;
    if (adapter.kind !== "passive") {
      throw new HttpError(404, "not_found", `Connection for ${platform}/${agentId} takes no webhooks`);
    }

    const body = await this.readJsonBody(req);
    const header = req.headers[TELEGRAM_SECRET_HEADER];
    const result = adapter.ingest(body, typeof header === "string" ? header : undefined);
    switch (result) {
      case "accepted":
        this.writeJson(res, 200, { ok: true });
        return;
      case "busy":
        // Non-2xx makes Telegram redeliver the update later.
        throw new HttpError(503, "busy", `Event buffer for ${platform}/${agentId} is full`);
      case "unauthorized":
        throw new HttpError(401, "unauthorized", "Webhook secret mismatch");
      case "not_running":
        throw new HttpError(503, "not_running", `Connection for ${platform}/${agentId} is not running`);
      case "invalid":
        throw new HttpError(400, "bad_request", "Payload is not a platform update");
    }
  }

  private async handleReply(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const parsed = ReplyBodySchema.safeParse(await this.readJsonBody(req));
    if (!parsed.success) {
      throw new HttpError(400, "bad_request", formatIssues(parsed.error));
    }
    const reply = parsed.data;
    try {
      const ack = await this.options.dispatcher.dispatch(
        reply.agent_id,
        reply.platform,
        reply.external_chat_id,
        reply.content,
      );
      this.writeJson(res, 200, {
        ok: true,
        version: ack.version,
        message_ids: ack.messageIds,
      });
    } catch (err) {
      if (err instanceof RoutingError) {
        this.writeJson(res, 503, { error: "routing_error", reason: err.reason, message: err.message });
        return;
      }
      if (isRelayError(err)) {
        this.writeJson(res, 502, { error: err.kind, message: err.message });
        return;
      }
      throw err;
    }
  }

  private async handleBinding(
    req: IncomingMessage,
    res: ServerResponse,
    method: string,
    agentId: string,
    platform: Platform,
  ): Promise<void> {
    const { registry } = this.options;
    if (method === "GET") {
      const binding = registry.get(agentId, platform);
      if (!binding) {
        throw new HttpError(404, "not_found", `No binding for ${platform}/${agentId}`);
      }
      this.writeJson(res, 200, { binding: publicBinding(binding) });
      return;
    }
    if (method === "PUT") {
      const parsed = BindingBodySchema.safeParse(await this.readJsonBody(req));
      if (!parsed.success) {
        throw new HttpError(400, "bad_request", formatIssues(parsed.error));
      }
      const binding = registry.put({
        agentId,
        platform,
        credentials: parsed.data.credentials,
        desiredState: parsed.data.desiredState,
      });
      this.writeJson(res, 200, { binding: publicBinding(binding) });
      return;
    }
    if (method === "DELETE") {
      const removed = registry.remove(agentId, platform);
      if (!removed) {
        throw new HttpError(404, "not_found", `No binding for ${platform}/${agentId}`);
      }
      this.writeJson(res, 200, { removed: true, version: removed.version });
      return;
    }
    throw new HttpError(405, "method_not_allowed", `${method} is not allowed here`);
  }

  private requireMethod(method: string, expected: string): void {
    if (method !== expected) {
      throw new HttpError(405, "method_not_allowed", `${method} is not allowed here`);
    }
  }

  private isAuthorized(req: IncomingMessage): boolean {
    const expected = this.options.authToken?.trim();
    if (!expected) {
      return true;
    }
    const auth = req.headers.authorization;
    const bearer =
      typeof auth === "string" && auth.startsWith("Bearer ") ? auth.slice(7) : undefined;
    return bearer === expected;
  }

  private async readJsonBody(req: IncomingMessage): Promise<unknown> {
    const limit = this.options.maxBodyBytes;
    const declared = Number(req.headers["content-length"]);
    if (Number.isFinite(declared) && declared > limit) {
      throw new HttpError(413, "payload_too_large", `Body exceeds ${limit} bytes`);
    }
    const chunks: Buffer[] = [];
    let size = 0;
    for await (const chunk of req) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buffer.length;
      if (size > limit) {
        throw new HttpError(413, "payload_too_large", `Body exceeds ${limit} bytes`);
      }
      chunks.push(buffer);
    }
    const raw = Buffer.concat(chunks).toString("utf8").trim();
    if (!raw) {
      return {};
    }
    try {
      return JSON.parse(raw);
    } catch {
      throw new HttpError(400, "bad_request", "Body is not valid JSON");
    }
  }

  private writeJson(res: ServerResponse, statusCode: number, body: Record<string, unknown>): void {
    res.statusCode = statusCode;
    res.setHeader("content-type", "application/json; charset=utf-8");
    res.end(JSON.stringify(body));
  }
}
