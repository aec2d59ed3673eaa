import {
  AdapterCrashError,
  CredentialInvalidError,
  MisconfiguredError,
  RateLimitedError,
  type RelayError,
  TransientNetworkError,
  isRelayError,
} from "./errors";

const RECOVERABLE_ERROR_CODES = new Set([
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
  "ABORT_ERR",
]);

const RECOVERABLE_TEXT_RE =
  /enotfound|eai_again|timed?\s*out|econnreset|connection\s*reset|fetch failed|socket|temporar(y|ily)|network\s*error|dns|getaddrinfo|unavailable|gateway\s*timeout|bad\s*gateway/i;

const AUTH_TEXT_RE = /authentication failed|invalid token|unauthorized|\b4004\b/i;

const RETRYABLE_STATUS = new Set([408, 425, 500, 502, 503, 504]);
const AUTH_STATUS = new Set([401, 403]);

// Gateway close codes that no reconnect can fix.
const DISCORD_AUTH_CLOSE_CODES = new Set([4004]);
const DISCORD_CONFIG_CLOSE_CODES = new Set([4010, 4011, 4012, 4013, 4014]);

type UnknownRecord = Record<string, unknown>;

function asRecord(value: unknown): UnknownRecord | null {
  if (!value || typeof value !== "object") {
    return null;
  }
  return value as UnknownRecord;
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function readNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function normalizeCode(code: unknown): string | undefined {
  const raw = readString(code);
  return raw ? raw.toUpperCase() : undefined;
}

function collectErrorLikeChain(err: unknown): UnknownRecord[] {
  const chain: UnknownRecord[] = [];
  const queue: unknown[] = [err];
  const seen = new Set<unknown>();

  while (queue.length > 0) {
    const item = queue.shift();
    if (!item || seen.has(item)) {
      continue;
    }
    seen.add(item);

    const record = asRecord(item);
    if (!record) {
      continue;
    }
    chain.push(record);

    const nested = [record.error, record.cause, record.response, record.err];
    for (const value of nested) {
      if (value && typeof value === "object") {
        queue.push(value);
      }
    }
  }

  return chain;
}

export function redactSecrets(value: string): string {
  return value
    .replace(/bot\d+:[A-Za-z0-9_-]+/g, "bot<redacted>")
    .replace(/\b\d{5,}:[A-Za-z0-9_-]{30,}\b/g, "<redacted>")
    .replace(/\bBot\s+[A-Za-z0-9._-]{20,}/g, "Bot <redacted>")
    .replace(/\b[A-Za-z0-9_-]{23,28}\.[A-Za-z0-9_-]{6,7}\.[A-Za-z0-9_-]{27,}\b/g, "<redacted>");
}

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return redactSecrets(err.message);
  }
  if (typeof err === "string") {
    return redactSecrets(err);
  }
  try {
    return redactSecrets(JSON.stringify(err));
  } catch {
    return redactSecrets(String(err));
  }
}

function readStatus(record: UnknownRecord): number | undefined {
  return (
    readNumber(record.statusCode) ??
    readNumber(record.status) ??
    readNumber(record.error_code) ??
    readNumber(record.errorCode)
  );
}

function readRetryAfterMs(record: UnknownRecord): number | undefined {
  const parameters = asRecord(record.parameters);
  const seconds = readNumber(parameters?.retry_after) ?? readNumber(record.retry_after);
  return seconds === undefined ? undefined : Math.ceil(seconds * 1000);
}

function readText(record: UnknownRecord): string {
  return [record.message, record.description, record.reason]
    .map(readString)
    .filter((value): value is string => Boolean(value))
    .join(" ");
}

export function isRecoverableNetworkError(err: unknown): boolean {
  for (const record of collectErrorLikeChain(err)) {
    const code =
      normalizeCode(record.code) ?? normalizeCode(record.errno) ?? normalizeCode(record.type);
    if (code && RECOVERABLE_ERROR_CODES.has(code)) {
      return true;
    }

    const status = readStatus(record);
    if (status && (RETRYABLE_STATUS.has(status) || status === 429)) {
      return true;
    }

    const message = readText(record);
    if (message && RECOVERABLE_TEXT_RE.test(message)) {
      return true;
    }
  }

  return RECOVERABLE_TEXT_RE.test(formatError(err));
}

/**
 * Maps anything thrown by a platform SDK, fetch or the gateway into the relay
 * error taxonomy. Messages are redacted.
 */
export function classifyError(err: unknown): RelayError {
  if (isRelayError(err)) {
    return err;
  }

  const message = formatError(err);
  const chain = collectErrorLikeChain(err);

  for (const record of chain) {
    const closeCode = readNumber(record.closeCode) ?? readNumber(record.code);
    if (closeCode !== undefined && DISCORD_AUTH_CLOSE_CODES.has(closeCode)) {
      return new CredentialInvalidError(message, { cause: err });
    }
    if (closeCode !== undefined && DISCORD_CONFIG_CLOSE_CODES.has(closeCode)) {
      return new MisconfiguredError(message, { cause: err });
    }

    const status = readStatus(record);
    if (status === 429) {
      return new RateLimitedError(message, { cause: err, retryAfterMs: readRetryAfterMs(record) });
    }
    if (status !== undefined && AUTH_STATUS.has(status)) {
      return new CredentialInvalidError(message, { cause: err });
    }
  }

  if (chain.some((record) => AUTH_TEXT_RE.test(readText(record)))) {
    return new CredentialInvalidError(message, { cause: err });
  }

  if (isRecoverableNetworkError(err)) {
    return new TransientNetworkError(message, { cause: err });
  }

  return new AdapterCrashError(message, { cause: err });
}
