import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { replaceEnvVars } from "./env";
import { RelayConfigSchema, type RelayConfig } from "./schema";

export interface ConfigLoadResult {
  success: boolean;
  config?: RelayConfig;
  errors?: string[];
  path: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expandHomePath(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return raw;
}

export function resolveConfigPath(customPath?: string): string {
  if (customPath) {
    return path.resolve(customPath);
  }
  const envPath = process.env.TENANT_RELAY_CONFIG;
  if (envPath) {
    return path.resolve(envPath);
  }
  return path.join(os.homedir(), ".tenant-relay", "config.jsonc");
}

export function applyConfigDefaults(raw: unknown): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const obj = { ...raw };

  if (isRecord(obj.paths)) {
    const paths = { ...obj.paths };
    for (const key of ["baseDir", "database"] as const) {
      const value = paths[key];
      if (typeof value === "string") {
        paths[key] = expandHomePath(value);
      }
    }
    obj.paths = paths;
  }

  if (!Object.hasOwn(obj, "logging")) {
    obj.logging = { level: "info" };
  }

  return obj;
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const envPath = path.join(path.dirname(resolvedPath), ".env");
  if (!fs.existsSync(envPath)) {
    return;
  }
  const result = loadDotEnv({ path: envPath, override: false });
  if (result.error) {
    throw result.error;
  }
}

export function parseConfigText(raw: string): ConfigLoadResult & { path: "" } {
  const parseErrors: ParseError[] = [];
  let config: unknown = parseJsonc(raw, parseErrors, { allowTrailingComma: true });
  if (parseErrors.length > 0) {
    return {
      success: false,
      errors: parseErrors.map((err) => `JSONC parse error ${err.error} at offset ${err.offset}`),
      path: "",
    };
  }
  config = replaceEnvVars(config);
  config = applyConfigDefaults(config);

  const result = RelayConfigSchema.safeParse(config);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    return { success: false, errors, path: "" };
  }
  return { success: true, config: result.data, path: "" };
}

export function loadConfig(configPath?: string): ConfigLoadResult {
  const resolvedPath = resolveConfigPath(configPath);
  if (!fs.existsSync(resolvedPath)) {
    return {
      success: false,
      errors: [`Config file not found: ${resolvedPath}`],
      path: resolvedPath,
    };
  }

  try {
    loadConfigLocalEnv(resolvedPath);
    const raw = fs.readFileSync(resolvedPath, "utf-8");
    return { ...parseConfigText(raw), path: resolvedPath };
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
    };
  }
}
