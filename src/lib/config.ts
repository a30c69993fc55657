import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { CONFIG_PATH, DEFAULT_STATE_PATH, TOOL_NAME } from "./constants";
import { ConfigError, errorMessage, isMissingFile } from "./errors";
import { DEFAULT_LANGUAGE } from "./i18n";
import type { DigestConfig } from "./types";

const nullableString = z.string().trim().min(1).nullable().default(null);

const configSchema = z.object({
  timezone: z.string().default("Asia/Tokyo"),
  language: z.enum(["ja", "en"]).default(DEFAULT_LANGUAGE),
  journals: z
    .array(z.string().trim().min(1))
    .min(1, "at least one journal is required (set JOURNALS or journals in config.yml)"),
  digest: z
    .object({
      field_label: z.string().default(""),
      publication_type_language: z.enum(["ja", "none"]).default("ja")
    })
    .default({}),
  pubmed: z
    .object({
      email: nullableString,
      api_key: nullableString,
      lookback_days: z.number().int().min(1).max(30).default(2),
      max_results: z.number().int().min(1).max(10_000).default(200),
      timeout_ms: z.number().int().min(1_000).max(300_000).default(30_000)
    })
    .default({}),
  summarizer: z
    .object({
      model: z.string().trim().min(1).default("google/gemini-2.5-flash"),
      api_key: nullableString,
      base_url: z.string().url().nullable().default(null),
      agent: nullableString,
      temperature: z.number().min(0).max(2).default(0.2),
      timeout_ms: z.number().int().min(1_000).max(300_000).default(60_000),
      delay_ms: z.number().int().min(0).max(60_000).default(300),
      sanitize_bullets: z.boolean().default(false)
    })
    .default({}),
  state: z
    .object({
      path: z.string().trim().min(1).default(DEFAULT_STATE_PATH),
      retention_days: z.number().int().min(1).max(3650).default(90)
    })
    .default({}),
  mail: z
    .object({
      host: z.string().trim().min(1).default("smtp.gmail.com"),
      port: z.number().int().min(1).max(65_535).default(465),
      sender: nullableString,
      password: nullableString,
      recipients: nullableString,
      recipient: nullableString,
      mode: z.enum(["to", "bcc"]).default("to")
    })
    .default({})
});

type EnvValueKind = "string" | "list" | "number" | "seconds" | "boolean";

// Environment variables override config.yml; empty values count as unset.
const ENV_BINDINGS: Array<{ name: string; path: string[]; kind: EnvValueKind }> = [
  { name: "DIGEST_TIMEZONE", path: ["timezone"], kind: "string" },
  { name: "DIGEST_LANGUAGE", path: ["language"], kind: "string" },
  { name: "JOURNALS", path: ["journals"], kind: "list" },
  { name: "DIGEST_FIELD_LABEL", path: ["digest", "field_label"], kind: "string" },
  { name: "PUBTYPE_LANGUAGE", path: ["digest", "publication_type_language"], kind: "string" },
  { name: "PUBMED_TOOL_EMAIL", path: ["pubmed", "email"], kind: "string" },
  { name: "NCBI_API_KEY", path: ["pubmed", "api_key"], kind: "string" },
  { name: "PUBMED_LOOKBACK_DAYS", path: ["pubmed", "lookback_days"], kind: "number" },
  { name: "PUBMED_MAX_RESULTS", path: ["pubmed", "max_results"], kind: "number" },
  { name: "SUMMARY_MODEL", path: ["summarizer", "model"], kind: "string" },
  { name: "SUMMARY_API_KEY", path: ["summarizer", "api_key"], kind: "string" },
  { name: "OPENCODE_BASE_URL", path: ["summarizer", "base_url"], kind: "string" },
  { name: "SUMMARY_AGENT", path: ["summarizer", "agent"], kind: "string" },
  { name: "SUMMARY_TEMPERATURE", path: ["summarizer", "temperature"], kind: "number" },
  { name: "SLEEP_BETWEEN_CALLS", path: ["summarizer", "delay_ms"], kind: "seconds" },
  { name: "SANITIZE_BULLETS", path: ["summarizer", "sanitize_bullets"], kind: "boolean" },
  { name: "STATE_PATH", path: ["state", "path"], kind: "string" },
  { name: "STATE_RETENTION_DAYS", path: ["state", "retention_days"], kind: "number" },
  { name: "SMTP_HOST", path: ["mail", "host"], kind: "string" },
  { name: "SMTP_PORT", path: ["mail", "port"], kind: "number" },
  { name: "MAIL_SENDER", path: ["mail", "sender"], kind: "string" },
  { name: "MAIL_PASSWORD", path: ["mail", "password"], kind: "string" },
  { name: "RECIPIENT_EMAILS", path: ["mail", "recipients"], kind: "string" },
  { name: "RECIPIENT_EMAIL", path: ["mail", "recipient"], kind: "string" },
  { name: "RECIPIENT_MODE", path: ["mail", "mode"], kind: "string" }
];

export interface LoadConfigOptions {
  env: Record<string, string | undefined>;
  configPath?: string;
}

export async function loadConfig(options: LoadConfigOptions): Promise<DigestConfig> {
  const configPath = options.configPath ?? CONFIG_PATH;
  const fileValues = await readConfigFile(configPath);
  return resolveConfig(fileValues, options.env, path.dirname(configPath));
}

export function resolveConfig(
  fileValues: Record<string, unknown>,
  env: Record<string, string | undefined>,
  baseDir: string
): DigestConfig {
  const merged = applyEnvOverrides(fileValues, env);
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Configuration is invalid:\n${formatIssues(result.error)}`);
  }
  const parsed = result.data;
  return {
    ...parsed,
    pubmed: {
      ...parsed.pubmed,
      tool: TOOL_NAME,
      email: parsed.pubmed.email ?? parsed.mail.sender ?? ""
    },
    state: {
      ...parsed.state,
      path: path.resolve(baseDir, parsed.state.path)
    }
  };
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw error;
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ConfigError(`${path.basename(configPath)} is not valid YAML: ${errorMessage(error)}`);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${path.basename(configPath)} must contain a mapping at the top level.`);
  }
  return parsed;
}

function applyEnvOverrides(
  fileValues: Record<string, unknown>,
  env: Record<string, string | undefined>
): Record<string, unknown> {
  const merged = structuredClone(fileValues);
  for (const binding of ENV_BINDINGS) {
    const raw = env[binding.name];
    if (raw === undefined || raw.trim() === "") {
      continue;
    }
    setPath(merged, binding.path, convertEnvValue(raw.trim(), binding.kind));
  }
  return merged;
}

function convertEnvValue(raw: string, kind: EnvValueKind): unknown {
  switch (kind) {
    case "string":
      return raw;
    case "list":
      return raw
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
    case "number": {
      const value = Number(raw);
      return Number.isFinite(value) ? value : raw;
    }
    case "seconds": {
      const value = Number(raw);
      return Number.isFinite(value) ? Math.round(value * 1000) : raw;
    }
    case "boolean": {
      const lowered = raw.toLowerCase();
      if (["1", "true", "yes", "on"].includes(lowered)) return true;
      if (["0", "false", "no", "off"].includes(lowered)) return false;
      return raw;
    }
  }
}

function setPath(target: Record<string, unknown>, keys: string[], value: unknown): void {
  let cursor = target;
  keys.forEach((key, index) => {
    if (index === keys.length - 1) {
      cursor[key] = value;
      return;
    }
    const next = cursor[key];
    if (isRecord(next)) {
      cursor = next;
    } else {
      const created: Record<string, unknown> = {};
      cursor[key] = created;
      cursor = created;
    }
  });
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const issuePath = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `- ${issuePath}: ${issue.message}`;
    })
    .join("\n");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
