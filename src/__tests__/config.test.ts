import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, resolveConfig } from "@/lib/config";
import { DEFAULT_STATE_PATH } from "@/lib/constants";
import { ConfigError } from "@/lib/errors";

describe("resolveConfig", () => {
  it("fills defaults around the required journal list", () => {
    const config = resolveConfig({ journals: ["Radiother Oncol"] }, {}, "/srv/digest");

    expect(config.timezone).toBe("Asia/Tokyo");
    expect(config.language).toBe("ja");
    expect(config.pubmed).toEqual({
      tool: "journal-digest",
      email: "",
      api_key: null,
      lookback_days: 2,
      max_results: 200,
      timeout_ms: 30_000
    });
    expect(config.summarizer.delay_ms).toBe(300);
    expect(config.summarizer.sanitize_bullets).toBe(false);
    expect(config.state).toEqual({ path: DEFAULT_STATE_PATH, retention_days: 90 });
    expect(config.mail.mode).toBe("to");
  });

  it("lets environment variables override file values", () => {
    const config = resolveConfig(
      { journals: ["From File"], summarizer: { delay_ms: 1000 }, state: { path: "state/sent.json" } },
      {
        JOURNALS: "Radiother Oncol, JAMA Oncol,",
        SLEEP_BETWEEN_CALLS: "0.5",
        SANITIZE_BULLETS: "yes",
        PUBMED_LOOKBACK_DAYS: "7",
        RECIPIENT_MODE: "bcc",
        MAIL_SENDER: "digest@example.com",
        DIGEST_FIELD_LABEL: "",
        SUMMARY_AGENT: "digest"
      },
      "/srv/digest"
    );

    expect(config.journals).toEqual(["Radiother Oncol", "JAMA Oncol"]);
    expect(config.summarizer.delay_ms).toBe(500);
    expect(config.summarizer.sanitize_bullets).toBe(true);
    expect(config.pubmed.lookback_days).toBe(7);
    expect(config.pubmed.email).toBe("digest@example.com");
    expect(config.mail.mode).toBe("bcc");
    expect(config.digest.field_label).toBe("");
    expect(config.summarizer.agent).toBe("digest");
    expect(config.state.path).toBe(path.resolve("/srv/digest", "state/sent.json"));
  });

  it("requires at least one journal", () => {
    expect(() => resolveConfig({}, {}, "/srv")).toThrow(ConfigError);
    expect(() => resolveConfig({ journals: [] }, {}, "/srv")).toThrow(
      "Configuration is invalid:\n- journals: at least one journal is required (set JOURNALS or journals in config.yml)"
    );
  });

  it("reports values of the wrong type by path", () => {
    expect(() => resolveConfig({ journals: ["A"] }, { STATE_RETENTION_DAYS: "ninety" }, "/srv")).toThrow(
      /- state\.retention_days: /
    );
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "digest-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads config.yml and resolves the state path beside it", async () => {
    const configPath = path.join(dir, "config.yml");
    await fs.writeFile(
      configPath,
      ["language: en", "journals:", "  - Radiother Oncol", "state:", "  path: data/sent.json", ""].join("\n"),
      "utf8"
    );

    const config = await loadConfig({ env: {}, configPath });

    expect(config.language).toBe("en");
    expect(config.journals).toEqual(["Radiother Oncol"]);
    expect(config.state.path).toBe(path.join(dir, "data", "sent.json"));
  });

  it("runs from the environment alone when the file is missing", async () => {
    const config = await loadConfig({ env: { JOURNALS: "Lancet Oncol" }, configPath: path.join(dir, "absent.yml") });
    expect(config.journals).toEqual(["Lancet Oncol"]);
  });

  it("rejects a file whose top level is not a mapping", async () => {
    const configPath = path.join(dir, "config.yml");
    await fs.writeFile(configPath, "- just\n- a list\n", "utf8");

    await expect(loadConfig({ env: {}, configPath })).rejects.toThrow(
      new ConfigError("config.yml must contain a mapping at the top level.")
    );
  });
});
