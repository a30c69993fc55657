import { errorMessage } from "@/lib/errors";
import { logDetail, logWarn, GLYPHS } from "@/lib/log";
import type { DigestConfig } from "@/lib/types";

type OpencodeModule = typeof import("@opencode-ai/sdk");
type EmbeddedInstance = Awaited<ReturnType<OpencodeModule["createOpencode"]>>;
type OpencodeClient = EmbeddedInstance["client"];

/** The one capability the summariser needs from a text-generating model. */
export interface CompletionClient {
  complete(prompt: string): Promise<string | null>;
}

interface ClientWrapper {
  client: OpencodeClient;
  agent: string | null;
  cleanup?: () => void;
}

const EMBEDDED_AGENT = "digest";

/**
 * Talks to an OpenCode server: either the one at `summarizer.base_url`, or an
 * embedded server started on first use with the configured model, temperature
 * and provider key. Every failure is reported once and surfaces as `null`.
 */
export class OpenCodeCompletionClient implements CompletionClient {
  private clientPromise: Promise<ClientWrapper | null> | null = null;
  private hasWarned = false;

  constructor(private readonly config: DigestConfig["summarizer"]) {}

  async complete(prompt: string): Promise<string | null> {
    try {
      const wrapper = await this.ensureClient();
      if (!wrapper) {
        return null;
      }
      return await withTimeout(this.issuePrompt(wrapper, prompt), this.config.timeout_ms);
    } catch (error) {
      this.warnOnce(error);
      return null;
    }
  }

  async close(): Promise<void> {
    const wrapper = await this.clientPromise;
    this.clientPromise = null;
    wrapper?.cleanup?.();
  }

  private async ensureClient(): Promise<ClientWrapper | null> {
    if (this.clientPromise) {
      return this.clientPromise;
    }

    this.clientPromise = (async () => {
      try {
        const mod: OpencodeModule = await import("@opencode-ai/sdk");

        if (this.config.base_url) {
          logDetail(GLYPHS.info, `Using OpenCode server at ${this.config.base_url}; sampling follows its agent settings`);
          const client = mod.createOpencodeClient({ baseUrl: this.config.base_url });
          return { client, agent: this.config.agent };
        }

        const agent = this.config.agent ?? EMBEDDED_AGENT;
        const { providerID } = parseModel(this.config.model);
        const instance = await mod.createOpencode({
          config: {
            model: this.config.model,
            agent: {
              [agent]: {
                model: this.config.model,
                temperature: this.config.temperature
              }
            },
            ...(this.config.api_key ? { provider: { [providerID]: { options: { apiKey: this.config.api_key } } } } : {})
          }
        });

        const cleanup = () => {
          try {
            instance.server.close();
          } catch (error) {
            logWarn(`OpenCode server did not shut down cleanly: ${errorMessage(error)}`);
          }
        };
        process.once("exit", cleanup);
        return { client: instance.client, agent, cleanup };
      } catch (error) {
        this.warnOnce(error);
        return null;
      }
    })();

    const wrapper = await this.clientPromise;
    if (!wrapper) {
      this.clientPromise = null;
    }
    return wrapper;
  }

  private async issuePrompt(wrapper: ClientWrapper, prompt: string): Promise<string> {
    const { client, agent } = wrapper;
    const created: unknown = await client.session.create({ body: { title: `journal-digest-${Date.now()}` } });
    const sessionId = readSessionId(created);
    if (!sessionId) {
      throw new Error("OpenCode did not return a session id");
    }

    try {
      const response: unknown = await client.session.prompt({
        path: { id: sessionId },
        body: {
          model: parseModel(this.config.model),
          parts: [{ type: "text", text: prompt }],
          ...(agent ? { agent } : {})
        }
      });
      const text = extractParts(response);
      if (!text) {
        throw new Error("OpenCode response did not contain text output");
      }
      return text;
    } finally {
      await safeDeleteSession(client, sessionId);
    }
  }

  private warnOnce(error: unknown) {
    if (this.hasWarned) {
      return;
    }
    logWarn(
      `[summarise] OpenCode error: ${errorMessage(error)}. Set OPENCODE_BASE_URL to a running server (opencode serve) or make sure the opencode binary is available.`
    );
    this.hasWarned = true;
  }
}

export function parseModel(model: string): { providerID: string; modelID: string } {
  if (!model.includes("/")) {
    return { providerID: "google", modelID: model };
  }
  const [providerID, ...rest] = model.split("/");
  return { providerID, modelID: rest.join("/") };
}

function readSessionId(response: unknown): string | null {
  if (!isRecord(response)) {
    return null;
  }
  const data = isRecord(response.data) ? response.data : response;
  return typeof data.id === "string" ? data.id : null;
}

export function extractParts(response: unknown): string {
  if (!isRecord(response)) {
    return "";
  }
  if (response.error) {
    throw new Error(`OpenCode returned an error: ${JSON.stringify(response.error).slice(0, 200)}`);
  }
  const data = isRecord(response.data) ? response.data : response;
  let parts: unknown[] = [];
  if (Array.isArray(data.parts)) {
    parts = data.parts;
  } else if (isRecord(data.info) && Array.isArray(data.info.parts)) {
    parts = data.info.parts;
  }

  const segments: string[] = [];
  for (const part of parts) {
    if (!isRecord(part)) {
      continue;
    }
    if (typeof part.text === "string") {
      segments.push(part.text);
    } else if (typeof part.content === "string") {
      segments.push(part.content);
    }
  }
  return segments.join("\n").trim();
}

async function safeDeleteSession(client: OpencodeClient, id: string): Promise<void> {
  try {
    await client.session.delete({ path: { id } });
  } catch (error) {
    logDetail(GLYPHS.info, `OpenCode session ${id} was not deleted: ${errorMessage(error)}`);
  }
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`OpenCode request timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
