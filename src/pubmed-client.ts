import { z } from "zod";
import { EUTILS_BASE, USER_AGENT } from "@/lib/constants";
import { TransportError, errorMessage } from "@/lib/errors";
import type { DigestConfig } from "@/lib/types";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const esearchSchema = z.object({
  error: z.string().optional(),
  esearchresult: z
    .object({
      idlist: z.array(z.string()).optional(),
      ERROR: z.string().optional()
    })
    .optional()
});

/** OR over exact journal-title-abbreviation matches: `(("A"[ta]) OR ("B"[ta]))`. */
export function buildJournalQuery(journals: string[]): string {
  const parts = journals
    .map((journal) => journal.replace(/"/g, "").trim())
    .filter((journal) => journal.length > 0)
    .map((journal) => `("${journal}"[ta])`);
  return `(${parts.join(" OR ")})`;
}

export class PubMedClient {
  constructor(
    private readonly config: DigestConfig["pubmed"],
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  /** PMIDs added within the lookback window, newest publication first. */
  async search(term: string): Promise<string[]> {
    const params = this.baseParams({
      term,
      retmode: "json",
      datetype: "edat",
      reldate: String(this.config.lookback_days),
      retmax: String(this.config.max_results),
      sort: "pub_date"
    });
    const body = await this.request("esearch.fcgi", params, this.config.timeout_ms);

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new TransportError("esearch.fcgi", "response is not valid JSON", { cause: error });
    }
    const parsed = esearchSchema.safeParse(json);
    if (!parsed.success) {
      throw new TransportError("esearch.fcgi", "unexpected response shape");
    }
    const failure = parsed.data.error ?? parsed.data.esearchresult?.ERROR;
    if (failure) {
      throw new TransportError("esearch.fcgi", failure);
    }
    return parsed.data.esearchresult?.idlist ?? [];
  }

  /** One EFetch request for the whole batch; returns the raw XML document. */
  async fetchRecords(ids: string[]): Promise<string> {
    if (ids.length === 0) {
      return "";
    }
    const params = this.baseParams({
      id: ids.join(","),
      rettype: "abstract",
      retmode: "xml"
    });
    return this.request("efetch.fcgi", params, this.config.timeout_ms * 2);
  }

  private baseParams(extra: Record<string, string>): URLSearchParams {
    const params = new URLSearchParams({ db: "pubmed", ...extra, tool: this.config.tool });
    if (this.config.email) {
      params.set("email", this.config.email);
    }
    if (this.config.api_key) {
      params.set("api_key", this.config.api_key);
    }
    return params;
  }

  private async request(endpoint: string, params: URLSearchParams, timeoutMs: number): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await this.fetchImpl(`${EUTILS_BASE}${endpoint}?${params.toString()}`, {
        signal: controller.signal,
        headers: {
          "User-Agent": USER_AGENT
        }
      });
      if (!response.ok) {
        throw new TransportError(endpoint, `HTTP ${response.status}`, { status: response.status });
      }
      return await response.text();
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(error);
      throw new TransportError(endpoint, reason, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }
}
