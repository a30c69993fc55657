import { ABSTRACT_CHAR_CAP, BULLET_COUNT, BULLET_MAX_CHARS } from "@/lib/constants";
import { t, type Language } from "@/lib/i18n";
import type { Article, ArticleSummary, SummaryBullets } from "@/lib/types";
import type { CompletionClient } from "./oc-client";
import { buildSummaryPrompt, buildTitlePrompt } from "./summary-prompt";

export type SummaryIssue =
  | "no_reply"
  | "invalid_json"
  | "missing_title"
  | "title_only_failed"
  | "bullet_shortfall"
  | "bullet_overflow"
  | "bullet_truncated"
  | "bullet_sanitized";

export interface SummaryOutcome {
  titleTranslated: string;
  bullets: SummaryBullets;
  issues: SummaryIssue[];
}

export interface EnrichedFields {
  titleTranslated: string;
  summary: ArticleSummary;
  issues: SummaryIssue[];
}

export interface SummarizerOptions {
  language: Language;
  /** Drop figures and compound terms that the abstract does not contain. */
  sanitizeBullets: boolean;
}

// Marker characters a model may prefix a bullet with, plus "1." / "1)" numbering.
const BULLET_PREFIX = /^(?:[・\-–—•*●▪◦‣\s　]+|\d{1,2}[.)]\s+)+/;
const TITLE_PREFIX = /^[・\-•*[\]()\s　]+/;
const TITLE_TERMINATOR = /[。．.]$/;
const ELLIPSIS = "…";
const TRUNCATED_CHARS = BULLET_MAX_CHARS - 3;

export class ArticleSummarizer {
  constructor(
    private readonly client: CompletionClient,
    private readonly options: SummarizerOptions
  ) {}

  /**
   * Articles with an abstract get a translated title and four bullets; those
   * without only get the title translated, and a fixed placeholder summary.
   */
  async enrich(article: Article): Promise<EnrichedFields> {
    if (!article.abstract.trim()) {
      const issues: SummaryIssue[] = [];
      const titleTranslated = await this.translateTitleOnly(article.title);
      if (!titleTranslated) {
        issues.push("title_only_failed");
      }
      return {
        titleTranslated: titleTranslated || t(this.options.language, "translationFailed"),
        summary: { status: "no_abstract" },
        issues
      };
    }

    const outcome = await this.summarize(article.title, article.abstract);
    return {
      titleTranslated: outcome.titleTranslated,
      summary: { status: "summarized", bullets: outcome.bullets },
      issues: outcome.issues
    };
  }

  async summarize(title: string, abstract: string): Promise<SummaryOutcome> {
    const { language } = this.options;
    const issues: SummaryIssue[] = [];
    const source = abstract.trim().slice(0, ABSTRACT_CHAR_CAP);

    const reply = await this.client.complete(buildSummaryPrompt(title, source, language));
    if (!reply) {
      issues.push("no_reply");
    }
    const data = extractJsonObject(reply ?? "");
    if (reply && !data) {
      issues.push("invalid_json");
    }

    let rawBullets = readBulletLines(data?.bullets);
    if (this.options.sanitizeBullets) {
      const sanitized = rawBullets.map((bullet) => sanitizeBullet(bullet, abstract));
      if (sanitized.some((bullet, index) => bullet !== rawBullets[index])) {
        issues.push("bullet_sanitized");
      }
      rawBullets = sanitized;
    }
    const formatted = formatBullets(rawBullets, language);
    issues.push(...formatted.issues);

    let titleTranslated = cleanTranslatedTitle(readString(data?.title_translated));
    if (!titleTranslated) {
      issues.push("missing_title");
      titleTranslated = await this.translateTitleOnly(title);
    }
    if (!titleTranslated) {
      issues.push("title_only_failed");
      titleTranslated = t(language, "translationFailed");
    }

    return { titleTranslated, bullets: formatted.bullets, issues };
  }

  /** Returns an empty string when no usable title came back. */
  async translateTitleOnly(title: string): Promise<string> {
    if (!title.trim()) {
      return "";
    }
    const reply = await this.client.complete(buildTitlePrompt(title, this.options.language));
    if (!reply) {
      return "";
    }
    const data = extractJsonObject(reply);
    if (data) {
      return cleanTranslatedTitle(readString(data.title_translated));
    }
    const firstLine = reply
      .split("\n")
      .map((line) => line.trim())
      .find((line) => line.length > 0 && !line.startsWith("```"));
    return cleanTranslatedTitle((firstLine ?? "").replace(/^["“「]|["”」]$/g, ""));
  }
}

/**
 * Locates the outermost `{ ... }` span in a free-text reply and parses it.
 * Anything that is not a JSON object yields null.
 */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  if (!text.trim()) {
    return null;
  }
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  const candidate = start !== -1 && end > start ? text.slice(start, end + 1) : text;
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function readBulletLines(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.map((entry) => (typeof entry === "string" || typeof entry === "number" ? String(entry) : ""));
}

function readString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/**
 * Re-marks, caps and pads bullets so that exactly four come out, each at most
 * {@link BULLET_MAX_CHARS} characters long and starting with the language's
 * marker.
 */
export function formatBullets(
  lines: string[],
  language: Language
): { bullets: SummaryBullets; issues: SummaryIssue[] } {
  const marker = t(language, "bulletMarker");
  const issues: SummaryIssue[] = [];

  const marked = lines
    .map((line) => line.trim().replace(BULLET_PREFIX, "").trim())
    .filter((line) => line.length > 0)
    .map((line) => `${marker}${line}`);

  if (marked.length > BULLET_COUNT) {
    issues.push("bullet_overflow");
  }
  const kept = marked.slice(0, BULLET_COUNT);
  if (kept.length < BULLET_COUNT) {
    issues.push("bullet_shortfall");
  }
  while (kept.length < BULLET_COUNT) {
    kept.push(`${marker}${t(language, "insufficientSummary")}`);
  }

  const capped = kept.map((bullet) => {
    if (bullet.length <= BULLET_MAX_CHARS) {
      return bullet;
    }
    if (!issues.includes("bullet_truncated")) {
      issues.push("bullet_truncated");
    }
    return `${sliceWithoutSplitting(bullet, TRUNCATED_CHARS)}${ELLIPSIS}`;
  });

  return { bullets: [capped[0], capped[1], capped[2], capped[3]], issues };
}

function sliceWithoutSplitting(value: string, length: number): string {
  const head = value.slice(0, length);
  const last = head.charCodeAt(head.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? head.slice(0, -1) : head;
}

/** Leading bullet/bracket characters and one trailing full stop are removed. */
export function cleanTranslatedTitle(raw: string): string {
  return raw.trim().replace(TITLE_PREFIX, "").replace(TITLE_TERMINATOR, "").trim();
}

// Latin/numeric runs inside a bullet; punctuation may only appear mid-token.
const TOKEN = /[A-Za-z0-9][A-Za-z0-9.,%+\-/]*[A-Za-z0-9%+]|[A-Za-z0-9]/g;

// `/` anywhere, or `-` between letters, as in "OS/PFS" or "SBRT-IMRT".
const COMPOUND_SEPARATOR = /(\/|(?<=[A-Za-z])-(?=[A-Za-z]))/;

function isSpecificToken(token: string): boolean {
  return /\d/.test(token) || (token.match(/[A-Z]/g) ?? []).length >= 2;
}

function isGrounded(part: string, abstract: string): boolean {
  return !isSpecificToken(part) || abstract.includes(part);
}

/** Checks each part of a compound token on its own and keeps the grounded ones. */
function sanitizeToken(token: string, abstract: string): string {
  if (isGrounded(token, abstract)) {
    return token;
  }
  const pieces = token.split(COMPOUND_SEPARATOR);
  if (pieces.length === 1) {
    return "";
  }
  let kept = "";
  for (let index = 0; index < pieces.length; index += 2) {
    const part = pieces[index];
    if (!part || !isGrounded(part, abstract)) {
      continue;
    }
    kept += kept ? `${pieces[index - 1]}${part}` : part;
  }
  return kept;
}

/**
 * Removes numbers and specialised compound terms (digits, or two or more
 * capitals) that do not occur verbatim in the abstract. Compound tokens joined
 * by `/` or a hyphen are checked part by part. Tokens found in the abstract are
 * never touched, and a bullet with nothing to remove is returned unchanged.
 */
export function sanitizeBullet(bullet: string, abstract: string): string {
  const stripped = bullet.replace(TOKEN, (token) => sanitizeToken(token, abstract));
  if (stripped === bullet) {
    return bullet;
  }
  return stripped
    .replace(/[ \t]{2,}/g, " ")
    .replace(/\s+([,.;:、。])/g, "$1")
    .trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
