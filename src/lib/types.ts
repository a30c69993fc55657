import type { Language } from "./i18n";

export type RecipientMode = "to" | "bcc";

export type PublicationTypeLanguage = "ja" | "none";

export interface Article {
  id: string;
  title: string;
  authors: string;
  journal: string;
  publicationDate: string;
  doi: string | null;
  url: string;
  abstract: string;
  publicationTypes: string[];
}

/** Four bullets, each already carrying the canonical marker. */
export type SummaryBullets = [string, string, string, string];

export type ArticleSummary =
  | { status: "summarized"; bullets: SummaryBullets }
  | { status: "no_abstract" };

export interface DigestArticle extends Article {
  titleTranslated: string;
  summary: ArticleSummary;
}

export interface DeliveryRecord {
  /** ISO-8601 timestamp, or null when unknown (legacy entries). */
  addedAt: string | null;
}

export type DeliveryState = Map<string, DeliveryRecord>;

export interface DigestConfig {
  timezone: string;
  language: Language;
  journals: string[];
  digest: {
    field_label: string;
    publication_type_language: PublicationTypeLanguage;
  };
  pubmed: {
    tool: string;
    email: string;
    api_key: string | null;
    lookback_days: number;
    max_results: number;
    timeout_ms: number;
  };
  summarizer: {
    model: string;
    api_key: string | null;
    base_url: string | null;
    agent: string | null;
    temperature: number;
    timeout_ms: number;
    delay_ms: number;
    sanitize_bullets: boolean;
  };
  state: {
    path: string;
    retention_days: number;
  };
  mail: {
    host: string;
    port: number;
    sender: string | null;
    password: string | null;
    recipients: string | null;
    recipient: string | null;
    mode: RecipientMode;
  };
}
