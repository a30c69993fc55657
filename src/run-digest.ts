import { t } from "@/lib/i18n";
import { GLYPHS, logDetail, logWarn } from "@/lib/log";
import type { PublicationTypeTable } from "@/lib/publication-types";
import type { Article, DigestArticle, DigestConfig } from "@/lib/types";
import { composeDigest } from "./compose-digest";
import { pruneState, recordDelivered, type DeliveryStateStore } from "./delivery-state";
import type { DigestMailer } from "./mailer";
import { buildJournalQuery, type PubMedClient } from "./pubmed-client";
import { parseRecords } from "./pubmed-parser";
import type { ArticleSummarizer } from "./summarise-article";

export type DigestStage = "state" | "search" | "fetch" | "summarise" | "send";

/** Stage reporting hook; the CLI drives its spinners from it. */
export interface DigestProgress {
  start(stage: DigestStage, text: string): void;
  update(text: string): void;
  succeed(text: string): void;
}

export interface DigestDependencies {
  config: DigestConfig;
  pubmed: Pick<PubMedClient, "search" | "fetchRecords">;
  summarizer: Pick<ArticleSummarizer, "enrich">;
  store: Pick<DeliveryStateStore, "load" | "save">;
  mailer: Pick<DigestMailer, "prepare" | "send">;
  publicationTypes: PublicationTypeTable | null;
  progress?: DigestProgress;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface DigestRunResult {
  subject: string;
  body: string;
  articles: DigestArticle[];
  recipients: string[];
  candidates: number;
  pruned: number;
}

const silentProgress: DigestProgress = {
  start: () => undefined,
  update: () => undefined,
  succeed: () => undefined
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * One scheduled run: search, drop already-delivered ids, fetch and parse the
 * rest, record them as delivered, summarise, compose and send exactly one
 * digest (also when nothing is new).
 */
export async function runDigest(deps: DigestDependencies): Promise<DigestRunResult> {
  const { config, pubmed, summarizer, store, mailer } = deps;
  const progress = deps.progress ?? silentProgress;
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? (() => new Date());

  // Fails on missing credentials or recipients before any network call.
  mailer.prepare();

  progress.start("state", "Loading delivery state...");
  const loaded = await store.load();
  const pruned = pruneState(loaded.state, config.state.retention_days, now());
  let state = pruned.state;
  progress.succeed(`Delivery state loaded (${state.size} tracked, ${pruned.removed} pruned)`);

  progress.start("search", `Searching ${config.journals.length} journals (last ${config.pubmed.lookback_days} days)...`);
  const candidates = await pubmed.search(buildJournalQuery(config.journals));
  const newIds = Array.from(new Set(candidates)).filter((id) => !state.has(id));
  progress.succeed(`Found ${candidates.length} candidates, ${newIds.length} new`);

  let articles: Article[] = [];
  if (newIds.length > 0) {
    progress.start("fetch", `Fetching ${newIds.length} records...`);
    const xml = await pubmed.fetchRecords(newIds);
    const parsed = parseRecords(xml, { etAl: t(config.language, "etAl") });
    for (const anomaly of parsed.anomalies) {
      logWarn(`PMID ${anomaly.id || "?"}: ${anomaly.message}`);
    }
    const seen = new Set<string>();
    articles = parsed.articles.filter((article) => {
      if (seen.has(article.id) || state.has(article.id)) return false;
      seen.add(article.id);
      return true;
    });
    state = recordDelivered(state, seen, now());
    progress.succeed(`Parsed ${articles.length} records`);
  }

  if (pruned.removed > 0 || articles.length > 0 || loaded.format === "legacy") {
    await store.save(state);
  }

  progress.start("summarise", `Generating AI summaries (0/${articles.length})`);
  const items: DigestArticle[] = [];
  for (const [index, article] of articles.entries()) {
    if (index > 0 && config.summarizer.delay_ms > 0) {
      await sleep(config.summarizer.delay_ms);
    }
    const { issues, ...fields } = await summarizer.enrich(article);
    if (issues.length > 0) {
      logDetail(GLYPHS.summary, `PMID ${article.id}: summary recovered from ${issues.join(", ")}`);
    }
    items.push({ ...article, ...fields });
    progress.update(`Generating AI summaries (${index + 1}/${articles.length}) - ${article.title.slice(0, 50)}`);
  }
  progress.succeed(`Generated ${items.length} AI summaries`);

  const digest = composeDigest(
    items,
    {
      language: config.language,
      fieldLabel: config.digest.field_label,
      timezone: config.timezone,
      publicationTypes: deps.publicationTypes
    },
    now()
  );

  progress.start("send", "Sending digest...");
  const delivery = await mailer.send(digest);
  progress.succeed(`Digest sent to ${delivery.recipients.length} recipient(s)`);

  return {
    subject: digest.subject,
    body: digest.body,
    articles: items,
    recipients: delivery.recipients,
    candidates: candidates.length,
    pruned: pruned.removed
  };
}
