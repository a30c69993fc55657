#!/usr/bin/env tsx
import path from "node:path";
import process from "node:process";
import ora, { type Ora } from "ora";
import { loadConfig } from "../src/lib/config";
import { COLORS, GLYPHS, logError, logInfo, logSuccess } from "../src/lib/log";
import { loadPublicationTypeTable } from "../src/lib/publication-types";
import { DeliveryStateStore } from "../src/delivery-state";
import { DigestMailer } from "../src/mailer";
import { OpenCodeCompletionClient } from "../src/oc-client";
import { PubMedClient } from "../src/pubmed-client";
import { runDigest, type DigestProgress } from "../src/run-digest";
import { ArticleSummarizer } from "../src/summarise-article";

async function main() {
  const startTime = Date.now();
  let spinner: Ora | null = null;

  // Keep warnings off the spinner line
  const originalWarn = console.warn.bind(console);
  console.warn = (...args: unknown[]) => {
    if (spinner && spinner.isSpinning) {
      process.stdout.write("\n");
    }
    originalWarn(...args);
  };

  let completionClient: OpenCodeCompletionClient | null = null;
  try {
    spinner = ora("Loading configuration...").start();
    const config = await loadConfig({ env: process.env });
    spinner.succeed(`Configuration loaded (${config.journals.length} journals, model: ${config.summarizer.model})`);

    completionClient = new OpenCodeCompletionClient(config.summarizer);
    const progress: DigestProgress = {
      start: (_stage, text) => {
        spinner = ora(text).start();
      },
      update: (text) => {
        if (spinner) spinner.text = text;
      },
      succeed: (text) => {
        spinner?.succeed(text);
      }
    };

    const result = await runDigest({
      config,
      pubmed: new PubMedClient(config.pubmed),
      summarizer: new ArticleSummarizer(completionClient, {
        language: config.language,
        sanitizeBullets: config.summarizer.sanitize_bullets
      }),
      store: new DeliveryStateStore(config.state.path),
      mailer: new DigestMailer(config.mail),
      publicationTypes: await loadPublicationTypeTable(config.digest.publication_type_language),
      progress
    });

    const seconds = Math.round((Date.now() - startTime) / 1000);
    console.log("");
    logSuccess(result.subject);
    logInfo(GLYPHS.mail, `${result.recipients.length} recipient(s), ${config.mail.mode} mode`);
    console.log(`  ${COLORS.detail}${GLYPHS.stats} ${result.articles.length} new of ${result.candidates} candidates, ${result.pruned} state entries pruned${COLORS.reset}`);
    console.log(`  ${COLORS.detail}${GLYPHS.state} ${path.relative(process.cwd(), config.state.path)}${COLORS.reset}`);
    console.log(`  ${COLORS.detail}${GLYPHS.timer} Finished in ${seconds}s${COLORS.reset}\n`);
    await completionClient.close();
    process.exit(0);
  } catch (error) {
    if (spinner && spinner.isSpinning) {
      spinner.fail("Digest run failed");
    }
    logError(error instanceof Error ? error.message : String(error), error instanceof Error ? error.cause : undefined);
    await completionClient?.close();
    process.exit(1);
  }
}

void main();
