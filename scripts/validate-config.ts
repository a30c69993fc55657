#!/usr/bin/env tsx

/**
 * Validation script for config.yml plus the environment overrides
 *
 * Usage:
 *   npx tsx scripts/validate-config.ts [path/to/config.yml]
 *
 * Validates without any network access:
 * - Required settings (journals, mail credentials, recipients)
 * - Data types and ranges
 * - Time zone and publication-type table
 */

import { resolve } from "node:path";
import process from "node:process";
import { loadConfig } from "../src/lib/config";
import { CONFIG_PATH } from "../src/lib/constants";
import { ConfigError, errorMessage } from "../src/lib/errors";
import { loadPublicationTypeTable } from "../src/lib/publication-types";
import type { DigestConfig } from "../src/lib/types";
import { DigestMailer } from "../src/mailer";

interface ValidationError {
  field: string;
  message: string;
}

const errors: ValidationError[] = [];

function addError(field: string, message: string): void {
  errors.push({ field, message });
}

async function validate(configPath: string): Promise<DigestConfig | null> {
  let config: DigestConfig;
  try {
    config = await loadConfig({ env: process.env, configPath });
  } catch (error) {
    if (error instanceof ConfigError) {
      addError("config", error.message);
      return null;
    }
    throw error;
  }

  try {
    new Intl.DateTimeFormat("en-US", { timeZone: config.timezone });
  } catch {
    addError("timezone", `Unknown IANA time zone "${config.timezone}"`);
  }

  try {
    const delivery = new DigestMailer(config.mail).prepare();
    console.log(`  recipients (${config.mail.mode}): ${delivery.recipients.join(", ")}`);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    addError("mail", error.message);
  }

  try {
    await loadPublicationTypeTable(config.digest.publication_type_language);
  } catch (error) {
    addError("digest.publication_type_language", `Translation table unreadable: ${errorMessage(error)}`);
  }

  if (!config.pubmed.email) {
    addError("pubmed.email", "No contact address for E-utilities (set PUBMED_TOOL_EMAIL or MAIL_SENDER)");
  }

  return config;
}

async function main(): Promise<void> {
  console.log("🔍 Validating configuration...\n");

  const configPath = process.argv[2] ? resolve(process.cwd(), process.argv[2]) : CONFIG_PATH;
  const config = await validate(configPath);

  if (errors.length === 0 && config) {
    console.log(`  journals: ${config.journals.join(", ")}`);
    console.log(`  model: ${config.summarizer.model}`);
    console.log("\n✅ Configuration is valid!\n");
    process.exit(0);
  } else {
    console.error("\n❌ Validation errors found:\n");
    errors.forEach((error) => {
      console.error(`  Field: ${error.field}`);
      console.error(`    Error: ${error.message}\n`);
    });
    process.exit(1);
  }
}

void main();
