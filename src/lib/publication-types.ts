import fs from "node:fs/promises";
import { z } from "zod";
import { PUBLICATION_TYPES_PATH } from "./constants";
import type { PublicationTypeLanguage } from "./types";

export type PublicationTypeTable = ReadonlyMap<string, string>;

const tableSchema = z.record(z.string(), z.string());

export async function loadPublicationTypeTable(
  language: PublicationTypeLanguage,
  tablePath: string = PUBLICATION_TYPES_PATH
): Promise<PublicationTypeTable | null> {
  if (language === "none") {
    return null;
  }
  const raw = await fs.readFile(tablePath, "utf8");
  return new Map(Object.entries(tableSchema.parse(JSON.parse(raw))));
}

/** Unmapped labels are shown as-is. */
export function translatePublicationTypes(labels: string[], table: PublicationTypeTable | null): string[] {
  if (!table) {
    return [...labels];
  }
  return labels.map((label) => table.get(label) ?? label);
}
