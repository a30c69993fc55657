import { t, type Language } from "@/lib/i18n";

/** Kept verbatim in every summary; everything else is translated. */
export const PRESERVED_TERMS = [
  "Gy",
  "cGy",
  "Gy/fx",
  "EQD2",
  "BED",
  "SBRT",
  "SRS",
  "IMRT",
  "VMAT",
  "IGRT",
  "PET",
  "CT",
  "MRI",
  "OS",
  "PFS",
  "DFS",
  "HR",
  "OR",
  "CI",
  "RCT",
  "AUC",
  "mg",
  "mL",
  "%"
] as const;

export function buildSummaryPrompt(title: string, abstract: string, language: Language): string {
  const languageName = t(language, "languageName");
  return [
    "You are an editor who summarises medical research articles for practising clinicians.",
    `From the English title and abstract below, produce the following in ${languageName}:`,
    `1) "title_translated": a natural ${languageName} title of 30 to 45 characters on one line, ending in a noun phrase, with redundant subtitles compressed.`,
    `2) "bullets": exactly 4 key points, each 60 to 120 characters, stating only facts reported in the abstract. No speculation, no bullet symbols.`,
    `Write in a formal, neutral register. Keep these abbreviations and units exactly as written: ${PRESERVED_TERMS.join(", ")}.`,
    `Translate all other general vocabulary into ${languageName}.`,
    "",
    "Output ONLY a JSON object, exactly in this shape:",
    "{",
    '  "title_translated": "translated title",',
    '  "bullets": ["point 1", "point 2", "point 3", "point 4"]',
    "}",
    "",
    "English title:",
    title,
    "",
    "Abstract:",
    abstract
  ].join("\n");
}

export function buildTitlePrompt(title: string, language: Language): string {
  const languageName = t(language, "languageName");
  return [
    "You are an editor who translates medical research article titles for practising clinicians.",
    `Translate the English title below into a natural ${languageName} title of 30 to 45 characters on one line, ending in a noun phrase.`,
    `Keep these abbreviations and units exactly as written: ${PRESERVED_TERMS.join(", ")}.`,
    "",
    'Output ONLY a JSON object: {"title_translated": "translated title"}',
    "",
    "English title:",
    title
  ].join("\n");
}
