import { JSDOM } from "jsdom";
import { DocumentParseError, errorMessage } from "@/lib/errors";
import type { Article } from "@/lib/types";

export interface ParseAnomaly {
  id: string;
  field: "id" | "title";
  message: string;
}

export interface ParseResult {
  articles: Article[];
  anomalies: ParseAnomaly[];
}

export interface ParseOptions {
  /** Appended to the author line when more than three authors exist. */
  etAl: string;
}

const MAX_LISTED_AUTHORS = 3;
const MIN_TITLE_CHARS = 2;

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"] as const;
const FULL_MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december"
];

const HISTORY_STATUS_ORDER = ["pubmed", "entrez", "medline"];

export function articleUrl(id: string): string {
  return `https://pubmed.ncbi.nlm.nih.gov/${id}/`;
}

/**
 * Parses an EFetch (`rettype=abstract`, `retmode=xml`) document into articles.
 * Missing fields degrade to empty values; records without a PMID are skipped
 * and reported as anomalies. Throws {@link DocumentParseError} when the
 * document is not well-formed XML or is not a `PubmedArticleSet`.
 */
export function parseRecords(xml: string, options: ParseOptions): ParseResult {
  if (!xml.trim()) {
    return { articles: [], anomalies: [] };
  }

  const document = parseXmlDocument(xml);
  const articles: Article[] = [];
  const anomalies: ParseAnomaly[] = [];

  for (const record of Array.from(document.getElementsByTagName("PubmedArticle"))) {
    const citation = child(record, "MedlineCitation");
    const id = childText(citation, "PMID");
    if (!id) {
      anomalies.push({ id: "", field: "id", message: "record without PMID skipped" });
      continue;
    }

    const article = child(citation, "Article");
    const title = childText(article, "ArticleTitle");
    if (title.length < MIN_TITLE_CHARS) {
      anomalies.push({ id, field: "title", message: `title is suspiciously short (${JSON.stringify(title)})` });
    }

    articles.push({
      id,
      title,
      authors: formatAuthors(collectAuthorNames(article), options.etAl),
      journal: resolveJournal(record),
      publicationDate: resolvePublicationDate(record),
      doi: resolveDoi(record),
      url: articleUrl(id),
      abstract: extractAbstract(article),
      publicationTypes: collectPublicationTypes(article)
    });
  }

  return { articles, anomalies };
}

function parseXmlDocument(xml: string): Document {
  let document: Document;
  try {
    document = new JSDOM(xml, { contentType: "text/xml" }).window.document;
  } catch (error) {
    throw new DocumentParseError(`Fetch result is not well-formed XML: ${errorMessage(error)}`, { cause: error });
  }
  const root = document.documentElement;
  if (!root || root.tagName === "parsererror") {
    throw new DocumentParseError("Fetch result is not well-formed XML");
  }
  if (root.tagName !== "PubmedArticleSet") {
    // EFetch reports failures as <eFetchResult><ERROR>...</ERROR></eFetchResult> with HTTP 200.
    const reason = Array.from(root.getElementsByTagName("ERROR"), (node) => node.textContent?.trim() ?? "")
      .filter(Boolean)
      .join("; ");
    throw new DocumentParseError(`Fetch result has root <${root.tagName}>${reason ? `: ${reason}` : ""}`);
  }
  return document;
}

export function formatAuthors(names: string[], etAl: string): string {
  if (names.length === 0) {
    return "";
  }
  const listed = names.slice(0, MAX_LISTED_AUTHORS).join(", ");
  return names.length > MAX_LISTED_AUTHORS ? `${listed} ${etAl}` : listed;
}

function collectAuthorNames(article: Element | null): string[] {
  const names: string[] = [];
  for (const author of childElements(child(article, "AuthorList"), "Author")) {
    const last = childText(author, "LastName");
    const initials = childText(author, "Initials");
    if (last || initials) {
      names.push(`${last} ${initials}`.trim());
      continue;
    }
    const collective = childText(author, "CollectiveName");
    if (collective) {
      names.push(collective);
    }
  }
  return names;
}

function extractAbstract(article: Element | null): string {
  const sections: string[] = [];
  for (const section of childElements(child(article, "Abstract"), "AbstractText")) {
    const text = elementText(section);
    if (!text) {
      continue;
    }
    const label = section.getAttribute("Label")?.trim();
    sections.push(label ? `${label}: ${text}` : text);
  }
  return sections.join("\n");
}

/** ISO abbreviation, then MEDLINE abbreviation, then the full journal title. */
export function resolveJournal(record: Element): string {
  const citation = child(record, "MedlineCitation");
  const journal = child(citation, "Article", "Journal");
  return firstNonEmpty(
    childText(journal, "ISOAbbreviation"),
    childText(citation, "MedlineJournalInfo", "MedlineTA"),
    childText(journal, "Title")
  );
}

/**
 * Electronic article date, any other article date, the journal issue date
 * (or its free-text MedlineDate), then the PubMed history dates.
 */
export function resolvePublicationDate(record: Element): string {
  const article = child(record, "MedlineCitation", "Article");
  const articleDates = childElements(article, "ArticleDate");

  const electronic = articleDates.filter((el) => el.getAttribute("DateType")?.toLowerCase() === "electronic");
  const other = articleDates.filter((el) => el.getAttribute("DateType")?.toLowerCase() !== "electronic");
  for (const candidate of [...electronic, ...other]) {
    const formatted = formatDateElement(candidate);
    if (formatted) {
      return formatted;
    }
  }

  const pubDate = child(article, "Journal", "JournalIssue", "PubDate");
  const issueDate = formatDateElement(pubDate);
  if (issueDate) {
    return issueDate;
  }
  const medlineDate = childText(pubDate, "MedlineDate");
  if (medlineDate) {
    return medlineDate;
  }

  const history = childElements(child(record, "PubmedData", "History"), "PubMedPubDate");
  for (const status of HISTORY_STATUS_ORDER) {
    const match = history.find((el) => el.getAttribute("PubStatus")?.toLowerCase() === status);
    const formatted = formatDateElement(match ?? null);
    if (formatted) {
      return formatted;
    }
  }
  return "";
}

function formatDateElement(el: Element | null): string {
  if (!el) {
    return "";
  }
  return formatDateParts(childText(el, "Year"), childText(el, "Month"), childText(el, "Day"));
}

export function formatDateParts(year: string, month: string, day: string): string {
  if (!year) {
    return "";
  }
  const monthAbbrev = normaliseMonth(month);
  if (!monthAbbrev) {
    return year;
  }
  if (!/^\d{1,2}$/.test(day)) {
    return `${year} ${monthAbbrev}`;
  }
  return `${year} ${monthAbbrev} ${day.padStart(2, "0")}`;
}

/** Numeric (optionally zero-padded), three-letter or full English month to its three-letter form. */
export function normaliseMonth(token: string): string | null {
  const value = token.trim();
  if (!value) {
    return null;
  }
  if (/^\d{1,2}$/.test(value)) {
    const index = Number(value);
    return index >= 1 && index <= 12 ? MONTHS[index - 1] : null;
  }
  const lowered = value.toLowerCase();
  const abbrevIndex = MONTHS.findIndex((month) => month.toLowerCase() === lowered);
  if (abbrevIndex >= 0) {
    return MONTHS[abbrevIndex];
  }
  const fullIndex = FULL_MONTHS.indexOf(lowered);
  return fullIndex >= 0 ? MONTHS[fullIndex] : null;
}

function collectPublicationTypes(article: Element | null): string[] {
  const seen = new Set<string>();
  for (const el of childElements(child(article, "PublicationTypeList"), "PublicationType")) {
    const label = elementText(el);
    if (label) {
      seen.add(label);
    }
  }
  return Array.from(seen);
}

function resolveDoi(record: Element): string | null {
  for (const el of childElements(child(record, "PubmedData", "ArticleIdList"), "ArticleId")) {
    if (el.getAttribute("IdType")?.toLowerCase() !== "doi") {
      continue;
    }
    const value = elementText(el);
    if (value) {
      return value;
    }
  }
  return null;
}

// DOM helpers: direct-child lookups only, so reference lists never leak in.

function childElements(parent: Element | null, name: string): Element[] {
  if (!parent) {
    return [];
  }
  return Array.from(parent.children).filter((el) => el.tagName === name);
}

function child(parent: Element | null, ...names: string[]): Element | null {
  let cursor = parent;
  for (const name of names) {
    if (!cursor) {
      return null;
    }
    cursor = childElements(cursor, name)[0] ?? null;
  }
  return cursor;
}

function childText(parent: Element | null, ...names: string[]): string {
  return elementText(child(parent, ...names));
}

/** All nested text (inline markup included), whitespace collapsed. */
function elementText(el: Element | null): string {
  return (el?.textContent ?? "").replace(/\s+/g, " ").trim();
}

function firstNonEmpty(...values: string[]): string {
  return values.find((value) => value.length > 0) ?? "";
}
