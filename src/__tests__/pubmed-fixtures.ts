export interface RecordParts {
  pmid?: string;
  title?: string;
  abstract?: string;
  authors?: string;
  journal?: string;
  dates?: string;
  extraArticle?: string;
  medlineInfo?: string;
  pubmedData?: string;
}

export function journalBlock(parts: { iso?: string; title?: string; pubDate?: string } = {}): string {
  return [
    "<Journal>",
    '<ISSN IssnType="Electronic">0000-0000</ISSN>',
    '<JournalIssue CitedMedium="Internet">',
    "<Volume>12</Volume>",
    `<PubDate>${parts.pubDate ?? ""}</PubDate>`,
    "</JournalIssue>",
    parts.title !== undefined ? `<Title>${parts.title}</Title>` : "",
    parts.iso !== undefined ? `<ISOAbbreviation>${parts.iso}</ISOAbbreviation>` : "",
    "</Journal>"
  ].join("");
}

export function pubmedArticle(parts: RecordParts = {}): string {
  const pmid = parts.pmid ?? "100";
  return [
    "<PubmedArticle>",
    '<MedlineCitation Status="MEDLINE" Owner="NLM">',
    pmid ? `<PMID Version="1">${pmid}</PMID>` : "",
    '<Article PubModel="Print-Electronic">',
    parts.journal ?? journalBlock({ iso: "Test J", title: "Test Journal" }),
    `<ArticleTitle>${parts.title ?? `Article ${pmid}`}</ArticleTitle>`,
    parts.abstract ?? "",
    parts.authors ?? "",
    parts.extraArticle ?? "",
    parts.dates ?? "",
    "</Article>",
    parts.medlineInfo ?? "",
    "</MedlineCitation>",
    parts.pubmedData ?? "",
    "</PubmedArticle>"
  ].join("");
}

export function articleSet(...articles: string[]): string {
  return `<?xml version="1.0" ?>\n<PubmedArticleSet>${articles.join("\n")}</PubmedArticleSet>`;
}

export function author(last: string, initials: string): string {
  return `<Author ValidYN="Y"><LastName>${last}</LastName><ForeName>${last}</ForeName><Initials>${initials}</Initials></Author>`;
}

export function authorList(...authors: string[]): string {
  return `<AuthorList CompleteYN="Y">${authors.join("")}</AuthorList>`;
}
