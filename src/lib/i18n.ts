export type Language = "ja" | "en";

export const DEFAULT_LANGUAGE: Language = "ja";

export const translations = {
  ja: {
    // Header
    digestTitle: "新着論文AI要約配信",
    subject: "{title} {date}",
    subjectWithField: "{title}（{field}）{date}",
    countLine: "本日の新着論文は{count}件です。",

    // Article block
    articleHeading: "[論文{index}]",
    originalTitle: "原題",
    translatedTitle: "邦題（AI要約）",
    authors: "著者",
    journal: "雑誌名",
    published: "発行日",
    publicationTypes: "論文種別",
    pubmed: "Pubmed",
    doi: "DOI",
    summary: "要約（AI生成）",
    separator: "：",
    listSeparator: "、",

    // Parser
    etAl: "ほか",

    // Summaries
    bulletMarker: "・",
    translationFailed: "（邦題生成に失敗）",
    insufficientSummary: "（要約が不足しています）",
    noAbstract: "この論文にはPubMed上でアブストラクトが見つかりません",

    // Prompt
    languageName: "Japanese"
  },
  en: {
    // Header
    digestTitle: "New Article AI Digest",
    subject: "{title} {date}",
    subjectWithField: "{title} ({field}) {date}",
    countLine: "{count} articles in today's digest.",

    // Article block
    articleHeading: "[Article {index}]",
    originalTitle: "Original title",
    translatedTitle: "Translated title (AI)",
    authors: "Authors",
    journal: "Journal",
    published: "Published",
    publicationTypes: "Publication type",
    pubmed: "PubMed",
    doi: "DOI",
    summary: "Summary (AI-generated)",
    separator: ": ",
    listSeparator: ", ",

    // Parser
    etAl: "et al.",

    // Summaries
    bulletMarker: "- ",
    translationFailed: "(translation failed)",
    insufficientSummary: "(insufficient summary)",
    noAbstract: "No abstract is available for this article on PubMed",

    // Prompt
    languageName: "English"
  }
} as const;

export type TranslationKey = keyof typeof translations.ja;

export function t(language: Language, key: TranslationKey, params: Record<string, string | number> = {}): string {
  const template: string = translations[language][key];
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    const value = params[name];
    return value === undefined ? match : String(value);
  });
}
