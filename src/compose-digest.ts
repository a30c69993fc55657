import { t, type Language, type TranslationKey } from "@/lib/i18n";
import { translatePublicationTypes, type PublicationTypeTable } from "@/lib/publication-types";
import type { DigestArticle } from "@/lib/types";

export interface ComposeOptions {
  language: Language;
  fieldLabel: string;
  timezone: string;
  publicationTypes: PublicationTypeTable | null;
}

export interface ComposedDigest {
  subject: string;
  body: string;
}

export function composeDigest(items: DigestArticle[], options: ComposeOptions, now: Date): ComposedDigest {
  return {
    subject: composeSubject(options, now),
    body: composeBody(items, options)
  };
}

export function composeSubject(options: ComposeOptions, now: Date): string {
  const title = t(options.language, "digestTitle");
  const date = formatDateInTimezone(now, options.timezone);
  const field = options.fieldLabel.trim();
  return field
    ? t(options.language, "subjectWithField", { title, field, date })
    : t(options.language, "subject", { title, date });
}

export function composeBody(items: DigestArticle[], options: ComposeOptions): string {
  const { language } = options;
  const label = (key: TranslationKey, value: string) => `${t(language, key)}${t(language, "separator")}${value}`;
  const lines: string[] = [t(language, "digestTitle")];
  if (options.fieldLabel.trim()) {
    lines.push(options.fieldLabel.trim());
  }
  lines.push("", t(language, "countLine", { count: items.length }), "");

  items.forEach((item, index) => {
    lines.push(t(language, "articleHeading", { index: index + 1 }));
    lines.push(label("originalTitle", item.title));
    lines.push(label("translatedTitle", item.titleTranslated));
    if (item.authors) {
      lines.push(label("authors", item.authors));
    }
    lines.push(label("journal", item.journal));
    lines.push(label("published", item.publicationDate));
    const types = translatePublicationTypes(item.publicationTypes, options.publicationTypes);
    if (types.length > 0) {
      lines.push(label("publicationTypes", types.join(t(language, "listSeparator"))));
    }
    lines.push(label("pubmed", item.url));
    lines.push(label("doi", item.doi ?? "-"));
    lines.push(label("summary", "").trimEnd());
    if (item.summary.status === "summarized") {
      lines.push(...item.summary.bullets);
    } else {
      lines.push(`${t(language, "bulletMarker")}${t(language, "noAbstract")}`);
    }
    lines.push("");
  });

  return lines.join("\n");
}

/** `YYYY-MM-DD` as seen in the given IANA time zone (UTC if the zone is unknown). */
export function formatDateInTimezone(date: Date, timezone: string): string {
  try {
    const parts = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit"
    }).formatToParts(date);
    const map = Object.fromEntries(parts.map((part) => [part.type, part.value]));
    return `${map.year}-${map.month}-${map.day}`;
  } catch {
    return date.toISOString().slice(0, 10);
  }
}
