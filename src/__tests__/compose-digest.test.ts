import { describe, expect, it } from "vitest";
import type { DigestArticle } from "@/lib/types";
import { composeBody, composeDigest, composeSubject, formatDateInTimezone, type ComposeOptions } from "../compose-digest";

const jaOptions: ComposeOptions = {
  language: "ja",
  fieldLabel: "放射線腫瘍学",
  timezone: "Asia/Tokyo",
  publicationTypes: new Map([["Journal Article", "原著論文"]])
};

const enOptions: ComposeOptions = {
  language: "en",
  fieldLabel: "",
  timezone: "UTC",
  publicationTypes: null
};

function item(overrides: Partial<DigestArticle> = {}): DigestArticle {
  return {
    id: "1",
    title: "Proton therapy outcomes",
    titleTranslated: "Proton therapy outcomes (AI)",
    authors: "Smith A",
    journal: "Test J",
    publicationDate: "2025 Jan 07",
    doi: null,
    url: "https://pubmed.ncbi.nlm.nih.gov/1/",
    abstract: "Abstract.",
    publicationTypes: ["Journal Article", "Review"],
    summary: { status: "summarized", bullets: ["- a", "- b", "- c", "- d"] },
    ...overrides
  };
}

describe("composeSubject", () => {
  it("includes the field label and the date in the configured zone", () => {
    expect(composeSubject(jaOptions, new Date("2026-10-18T16:00:00Z"))).toBe(
      "新着論文AI要約配信（放射線腫瘍学）2026-10-19"
    );
  });

  it("omits the field label when none is set", () => {
    expect(composeSubject(enOptions, new Date("2026-10-18T16:00:00Z"))).toBe("New Article AI Digest 2026-10-18");
  });
});

describe("composeBody", () => {
  it("reports zero articles for an empty batch", () => {
    expect(composeBody([], jaOptions)).toBe("新着論文AI要約配信\n放射線腫瘍学\n\n本日の新着論文は0件です。\n");
  });

  it("renders a full article block", () => {
    expect(composeBody([item()], enOptions)).toBe(
      [
        "New Article AI Digest",
        "",
        "1 articles in today's digest.",
        "",
        "[Article 1]",
        "Original title: Proton therapy outcomes",
        "Translated title (AI): Proton therapy outcomes (AI)",
        "Authors: Smith A",
        "Journal: Test J",
        "Published: 2025 Jan 07",
        "Publication type: Journal Article, Review",
        "PubMed: https://pubmed.ncbi.nlm.nih.gov/1/",
        "DOI: -",
        "Summary (AI-generated):",
        "- a",
        "- b",
        "- c",
        "- d",
        ""
      ].join("\n")
    );
  });

  it("translates publication types and marks articles without an abstract", () => {
    const body = composeBody(
      [
        item({
          id: "2",
          authors: "",
          doi: "10.1000/xyz",
          abstract: "",
          publicationTypes: ["Journal Article", "Twin Study"],
          summary: { status: "no_abstract" }
        })
      ],
      jaOptions
    );
    const lines = body.split("\n");

    expect(lines.slice(5)).toEqual([
      "[論文1]",
      "原題：Proton therapy outcomes",
      "邦題（AI要約）：Proton therapy outcomes (AI)",
      "雑誌名：Test J",
      "発行日：2025 Jan 07",
      "論文種別：原著論文、Twin Study",
      "Pubmed：https://pubmed.ncbi.nlm.nih.gov/1/",
      "DOI：10.1000/xyz",
      "要約（AI生成）：",
      "・この論文にはPubMed上でアブストラクトが見つかりません",
      ""
    ]);
  });

  it("numbers articles in order", () => {
    const body = composeBody([item(), item({ id: "2" })], enOptions);
    expect(body.split("\n").filter((line) => line.startsWith("[Article"))).toEqual(["[Article 1]", "[Article 2]"]);
  });
});

describe("composeDigest", () => {
  it("pairs subject and body", () => {
    const digest = composeDigest([], enOptions, new Date("2026-01-01T00:00:00Z"));
    expect(digest).toEqual({
      subject: "New Article AI Digest 2026-01-01",
      body: "New Article AI Digest\n\n0 articles in today's digest.\n"
    });
  });
});

describe("formatDateInTimezone", () => {
  it("falls back to the UTC date for an unknown zone", () => {
    expect(formatDateInTimezone(new Date("2026-03-04T23:30:00Z"), "Not/AZone")).toBe("2026-03-04");
  });
});
