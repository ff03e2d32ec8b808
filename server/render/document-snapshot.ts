import * as cheerio from "cheerio";

export interface SnapshotElement {
  text: string;
  /** Class attribute values of the element's ancestors, nearest first */
  ancestorClasses: string[];
}

/**
 * Static view of a rendered page, parsed with cheerio. Everything here is
 * synchronous and side-effect free.
 */
export class DocumentSnapshot {
  private constructor(private readonly $: cheerio.CheerioAPI) {}

  static fromHtml(html: string): DocumentSnapshot {
    return new DocumentSnapshot(cheerio.load(html));
  }

  /** Matching elements in document order, text whitespace-collapsed */
  select(selector: string): SnapshotElement[] {
    const $ = this.$;
    return $(selector)
      .toArray()
      .map((el) => ({
        text: collapseWhitespace($(el).text()),
        ancestorClasses: $(el)
          .parents()
          .toArray()
          .map((ancestor) => $(ancestor).attr("class") ?? ""),
      }));
  }

  meta(attribute: "name" | "property", key: string): string | null {
    const content = this.$(`meta[${attribute}="${key}"]`).first().attr("content");
    return content === undefined ? null : collapseWhitespace(content);
  }
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
