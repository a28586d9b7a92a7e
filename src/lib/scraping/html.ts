import * as cheerio from "cheerio";
import { collapseWhitespace } from "../extraction/normalize";
import { ContentType, type RawDocument, type Table } from "../types";

const BLOCK_ELEMENTS = "p, div, li, h1, h2, h3, h4, h5, h6, section, article, header, footer, tr, blockquote, pre";
const MAX_COLSPAN = 20;

export function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return "";
  }
}

/**
 * Splits a page into prose text and tables. `<table>` rows become tables
 * (colspan cells padded with blanks), `<dl>` lists become two-column tables,
 * and both are removed from the text so nothing is read twice.
 */
export function htmlToDocument(url: string, html: string, fetchedAt: string = new Date().toISOString()): RawDocument {
  const $ = cheerio.load(html);
  $("script, style, noscript, template, svg").remove();

  const tables: Table[] = [];
  $("table").each((_, table) => {
    const rows: Table = [];
    $(table)
      .find("tr")
      .each((_, tr) => {
        if ($(tr).closest("table").get(0) !== table) return; // rows of a nested table
        const cells: string[] = [];
        $(tr)
          .children("th, td")
          .each((_, cell) => {
            cells.push(collapseWhitespace($(cell).text()));
            const span = parseInt($(cell).attr("colspan") ?? "1", 10);
            for (let i = 1; i < Math.min(isNaN(span) ? 1 : span, MAX_COLSPAN); i++) cells.push("");
          });
        if (cells.some((c) => c !== "")) rows.push(cells);
      });
    if (rows.length > 0) tables.push(rows);
  });

  $("dl").each((_, dl) => {
    const rows: Table = [];
    $(dl)
      .children("dt")
      .each((_, dt) => {
        const dd = $(dt).nextAll("dd").first();
        rows.push([collapseWhitespace($(dt).text()), collapseWhitespace(dd.text())]);
      });
    if (rows.length > 0) tables.push(rows);
  });

  $("table, dl").remove();
  $("br").replaceWith("\n");
  $(BLOCK_ELEMENTS).each((_, el) => {
    $(el).append("\n");
  });

  const body = $("body");
  const rawText = body.length > 0 ? body.text() : $.root().text();
  const text = rawText
    .split("\n")
    .map((line) => line.replace(/[^\S\n]+/g, " ").trim())
    .filter((line) => line !== "")
    .join("\n");

  return {
    url,
    contentType: ContentType.HTML,
    text,
    tables,
    fetchedAt,
    sourceDomain: hostnameOf(url),
  };
}
