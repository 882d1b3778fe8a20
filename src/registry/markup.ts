// pattern: Functional Core

import { parseHTML } from "linkedom";

/**
 * Reduce a registry title to plain text. Search titles arrive with highlighting markup
 * such as `<em class='found'>` around matched substrings, and may carry HTML entities.
 */
export function stripMarkup(html: string): string {
  if (!html.includes("<") && !html.includes("&")) {
    return collapseWhitespace(html);
  }

  const { document } = parseHTML(`<!doctype html><html><body>${html}</body></html>`);
  return collapseWhitespace(document.body.textContent ?? "");
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
