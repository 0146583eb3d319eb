/**
 * HTML to plain text conversion
 *
 * Regex-based, no DOM. Good enough for the server-rendered fragments
 * returned by the guest job pages.
 */

import { collapseWhitespace } from "@/utils/text/textNormalization";

const NON_CONTENT_BLOCK_PATTERN = /<(script|style|noscript)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;
const COMMENT_PATTERN = /<!--[\s\S]*?-->/g;
const TAG_PATTERN = /<\/?[a-zA-Z][^>]*>/g;
const ENTITY_PATTERN = /&(#x[0-9a-f]+|#\d+|[a-z]+);/gi;

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  ndash: "–",
  mdash: "—",
  hellip: "…",
  rsquo: "’",
  lsquo: "‘",
  rdquo: "”",
  ldquo: "“",
  bull: "•",
};

/**
 * Decode HTML character references in a single pass
 *
 * Unknown named entities are left as-is.
 *
 * @example
 * decodeEntities("R&amp;D &#8211; 5&#x2B; yrs") // "R&D – 5+ yrs"
 */
export function decodeEntities(text: string): string {
  return text.replace(ENTITY_PATTERN, (entity, body: string) => {
    if (body[0] === "#") {
      const isHex = body[1] === "x" || body[1] === "X";
      const codePoint = parseInt(body.slice(isHex ? 2 : 1), isHex ? 16 : 10);
      if (!Number.isFinite(codePoint) || codePoint < 0 || codePoint > 0x10ffff) {
        return entity;
      }
      return String.fromCodePoint(codePoint);
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

/**
 * Convert an HTML fragment to normalized plain text
 *
 * Script/style blocks and comments are dropped, every tag becomes a
 * space, entities are decoded, whitespace is collapsed and trimmed.
 *
 * @example
 * htmlToText("<p>Build <b>APIs</b></p><ul><li>Go</li></ul>") // "Build APIs Go"
 */
export function htmlToText(html: string): string {
  const withoutBlocks = html
    .replace(NON_CONTENT_BLOCK_PATTERN, " ")
    .replace(COMMENT_PATTERN, " ");
  const withoutTags = withoutBlocks.replace(TAG_PATTERN, " ");
  return collapseWhitespace(decodeEntities(withoutTags));
}
