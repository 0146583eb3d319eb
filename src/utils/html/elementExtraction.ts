/**
 * Element extraction utilities
 *
 * Finds the first element matching a simple selector (tag, id, class,
 * excluded class, attribute value, optional ancestor scope) and returns
 * its attributes and inner HTML. Nesting of the matched tag is balanced by counting open/close
 * tags of the same name.
 *
 * Note: This is intentionally simple and deterministic. It does not
 * handle '>' inside attribute values or malformed nesting across tags.
 */

import type { ElementSelector } from "@/types";
import { decodeEntities, htmlToText } from "./htmlText";

const OPEN_TAG_PATTERN = /<([a-zA-Z][a-zA-Z0-9-]*)((?:\s[^<>]*?)?)\s*(\/?)>/g;
const ATTRIBUTE_PATTERN =
  /([^\s=/>"']+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+)))?/g;

const VOID_ELEMENTS = new Set([
  "area",
  "base",
  "br",
  "col",
  "embed",
  "hr",
  "img",
  "input",
  "link",
  "meta",
  "source",
  "track",
  "wbr",
]);

export type ExtractedElement = {
  tagName: string;
  attributes: Record<string, string>;
  innerHtml: string;
};

/**
 * Parse the attribute section of an opening tag
 *
 * Names are lowercased; values are entity-decoded. Valueless attributes
 * map to "".
 */
export function parseAttributes(source: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const match of source.matchAll(ATTRIBUTE_PATTERN)) {
    const name = match[1].toLowerCase();
    const value = match[2] ?? match[3] ?? match[4] ?? "";
    if (!(name in attributes)) {
      attributes[name] = decodeEntities(value);
    }
  }
  return attributes;
}

function classList(attributes: Record<string, string>): string[] {
  return (attributes["class"] ?? "").split(/\s+/).filter(Boolean);
}

function matchesSelector(
  tagName: string,
  attributes: Record<string, string>,
  selector: ElementSelector,
): boolean {
  if (selector.tag && selector.tag.toLowerCase() !== tagName) {
    return false;
  }
  if (selector.id && attributes["id"] !== selector.id) {
    return false;
  }
  const classes = classList(attributes);
  if (selector.className && !classes.includes(selector.className)) {
    return false;
  }
  if (selector.notClassName && classes.includes(selector.notClassName)) {
    return false;
  }
  if (
    selector.attribute &&
    attributes[selector.attribute.name.toLowerCase()] !== selector.attribute.value
  ) {
    return false;
  }
  return true;
}

/**
 * Return the inner HTML of an element whose opening tag ends at `start`
 *
 * Unclosed elements run to the end of the document.
 */
function readInnerHtml(html: string, tagName: string, start: number): string {
  const tagPattern = new RegExp(`<(/?)${tagName}\\b[^>]*?(/?)>`, "gi");
  tagPattern.lastIndex = start;

  let depth = 1;
  let match: RegExpExecArray | null;
  while ((match = tagPattern.exec(html)) !== null) {
    const isClose = match[1] === "/";
    const isSelfClosing = match[2] === "/";
    if (isClose) {
      depth--;
      if (depth === 0) {
        return html.slice(start, match.index);
      }
    } else if (!isSelfClosing) {
      depth++;
    }
  }
  return html.slice(start);
}

/**
 * Find the first element matching the selector
 *
 * @param html - Raw HTML string
 * @param selector - Element selector
 * @returns The element, or null when nothing matches
 */
export function findElement(
  html: string,
  selector: ElementSelector,
): ExtractedElement | null {
  if (selector.within) {
    const scope = findElement(html, selector.within);
    return scope
      ? findElement(scope.innerHtml, { ...selector, within: undefined })
      : null;
  }

  for (const match of html.matchAll(OPEN_TAG_PATTERN)) {
    const tagName = match[1].toLowerCase();
    const attributes = parseAttributes(match[2]);

    if (!matchesSelector(tagName, attributes, selector)) {
      continue;
    }

    const isVoid = VOID_ELEMENTS.has(tagName) || match[3] === "/";
    const innerStart = (match.index ?? 0) + match[0].length;
    return {
      tagName,
      attributes,
      innerHtml: isVoid ? "" : readInnerHtml(html, tagName, innerStart),
    };
  }
  return null;
}

/**
 * Text of the first selector (in order) that yields non-empty text
 *
 * @returns Normalized text, or "" when no selector matches
 */
export function selectText(html: string, selectors: ElementSelector[]): string {
  for (const selector of selectors) {
    const element = findElement(html, selector);
    if (!element) {
      continue;
    }
    const text = htmlToText(element.innerHtml);
    if (text) {
      return text;
    }
  }
  return "";
}

/**
 * Attribute value of the first selector (in order) that has it
 *
 * @returns The trimmed value, or null when no selector matches
 */
export function selectAttribute(
  html: string,
  selectors: ElementSelector[],
  attributeName: string,
): string | null {
  const name = attributeName.toLowerCase();
  for (const selector of selectors) {
    const element = findElement(html, selector);
    const value = element?.attributes[name]?.trim();
    if (value) {
      return value;
    }
  }
  return null;
}
