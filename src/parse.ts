/**
 * Index page parser
 *
 * A category index page lists fandoms in one or more group containers:
 *
 *   <ol class="tags index group">
 *     <li><a class="tag" href="/tags/Foo/works">Foo</a> (42)</li>
 *     ...
 *   </ol>
 *
 * Each list item becomes one record; the trailing "(N)" is the work count.
 */

import * as cheerio from "cheerio";
import { type AnyNode, type Element, isTag } from "domhandler";
import { BASE_URL } from "./categories.js";
import { ParseError } from "./errors.js";
import { createRecord } from "./record.js";
import type { FandomRecord } from "./types.js";

/** Selector for the fandom listing containers */
export const GROUP_SELECTOR = ".tags.index.group";

const COUNT_TOKEN = /^\((\d+)\)$/;

/**
 * Split a list item's text into name and work count.
 * The split happens at the last whitespace run, so names may contain spaces.
 *
 * @throws {ParseError} If there is no count token or it is not "(digits)"
 */
export function splitNameAndCount(text: string): { name: string; count: number } {
  const trimmed = text.trim();
  const match = trimmed.match(/^([\s\S]*\S)\s+(\S+)$/);
  if (!match) {
    throw new ParseError("List item has no work count", trimmed);
  }

  const countMatch = match[2].match(COUNT_TOKEN);
  if (!countMatch) {
    throw new ParseError("Malformed work count", trimmed);
  }

  return { name: match[1].trim(), count: parseInt(countMatch[1], 10) };
}

function isListItem(node: AnyNode): node is Element {
  return isTag(node) && node.name === "li";
}

/**
 * Parse the direct `li` children of one group container.
 * Text, comments and non-`li` elements between the items are skipped.
 */
export function parseGroup($: cheerio.CheerioAPI, group: Element, baseUrl: string = BASE_URL): FandomRecord[] {
  const records: FandomRecord[] = [];

  for (const child of group.children) {
    if (!isListItem(child)) continue;

    const item = $(child);
    const text = item.text().trim();
    const link = item.find("a").first();
    if (link.length === 0) {
      throw new ParseError("List item has no link", text);
    }

    const href = link.attr("href");
    if (!href) {
      throw new ParseError("List item link has no href", text);
    }

    const { name, count } = splitNameAndCount(text);
    records.push(createRecord(name, count, baseUrl + href));
  }

  return records;
}

/**
 * Parse every fandom listed on a category index page, in document order.
 *
 * @param html - Raw HTML of the index page
 * @param baseUrl - Origin that relative links are prefixed with
 */
export function parseIndexPage(html: string, baseUrl: string = BASE_URL): FandomRecord[] {
  const $ = cheerio.load(html);
  const records: FandomRecord[] = [];

  $(GROUP_SELECTOR).each((_, group) => {
    records.push(...parseGroup($, group, baseUrl));
  });

  return records;
}
