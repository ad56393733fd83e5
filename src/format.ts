/**
 * Output renderers
 *
 * Each renderer turns the final record list into one complete document.
 * Records are rendered in the order given.
 */

import { stringify as stringifyYaml } from "yaml";
import type { FandomRecord, JsonFandomRecord, OutputFormat } from "./types.js";

type Renderer = (records: readonly FandomRecord[]) => string;

const TABLE_HEADERS = ["count", "name", "URL"] as const;

export function convertToJsonRecords(records: readonly FandomRecord[]): JsonFandomRecord[] {
  return records.map((record) => ({ count: record.count, name: record.name, url: record.url }));
}

/** One line per record: `<name> <count> - <url>` */
export function renderText(records: readonly FandomRecord[]): string {
  return records.map((record) => `${record.name} ${record.count} - ${record.url}\n`).join("");
}

/**
 * Compute the width of each table column (count, name, URL).
 * A column is as wide as its header or its widest cell, whichever is larger.
 */
export function tableColumnWidths(records: readonly FandomRecord[]): [number, number, number] {
  const widths: [number, number, number] = [TABLE_HEADERS[0].length, TABLE_HEADERS[1].length, TABLE_HEADERS[2].length];
  for (const record of records) {
    widths[0] = Math.max(widths[0], String(record.count).length);
    widths[1] = Math.max(widths[1], record.name.length);
    widths[2] = Math.max(widths[2], record.url.length);
  }
  return widths;
}

/**
 * Column-aligned table with a header and a dashed rule.
 *
 * @example
 * count | name   | URL
 * ------|--------|-----------
 * 120   | Barbaz | http://x/2
 */
export function renderTable(records: readonly FandomRecord[]): string {
  const [countWidth, nameWidth, urlWidth] = tableColumnWidths(records);
  const lines = [
    `${TABLE_HEADERS[0].padEnd(countWidth)} | ${TABLE_HEADERS[1].padEnd(nameWidth)} | ${TABLE_HEADERS[2]}`,
    `${"-".repeat(countWidth)}-|-${"-".repeat(nameWidth)}-|-${"-".repeat(urlWidth)}`,
  ];
  for (const record of records) {
    lines.push(`${String(record.count).padEnd(countWidth)} | ${record.name.padEnd(nameWidth)} | ${record.url}`);
  }
  return lines.map((line) => `${line}\n`).join("");
}

export function renderJson(records: readonly FandomRecord[]): string {
  return `${JSON.stringify(convertToJsonRecords(records), null, 2)}\n`;
}

export function renderJsonCompact(records: readonly FandomRecord[]): string {
  return `${JSON.stringify(convertToJsonRecords(records))}\n`;
}

export function renderYaml(records: readonly FandomRecord[]): string {
  return stringifyYaml(convertToJsonRecords(records));
}

const RENDERERS = {
  text: renderText,
  table: renderTable,
  json: renderJson,
  "json-compact": renderJsonCompact,
  yaml: renderYaml,
} satisfies Record<OutputFormat, Renderer>;

/** Render records in the requested output format */
export function renderRecords(format: OutputFormat, records: readonly FandomRecord[]): string {
  return RENDERERS[format](records);
}
