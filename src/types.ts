/**
 * Shared type definitions for the scraper
 */

/** A single fandom listed on a category index page */
export interface FandomRecord {
  /** Display name, trimmed */
  readonly name: string;
  /** Number of works tagged under the fandom */
  readonly count: number;
  /** Absolute URL of the fandom's tag page */
  readonly url: string;
}

/** Record shape used by the JSON and YAML outputs (key order matters) */
export interface JsonFandomRecord {
  count: number;
  name: string;
  url: string;
}

/** Supported output formats */
export const OUTPUT_FORMATS = ["text", "table", "json", "json-compact", "yaml"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Logging verbosity: 0 silent, 1 progress, 2 detailed */
export type Verbosity = 0 | 1 | 2;

/** Loads the HTML body of a page */
export type PageLoader = (url: string) => Promise<string>;

/** Receives progress messages */
export type Logger = (message: string) => void;
