/**
 * Fetch category index pages and combine their fandom lists
 */

import { filterAndSort, mergeRecords } from "./aggregate.js";
import { BASE_URL, buildCategoryUrl, MEDIA_PATH } from "./categories.js";
import { fetchPage } from "./http.js";
import { parseIndexPage } from "./parse.js";
import type { FandomRecord, Logger, PageLoader, Verbosity } from "./types.js";

/** Configuration options for the fetcher */
export interface FetcherOptions {
  /** Archive origin (default: https://archiveofourown.org) */
  baseUrl?: string;
  /** Index page path template, `{}` marks the category segment */
  mediaPath?: string;
  /** 0 silent, 1 progress, 2 detailed (default: 1) */
  verbosity?: Verbosity;
  /** Page loader (default: {@link fetchPage}) */
  loadPage?: PageLoader;
  /** Progress sink (default: console.error, keeping stdout for results) */
  logger?: Logger;
}

export class Fetcher {
  readonly baseUrl: string;
  readonly mediaPath: string;
  verbosity: Verbosity;
  private readonly loadPage: PageLoader;
  private readonly logger: Logger;

  constructor(options: FetcherOptions = {}) {
    this.baseUrl = options.baseUrl ?? BASE_URL;
    this.mediaPath = options.mediaPath ?? MEDIA_PATH;
    this.verbosity = options.verbosity ?? 1;
    this.loadPage = options.loadPage ?? fetchPage;
    this.logger = options.logger ?? ((message) => console.error(message));
  }

  /** Log a message if the current verbosity is at least `level` */
  log(message: string, level: 1 | 2 = 1): void {
    if (this.verbosity >= level) {
      this.logger(message);
    }
  }

  categoryUrl(pathSegment: string): string {
    return buildCategoryUrl(pathSegment, this.baseUrl, this.mediaPath);
  }

  /**
   * Fetch one index page and parse its fandoms.
   *
   * @throws {FetchError} If the page cannot be fetched
   * @throws {ParseError} If the page markup is not as expected
   */
  async fetchFandoms(url: string): Promise<FandomRecord[]> {
    this.log(`Fetching fandoms from ${url}`, 1);
    const html = await this.loadPage(url);
    const records = parseIndexPage(html, this.baseUrl);
    this.log(`Fetched ${records.length} fandoms from ${url}`, 2);
    return records;
  }

  /**
   * Fetch several categories one after another, merge them without duplicates,
   * drop fandoms below `minCount` works and sort by work count.
   *
   * @param categoryPaths - Archive path segments, see CATEGORIES
   */
  async fetchAll(categoryPaths: readonly string[], minCount = 0): Promise<FandomRecord[]> {
    let merged: FandomRecord[] = [];

    for (const path of categoryPaths) {
      const fandoms = await this.fetchFandoms(this.categoryUrl(path));
      const { records, duplicateCount } = mergeRecords([merged, fandoms]);
      if (duplicateCount > 0) {
        this.log(`Merging lists resulted in dropping ${duplicateCount} duplicates`, 2);
      }
      merged = records;
    }

    const { records, filteredCount } = filterAndSort(merged, minCount);
    if (filteredCount > 0) {
      this.log(`Filtered ${filteredCount} fandoms out for having too few works`, 2);
    }
    return records;
  }
}
