/**
 * HTTP access to the archive
 *
 * One plain GET per page. There is no retry: a failed request ends the run.
 */

import { FetchError } from "./errors.js";

/**
 * Realistic Chrome user agent.
 * The archive serves the same index markup to browsers and scripts.
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/**
 * Fetch a page and return its body as text.
 *
 * @param url - Absolute URL of the page
 * @returns Promise resolving to the HTML body
 * @throws {FetchError} On transport failure or a non-2xx status
 */
export async function fetchPage(url: string): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        "User-Agent": DEFAULT_USER_AGENT,
        Accept: "text/html, application/xhtml+xml, */*",
      },
      redirect: "follow",
    });
  } catch (error) {
    throw new FetchError(url, { cause: error });
  }

  if (!response.ok) {
    throw new FetchError(url, { status: response.status });
  }

  try {
    return await response.text();
  } catch (error) {
    throw new FetchError(url, { cause: error });
  }
}
