/**
 * Archive locations and the category lookup table
 */

/** Origin every relative fandom link is resolved against */
export const BASE_URL = "https://archiveofourown.org";

/** Path template of a category index page; `{}` is replaced by the category segment */
export const MEDIA_PATH = "/media/{}/fandoms";

/** Short category names mapped to the archive's own path segments */
export const CATEGORIES = Object.freeze({
  anime: "Anime%20*a*%20Manga",
  books: "Books%20*a*%20Literature",
  cartoons: "Cartoons%20*a*%20Comics%20*a*%20Graphic%20Novels",
  celebrities: "Celebrities%20*a*%20Real People",
  movies: "Movies",
  music: "Music%20*a*%20Bands",
  other: "Other%20Media",
  theater: "Theater",
  tv: "TV%20Shows",
  videogames: "Video%20Games",
} as const);

export type CategoryName = keyof typeof CATEGORIES;

export const CATEGORY_NAMES: readonly CategoryName[] = Object.freeze([
  "anime",
  "books",
  "cartoons",
  "celebrities",
  "movies",
  "music",
  "other",
  "theater",
  "tv",
  "videogames",
]);

export function isCategoryName(value: string): value is CategoryName {
  return (CATEGORY_NAMES as readonly string[]).includes(value);
}

/**
 * Build the index page URL for a category path segment.
 *
 * @example
 * buildCategoryUrl("Movies") // 'https://archiveofourown.org/media/Movies/fandoms'
 */
export function buildCategoryUrl(pathSegment: string, baseUrl: string = BASE_URL, mediaPath: string = MEDIA_PATH): string {
  return baseUrl + mediaPath.replace("{}", pathSegment);
}
