import { load } from "cheerio";
import { getAppConfig } from "../config";
import { patterns } from "../utils/patterns";

export type ShowMetadata = {
  title: string;
  url: string;
};

const HTTP_HEADERS = {
  Accept: "text/html",
  "Accept-Language": "en-US,en;q=0.8",
  "User-Agent": "Mozilla/5.0 (X11; Linux x86_64; rv:128.0) Gecko/20100101 Firefox/128.0",
};

/**
 * Normalise user input to the identifier used by the feed: digits without the tt prefix.
 * @param input IMDB id such as tt0944947 or 0944947
 * @returns the identifier, or null when the input is not an IMDB id
 */
export const normaliseShowId = (input: string): string | null => {
  const match = input.trim().match(patterns.imdbId);
  return match ? match[1] : null;
};

/**
 * Build a URL to the IMDB title page for the given show.
 * @param showId identifier without the tt prefix
 */
const buildImdbTitleUrl = (imdbUrl: string, showId: string): string =>
  `${imdbUrl}/title/tt${encodeURIComponent(showId)}/`;

/**
 * Scrape the title and canonical URL of a show from its IMDB page.
 * @param showId identifier without the tt prefix
 * @returns the show metadata, or null when IMDB has no such title
 * @throws Error when the page cannot be fetched
 */
export const fetchShowMetadata = async (
  showId: string,
): Promise<ShowMetadata | null> => {
  const appConfig = getAppConfig();
  const titleUrl = buildImdbTitleUrl(appConfig.imdbUrl, showId);
  const response = await fetch(titleUrl, {
    headers: HTTP_HEADERS,
    signal: AbortSignal.timeout(appConfig.requestTimeoutMs),
  });

  if (response.status === 404) {
    return null;
  }
  if (!response.ok) {
    throw new Error(`IMDB answered HTTP ${response.status} for ${titleUrl}`);
  }

  const $ = load(await response.text());
  const title =
    $('meta[property="og:title"]').attr("content")?.trim() ||
    $("title").text().trim();
  const url = $('meta[property="og:url"]').attr("content")?.trim() || titleUrl;

  return { title: title || `tt${showId}`, url };
};
