/**
 * Ad Library search - fetch the keyword search page and extract ad cards
 */

import { getLogger } from '../log/logger';

const log = getLogger({ module: 'AdLibrary' });

export interface AdRecord {
  title: string;
  start_date: string;
  end_date: string;
}

export interface SearchOptions {
  baseUrl: string;
  timeoutMs?: number; // Timeout in milliseconds (default: 30000)
  userAgent?: string;
  /** Extra query parameters (start_time, end_time, sort_type, ...); undefined values are skipped */
  params?: Record<string, string | undefined>;
  fetchImpl?: typeof fetch;
}

const MISSING = 'N/A';

/**
 * Build the search URL: `<baseUrl>?region=..&adv_name=..[&extra...]`
 */
export function buildQuery(
  baseUrl: string,
  region: string,
  keyword: string,
  params: Record<string, string | undefined> = {}
): string {
  const query = new URLSearchParams({ region, adv_name: keyword });
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      query.append(key, value);
    }
  }
  return `${baseUrl}?${query.toString()}`;
}

/**
 * Fetch the search page HTML
 */
export async function fetchSearchPage(url: string, options: SearchOptions): Promise<string> {
  const {
    timeoutMs = 30000,
    userAgent = 'Mozilla/5.0 (compatible; crawl-pipeline/1.0)',
    fetchImpl = fetch,
  } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, {
      headers: {
        'User-Agent': userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
      },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    return await response.text();
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new Error(`Request timeout after ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

const AD_CARD_START = /<div[^>]*class=["'][^"']*\bad_card\b[^"']*["'][^>]*>/gi;
const TITLE = /<span[^>]*class=["'][^"']*\bad_info_text\b[^"']*["'][^>]*>([\s\S]*?)<\/span>/i;

function labelledValue(block: string, label: string): string {
  const pattern = new RegExp(
    `<span[^>]*>\\s*${label}\\s*</span>[\\s\\S]*?<span[^>]*class=["'][^"']*\\bad_item_value\\b[^"']*["'][^>]*>([\\s\\S]*?)</span>`,
    'i'
  );
  const match = block.match(pattern);
  return match ? cleanText(match[1]) : MISSING;
}

/**
 * Extract every ad card from a search page. Missing fields become 'N/A'.
 */
export function parseAdCards(html: string): AdRecord[] {
  const starts = [...html.matchAll(AD_CARD_START)].map((match) => match.index ?? 0);

  const ads = starts.map((start, i) => {
    const block = html.slice(start, starts[i + 1] ?? html.length);
    const titleMatch = block.match(TITLE);
    return {
      title: titleMatch ? cleanText(titleMatch[1]) : MISSING,
      start_date: labelledValue(block, 'First shown:'),
      end_date: labelledValue(block, 'Last shown:'),
    };
  });

  log.debug({ count: ads.length }, 'parsed ad cards');
  return ads;
}

/**
 * Search the ad library for a keyword in a region
 */
export async function searchAds(keyword: string, region: string, options: SearchOptions): Promise<AdRecord[]> {
  const url = buildQuery(options.baseUrl, region, keyword, options.params);
  log.info({ url }, 'fetching ad library page');
  const html = await fetchSearchPage(url, options);
  const ads = parseAdCards(html);
  log.info({ keyword, region, count: ads.length }, 'ad search complete');
  return ads;
}

function cleanText(fragment: string): string {
  const text = decodeHtmlEntities(fragment.replace(/<[^>]+>/g, ' ')).replace(/\s+/g, ' ').trim();
  return text.length > 0 ? text : MISSING;
}

/**
 * Decode common HTML entities
 */
function decodeHtmlEntities(text: string): string {
  const entities: Record<string, string> = {
    '&amp;': '&',
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&#39;': "'",
    '&apos;': "'",
    '&nbsp;': ' ',
  };

  return text.replace(/&[a-z]+;|&#\d+;/gi, (match) => entities[match.toLowerCase()] ?? match);
}
