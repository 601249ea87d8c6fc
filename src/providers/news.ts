import * as cheerio from "cheerio";
import type { AxiosInstance } from "axios";
import { log } from "../logger.js";
import type { Company, NewsItem } from "../types.js";
import { httpClient, toProviderError } from "./http.js";

export interface NewsSource {
  /** Empty array is a valid, non-error outcome. */
  fetchNews(company: Company): Promise<NewsItem[]>;
}

const GOOGLE_NEWS_RSS = "https://news.google.com/rss/search";

/** Google News descriptions are escaped HTML snippets; keep the text only. */
function stripMarkup(html: string): string {
  if (!html) return "";
  return cheerio.load(html).root().text().replace(/\s+/g, " ").trim();
}

/** Map an RSS 2.0 document to NewsItem[] (first `max` items). */
export function parseRss(xml: string, max: number): NewsItem[] {
  const $ = cheerio.load(xml, { xml: true });
  const out: NewsItem[] = [];

  $("item").each((_, el) => {
    if (out.length >= max) return false;
    const item = $(el);
    const title = item.children("title").text().trim();
    if (!title) return;
    const description = stripMarkup(item.children("description").text());
    out.push({
      title,
      description: description || title,
      url: item.children("link").text().trim(),
      publishedAt: item.children("pubDate").text().trim(),
      source: item.children("source").text().trim() || "unknown",
    });
  });
  return out;
}

/** Google News RSS search: free, keyless. */
export class GoogleNewsSource implements NewsSource {
  constructor(
    private readonly maxResults = 10,
    private readonly http: AxiosInstance = httpClient
  ) {}

  async fetchNews(company: Company): Promise<NewsItem[]> {
    try {
      const { data } = await this.http.get<string>(GOOGLE_NEWS_RSS, {
        params: { q: company.name, hl: "en-US", gl: "US", ceid: "US:en" },
        responseType: "text",
      });
      const items = parseRss(String(data), this.maxResults);
      log.info("[NEWS] fetched", { company: company.name, count: items.length });
      return items;
    } catch (err) {
      throw toProviderError("google_news", err);
    }
  }
}
