import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { isRecord } from '../utils';

export interface SearchProvider {
  /** Main content of the best result published on or before `asOfDate`. */
  search(query: string, asOfDate: string): Promise<string>;
}

const MAX_CONTENT_CHARS = 4000;

interface SearchHit {
  url: string;
  date?: string;
}

function toHits(data: unknown): SearchHit[] {
  const items: unknown = isRecord(data) ? data.data : undefined;
  if (!Array.isArray(items)) return [];
  return items
    .filter(isRecord)
    .filter((h) => typeof h.url === 'string')
    .map((h) => ({ url: String(h.url), date: typeof h.date === 'string' ? h.date : undefined }));
}

/** Hits with an unparseable date are kept; dated ones must not be after `asOfDate`. */
export function publishedBy(hit: SearchHit, asOfDate: string): boolean {
  if (!hit.date) return true;
  const t = Date.parse(hit.date);
  if (Number.isNaN(t)) return true;
  return new Date(t).toISOString().slice(0, 10) <= asOfDate;
}

/** Jina AI search (`s.jina.ai`) followed by a reader scrape (`r.jina.ai`) of the first admissible hit. */
export class JinaSearch implements SearchProvider {
  private readonly client: Pick<AxiosInstance, 'get'>;

  constructor(apiKey: string, client?: Pick<AxiosInstance, 'get'>) {
    this.client =
      client ??
      axios.create({
        headers: { Authorization: `Bearer ${apiKey}`, Accept: 'application/json' },
        timeout: 20_000,
      });
  }

  async search(query: string, asOfDate: string): Promise<string> {
    const res = await this.client.get('https://s.jina.ai/', {
      params: { q: query, n: 5 },
      headers: { 'X-Respond-With': 'no-content' },
    });
    const hit = toHits(res.data).find((h) => publishedBy(h, asOfDate));
    if (!hit) return `No results published on or before ${asOfDate} for "${query}".`;

    const page = await this.client.get(`https://r.jina.ai/${hit.url}`);
    const doc: unknown = page.data?.data;
    const field = (k: string): string => {
      const v = isRecord(doc) ? doc[k] : undefined;
      return typeof v === 'string' ? v : '';
    };
    const content = field('content');
    return [
      `Title: ${field('title')}`,
      `URL: ${hit.url}`,
      `Published: ${field('publishedTime') || hit.date || 'unknown'}`,
      `Content: ${content.length > MAX_CONTENT_CHARS ? content.slice(0, MAX_CONTENT_CHARS) + '...' : content}`,
    ].join('\n');
  }
}
