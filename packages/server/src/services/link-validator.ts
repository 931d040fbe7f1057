import axios, { type AxiosInstance } from 'axios';
import type { ValidatedLink } from '@metadata-writer/shared';
import type { ILinkValidator } from '../domain/ports';
import { errorMessage } from '../domain/errors';

const FETCH_TIMEOUT_MS = 12000;
const UNAVAILABLE_MARKERS = ['video unavailable', 'private video'];
const OG_TITLE = /property="og:title"\s+content="([^"]+)"/;

type HttpClient = Pick<AxiosInstance, 'get'>;

/**
 * One URL per non-blank line that starts with http:// or https://.
 */
export function parseLinks(text: string): string[] {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line.startsWith('http://') || line.startsWith('https://'));
}

export class LinkValidator implements ILinkValidator {
  constructor(
    private readonly http: HttpClient = axios.create({
      timeout: FETCH_TIMEOUT_MS,
      maxRedirects: 5,
      responseType: 'text',
      headers: { 'User-Agent': 'Mozilla/5.0' },
      // Every status is classified below instead of thrown
      validateStatus: () => true
    })
  ) {}

  /**
   * Fetches each URL in turn. A failing URL is recorded, never thrown.
   */
  public async validate(urls: string[]): Promise<ValidatedLink[]> {
    const results: ValidatedLink[] = [];
    for (const url of urls) {
      results.push(await this.check(url));
    }
    return results;
  }

  private async check(url: string): Promise<ValidatedLink> {
    try {
      const response = await this.http.get<unknown>(url);
      if (response.status !== 200) {
        return { url, ok: false, title: '', reason: `HTTP ${response.status}` };
      }

      const html = typeof response.data === 'string' ? response.data : '';
      const lower = html.toLowerCase();
      if (UNAVAILABLE_MARKERS.some((marker) => lower.includes(marker))) {
        return { url, ok: false, title: '', reason: 'Unavailable or private' };
      }

      const match = OG_TITLE.exec(html);
      return { url, ok: true, title: match ? match[1].trim() : '', reason: '' };
    } catch (error) {
      console.warn(`⚠️ Link check failed for ${url}: ${errorMessage(error)}`);
      return { url, ok: false, title: '', reason: errorMessage(error) };
    }
  }
}

