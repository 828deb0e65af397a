import { request, type Dispatcher } from 'undici';
import { config } from '../config.js';

export interface HtmlPage {
  url: string;
  status: number;
  /** Charset used to decode the body */
  charset: string;
  html: string;
}

export interface FetchHtmlOptions {
  timeoutMs?: number;
  /** Routes the request through a specific dispatcher instead of the global one. */
  dispatcher?: Dispatcher;
}

const DEFAULT_CHARSET = 'utf-8';
const MAX_REDIRECTIONS = 10;

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': config.FETCH_USER_AGENT,
  Accept: 'text/html,application/xhtml+xml',
};

export function charsetFromContentType(header: string | string[] | undefined): string | null {
  const value = Array.isArray(header) ? header[0] : header;
  const match = value?.match(/charset\s*=\s*["']?([^"';\s]+)/i);
  return match?.[1] ? match[1].toLowerCase() : null;
}

/** Decodes with `charset`, substituting U+FFFD for bad bytes; unknown labels fall back to UTF-8. */
export function decodeBody(bytes: Uint8Array, charset: string): { text: string; charset: string } {
  try {
    return { text: new TextDecoder(charset, { fatal: false }).decode(bytes), charset };
  } catch {
    // RangeError: label not supported by this runtime
    return { text: new TextDecoder(DEFAULT_CHARSET, { fatal: false }).decode(bytes), charset: DEFAULT_CHARSET };
  }
}

export async function fetchHtml(url: string, options: FetchHtmlOptions = {}): Promise<HtmlPage> {
  const timeoutMs = options.timeoutMs ?? config.FETCH_TIMEOUT_MS;

  const { statusCode, headers, body } = await request(url, {
    method: 'GET',
    headers: DEFAULT_HEADERS,
    maxRedirections: MAX_REDIRECTIONS,
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
    dispatcher: options.dispatcher,
  });

  // 3xx here means the redirect was not followed (no Location, or limit hit)
  if (statusCode < 200 || statusCode >= 300) {
    await body.dump();
    throw new Error(`HTTP Error ${statusCode}`);
  }

  const bytes = new Uint8Array(await body.arrayBuffer());
  const declared = charsetFromContentType(headers['content-type']) ?? DEFAULT_CHARSET;
  const { text, charset } = decodeBody(bytes, declared);

  return { url, status: statusCode, charset, html: text };
}
