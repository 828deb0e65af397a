import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent, errors, type Dispatcher } from 'undici';
import { charsetFromContentType, decodeBody, fetchHtml } from '../../src/workers/http-client.js';

const ORIGIN = 'https://site.test';

/** MockAgent that keeps the options of every request it is handed. */
class RecordingAgent extends MockAgent {
  readonly dispatched: Dispatcher.DispatchOptions[] = [];

  override dispatch(options: Dispatcher.DispatchOptions, handler: Dispatcher.DispatchHandlers): boolean {
    this.dispatched.push(options);
    return super.dispatch(options, handler);
  }
}

describe('fetchHtml', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should return the decoded body of a successful response', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/about', method: 'GET' })
      .reply(200, '<title>About</title>', { headers: { 'content-type': 'text/html; charset=utf-8' } });

    const page = await fetchHtml(`${ORIGIN}/about`, { dispatcher: agent });

    expect(page).toEqual({ url: `${ORIGIN}/about`, status: 200, charset: 'utf-8', html: '<title>About</title>' });
  });

  it('should decode with the charset the server declares', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/', method: 'GET' })
      .reply(200, Buffer.from([0x63, 0x61, 0x66, 0xe9]), {
        headers: { 'content-type': 'text/html; charset=ISO-8859-1' },
      });

    const page = await fetchHtml(`${ORIGIN}/`, { dispatcher: agent });

    expect(page.charset).toBe('iso-8859-1');
    expect(page.html).toBe('café');
  });

  it('should default to UTF-8 and replace invalid bytes', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/', method: 'GET' })
      .reply(200, Buffer.from([0x61, 0xff, 0x62]), { headers: { 'content-type': 'text/html' } });

    const page = await fetchHtml(`${ORIGIN}/`, { dispatcher: agent });

    expect(page.charset).toBe('utf-8');
    expect(page.html).toBe('a\uFFFDb');
  });

  it('should reject on an HTTP error status', async () => {
    agent.get(ORIGIN).intercept({ path: '/missing', method: 'GET' }).reply(404, 'not here');

    await expect(fetchHtml(`${ORIGIN}/missing`, { dispatcher: agent })).rejects.toThrow('HTTP Error 404');
  });

  it('should reject a redirect it could not follow', async () => {
    agent.get(ORIGIN).intercept({ path: '/moved', method: 'GET' }).reply(301, 'moved');

    await expect(fetchHtml(`${ORIGIN}/moved`, { dispatcher: agent })).rejects.toThrow('HTTP Error 301');
  });

  it('should identify itself and ask for HTML', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        path: '/',
        method: 'GET',
        headers: {
          'user-agent': 'Mozilla/5.0 (compatible; ProjectMetaFetcher/1.0)',
          accept: 'text/html,application/xhtml+xml',
        },
      })
      .reply(200, '<title>ok</title>');

    const page = await fetchHtml(`${ORIGIN}/`, { dispatcher: agent });

    expect(page.html).toBe('<title>ok</title>');
  });

  it('should pass the timeout and redirect limit to undici', async () => {
    const recorder = new RecordingAgent();
    recorder.disableNetConnect();
    recorder.get(ORIGIN).intercept({ path: '/', method: 'GET' }).reply(200, 'a').times(2);

    await fetchHtml(`${ORIGIN}/`, { dispatcher: recorder });
    await fetchHtml(`${ORIGIN}/`, { dispatcher: recorder, timeoutMs: 250 });
    await recorder.close();

    expect(recorder.dispatched).toHaveLength(2);
    expect(recorder.dispatched[0]).toMatchObject({ headersTimeout: 15000, bodyTimeout: 15000, maxRedirections: 10 });
    expect(recorder.dispatched[1]).toMatchObject({ headersTimeout: 250, bodyTimeout: 250 });
  });

  it('should reject when the request times out', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/slow', method: 'GET' })
      .replyWithError(new errors.HeadersTimeoutError('Headers Timeout Error'));

    await expect(fetchHtml(`${ORIGIN}/slow`, { dispatcher: agent })).rejects.toThrow('Headers Timeout Error');
  });
});

describe('charsetFromContentType', () => {
  it('should read and lower-case the charset parameter', () => {
    expect(charsetFromContentType('text/html; charset="Shift_JIS"')).toBe('shift_jis');
    expect(charsetFromContentType(['text/html;charset=UTF-8'])).toBe('utf-8');
  });

  it('should return null when no charset is declared', () => {
    expect(charsetFromContentType('text/html')).toBeNull();
    expect(charsetFromContentType(undefined)).toBeNull();
  });
});

describe('decodeBody', () => {
  it('should fall back to UTF-8 for an unknown label', () => {
    const bytes = new TextEncoder().encode('héllo');

    expect(decodeBody(bytes, 'x-not-a-charset')).toEqual({ text: 'héllo', charset: 'utf-8' });
  });
});
