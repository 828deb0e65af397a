import { Parser } from 'htmlparser2';
import { MetaTagMap } from './meta-tag-map.js';

export interface PageMeta {
  meta: MetaTagMap;
  /** Raw text of the `<title>` element(s); callers trim it. */
  title: string;
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Collects `<meta property|name=... content=...>` pairs and the document title.
 * The tokenizer is lenient, so broken markup only yields fewer entries.
 */
export function extractPageMeta(html: string): PageMeta {
  const meta = new MetaTagMap();
  let title = '';
  let inTitle = false;

  const parser = new Parser(
    {
      onopentag(name, attribs) {
        if (name === 'meta') {
          const key = nonEmpty(attribs['property']) ?? nonEmpty(attribs['name']);
          const content = nonEmpty(attribs['content']);
          if (key && content) meta.set(key, content);
        } else if (name === 'title') {
          inTitle = true;
        }
      },
      ontext(text) {
        if (inTitle) title += text;
      },
      onclosetag(name) {
        if (name === 'title') inTitle = false;
      },
    },
    { decodeEntities: true, lowerCaseTags: true, lowerCaseAttributeNames: true },
  );

  parser.write(html);
  parser.end();

  return { meta, title };
}
