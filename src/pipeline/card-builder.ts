import type { Card, CardType } from '../types/card.js';
import type { MetaTagMap } from './meta-tag-map.js';

/** Card made only from the project's own fields, used until a page is fetched. */
export function fallbackCard(title: string, description: string): Card {
  return { type: '', title, description, image: '', site: '' };
}

function resolveUrl(base: string, candidate: string): string {
  try {
    return new URL(candidate, base).toString();
  } catch {
    // base itself is not a URL; keep what the page declared
    return candidate;
  }
}

/**
 * Builds a preview card from page meta tags. Twitter tags win over Open Graph,
 * which wins over the generic description and the supplied fallbacks.
 */
export function buildCard(
  sourceUrl: string,
  meta: MetaTagMap,
  titleFallback: string,
  descriptionFallback: string,
): Card {
  const title = meta.firstOf('twitter:title', 'og:title') || titleFallback;
  const description =
    meta.firstOf('twitter:description', 'og:description', 'description') || descriptionFallback;

  const rawImage = meta.firstOf('twitter:image', 'og:image');
  const image = rawImage ? resolveUrl(sourceUrl, rawImage) : '';

  const inferredType: CardType = image ? 'summary_large_image' : 'summary';

  return {
    type: meta.firstOf('twitter:card') || inferredType,
    title,
    description,
    image,
    site: meta.firstOf('twitter:site'),
  };
}
