export type CardType = 'summary' | 'summary_large_image';

export interface Card {
  /** Empty on a fallback card; otherwise `twitter:card` or an inferred {@link CardType}. */
  type: string;
  title: string;
  description: string;
  /** Absolute URL, or empty */
  image: string;
  /** Twitter handle, or empty */
  site: string;
  /** Present only when the page could not be fetched */
  error?: string;
}
