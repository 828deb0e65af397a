import type { Card } from './card.js';

/** A field value from the project list: a scalar, or the `stack` sequence. */
export type ProjectFieldValue = string | string[];

/**
 * One entry of the project list. `name`, `url` and `description` are the
 * fields the enricher reads; every other key passes through untouched.
 */
export type ProjectRecord = Record<string, ProjectFieldValue>;

export interface EnrichedProject {
  [key: string]: ProjectFieldValue | Card;
  card: Card;
}

export interface OutputDocument {
  /** UTC, second precision, `Z` suffix */
  generated_at: string;
  projects: EnrichedProject[];
}
