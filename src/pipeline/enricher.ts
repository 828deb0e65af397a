import fs from 'node:fs';
import path from 'node:path';
import type { Card } from '../types/card.js';
import type { EnrichedProject, OutputDocument, ProjectRecord } from '../types/project.js';
import { fetchHtml } from '../workers/http-client.js';
import { isoSecondsUtc } from '../utils/date.js';
import { logger } from '../utils/logger.js';
import { parseProjectList } from './list-reader.js';
import { extractPageMeta } from './meta-extractor.js';
import { buildCard, fallbackCard } from './card-builder.js';

/** Returns the HTML of `url`, or rejects when the page cannot be fetched. */
export type PageFetcher = (url: string) => Promise<string>;

export interface RunOptions {
  fetchPage?: PageFetcher;
  now?: () => Date;
}

const defaultFetchPage: PageFetcher = async (url) => (await fetchHtml(url)).html;

function textField(record: ProjectRecord, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value.trim() : '';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Never rejects: fetch failures end up in `card.error`. */
export async function enrichProject(
  record: ProjectRecord,
  fetchPage: PageFetcher = defaultFetchPage,
): Promise<EnrichedProject> {
  const url = textField(record, 'url');
  const titleFallback = textField(record, 'name');
  const descriptionFallback = textField(record, 'description');

  let card: Card = fallbackCard(titleFallback, descriptionFallback);

  if (url) {
    const log = logger.child({ project: titleFallback, url });
    let html: string | null = null;
    try {
      html = await fetchPage(url);
    } catch (err) {
      log.warn({ err }, 'Fetch failed, keeping fallback card');
      card = { ...card, error: `fetch_failed: ${errorMessage(err)}` };
    }

    if (html !== null) {
      const { meta, title } = extractPageMeta(html);
      card = buildCard(url, meta, title.trim() || titleFallback, descriptionFallback);
      log.debug({ metaCount: meta.size, type: card.type }, 'Card built');
    }
  }

  return { ...record, card };
}

export async function enrichProjects(
  records: ProjectRecord[],
  fetchPage: PageFetcher = defaultFetchPage,
): Promise<EnrichedProject[]> {
  const enriched: EnrichedProject[] = [];
  // One page at a time, in list order
  for (const record of records) {
    enriched.push(await enrichProject(record, fetchPage));
  }
  return enriched;
}

/**
 * Reads the project list at `inputPath`, enriches every entry and writes the
 * result to `outputPath`. Returns the process exit code.
 */
export async function runEnrichment(
  inputPath: string,
  outputPath: string,
  options: RunOptions = {},
): Promise<number> {
  if (!fs.existsSync(inputPath)) {
    console.error(`Missing ${inputPath}`);
    return 1;
  }

  const records = parseProjectList(fs.readFileSync(inputPath, 'utf-8'));
  logger.info({ inputPath, count: records.length }, 'Project list loaded');

  const projects = await enrichProjects(records, options.fetchPage ?? defaultFetchPage);

  const now = options.now ?? (() => new Date());
  const document: OutputDocument = {
    generated_at: isoSecondsUtc(now()),
    projects,
  };

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');

  const failed = projects.filter((p) => p.card.error !== undefined).length;
  const fetched = projects.filter((p) => p.card.type !== '').length;
  logger.info({ total: projects.length, fetched, failed }, 'Enrichment complete');

  console.log(`Wrote ${outputPath}`);
  return 0;
}
