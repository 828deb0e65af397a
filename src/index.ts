#!/usr/bin/env node
/**
 * Enrich the project list with social-preview cards.
 * Usage: npx tsx src/index.ts [input.yaml] [output.json]
 */
import { config } from './config.js';
import { runEnrichment } from './pipeline/enricher.js';
import { logger } from './utils/logger.js';

const inputPath = process.argv[2] || config.PROJECTS_INPUT;
const outputPath = process.argv[3] || config.PROJECTS_OUTPUT;

async function main(): Promise<void> {
  process.exitCode = await runEnrichment(inputPath, outputPath);
}

main().catch((err) => {
  logger.fatal(err, 'Enrichment run failed');
  process.exitCode = 1;
});
