import type { ProjectFieldValue, ProjectRecord } from '../types/project.js';

/**
 * Reader for the hand-edited project list (`data/projects.yaml`).
 *
 * Only a small block-list subset is understood:
 *
 * ```yaml
 * - name: Example
 *   url: https://example.com
 *   stack:
 *     - TypeScript
 *     - Postgres
 * ```
 *
 * Anything outside that shape is skipped rather than reported.
 */

export type LineKind = 'skip' | 'record-start' | 'stack-open' | 'stack-item' | 'scalar-field' | 'unknown';

export interface ClassifiedLine {
  kind: LineKind;
  key?: string;
  value?: string;
}

const STACK_KEY = 'stack';

/** Trims and removes one layer of matching double or single quotes. No escape decoding. */
export function stripQuotes(raw: string): string {
  const value = raw.trim();
  if (value.startsWith('"') && value.endsWith('"')) return value.slice(1, -1);
  if (value.startsWith("'") && value.endsWith("'")) return value.slice(1, -1);
  return value;
}

function splitField(text: string): { key: string; value: string } | null {
  const colon = text.indexOf(':');
  if (colon === -1) return null;
  return { key: text.slice(0, colon).trim(), value: stripQuotes(text.slice(colon + 1)) };
}

function leadingSpaces(line: string): number {
  let count = 0;
  while (line[count] === ' ') count++;
  return count;
}

export function classifyLine(rawLine: string): ClassifiedLine {
  const line = rawLine.trimEnd();
  if (!line || line.trimStart().startsWith('#')) return { kind: 'skip' };

  if (line.startsWith('- ')) {
    const field = splitField(line.slice(2));
    return field ? { kind: 'record-start', ...field } : { kind: 'record-start' };
  }

  const indent = leadingSpaces(line);
  const body = line.slice(indent);

  if (indent === 2) {
    if (body.startsWith(`${STACK_KEY}:`)) return { kind: 'stack-open', key: STACK_KEY };
    const field = splitField(body);
    if (field) return { kind: 'scalar-field', ...field };
  }

  if (indent === 4 && body.startsWith('- ')) {
    return { kind: 'stack-item', value: stripQuotes(body.slice(2)) };
  }

  return { kind: 'unknown' };
}

export function parseProjectList(text: string): ProjectRecord[] {
  const records: ProjectRecord[] = [];
  let current: Map<string, ProjectFieldValue> | null = null;
  let inStack = false;

  const flush = () => {
    if (current && current.size > 0) records.push(Object.fromEntries(current));
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = classifyLine(rawLine);

    if (line.kind === 'record-start') {
      flush();
      current = new Map();
      inStack = false;
      if (line.key !== undefined && line.value !== undefined) current.set(line.key, line.value);
      continue;
    }

    if (!current) continue;

    switch (line.kind) {
      case 'stack-open':
        current.set(STACK_KEY, []);
        inStack = true;
        break;
      case 'stack-item': {
        const stack = current.get(STACK_KEY);
        if (inStack && line.value && Array.isArray(stack)) stack.push(line.value);
        break;
      }
      case 'scalar-field':
        if (line.key !== undefined && line.value !== undefined) current.set(line.key, line.value);
        inStack = false;
        break;
      default:
        break;
    }
  }

  flush();
  return records;
}
