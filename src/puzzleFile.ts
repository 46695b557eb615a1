import type { Puzzle } from './solver.ts';

import yaml from 'js-yaml';
import { readFileSync } from 'node:fs';

import { parseGrid } from './parsers.ts';

export function loadPuzzleCollection(path: string): Puzzle[] {
  return parsePuzzleCollection(readFileSync(path, 'utf-8'));
}

/**
 * Parses a YAML document of the form
 *
 * ```yaml
 * puzzles:
 *   - name: example
 *     rows:
 *       - '53. .7. ...'
 *       # eight more rows
 * ```
 */
export function parsePuzzleCollection(text: string): Puzzle[] {
  const doc: unknown = yaml.load(text);
  if (!isRecord(doc)) {
    throw new Error('Puzzle collection must be a YAML mapping');
  }
  const entries = doc['puzzles'];
  if (!Array.isArray(entries)) {
    throw new Error('Puzzle collection must have a "puzzles" list');
  }
  return entries.map((entry: unknown, index) => parseEntry(entry, index));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEntry(entry: unknown, index: number): Puzzle {
  const label = `puzzles[${String(index)}]`;
  if (!isRecord(entry)) {
    throw new Error(`${label} must be a mapping`);
  }
  const name = entry['name'];
  if (typeof name !== 'string' || name.trim() === '') {
    throw new Error(`${label}.name must be a non-empty string`);
  }
  const rows = entry['rows'];
  if (!Array.isArray(rows)) {
    throw new Error(`${label}.rows must be a list`);
  }
  const rowTexts = rows.map((row: unknown, rowIndex) => {
    if (typeof row !== 'string') {
      throw new Error(`${label}.rows[${String(rowIndex)}] must be a quoted string`);
    }
    return row;
  });
  try {
    return { grid: parseGrid(rowTexts), name: name.trim() };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`${label} (${name}): ${message}`, { cause: error });
  }
}
