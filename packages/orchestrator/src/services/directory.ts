import { readFileSync } from 'fs';
import { z, type ZodTypeAny } from 'zod';
import { FatalError, formatZodIssues } from '../errors/index.js';

/**
 * Read-only lookup over contacts or documents.
 */
export interface DirectoryService<T> {
  search(query: string): Promise<T[]>;
}

const STOPWORDS = new Set(['the', 'and', 'for', 'with', 'about', 'from', 'that', 'this', 'what', 'who', 'our', 'your']);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9@.]+/)
    .map((token) => token.replace(/^\.+|\.+$/g, ''))
    .filter((token) => token.length > 2 && !STOPWORDS.has(token));
}

/**
 * Ranks records by how many query tokens appear in their searchable text.
 */
export class InMemoryDirectory<T extends { id: string }> implements DirectoryService<T> {
  constructor(
    private readonly records: T[],
    private readonly searchableText: (record: T) => string,
    private readonly limit = 5,
  ) {}

  async search(query: string): Promise<T[]> {
    const tokens = tokenize(query);
    if (tokens.length === 0) return [];

    return this.records
      .map((record) => {
        const haystack = this.searchableText(record).toLowerCase();
        const score = tokens.filter((token) => haystack.includes(token)).length;
        return { record, score };
      })
      .filter((entry) => entry.score > 0)
      .sort((a, b) => b.score - a.score || a.record.id.localeCompare(b.record.id))
      .slice(0, this.limit)
      .map((entry) => entry.record);
  }
}

/**
 * Load and validate a JSON array of records for a directory.
 */
export function loadRecords<S extends ZodTypeAny>(file: string, schema: S): z.infer<S>[] {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  const result = z.array(schema).safeParse(raw);
  if (!result.success) {
    throw new FatalError(`Invalid directory data in ${file}`, formatZodIssues(result.error));
  }
  return result.data;
}
