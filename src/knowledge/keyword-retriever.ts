/**
 * Keyword retriever over a JSON knowledge base.
 *
 * Entries are scored by the share of query terms they contain. Results are
 * restricted to the requested domain plus entries marked `general`, ranked
 * by score and then by entry id.
 *
 * @packageDocumentation
 */

import { createSchemaCheck } from '../utils/schema.js';
import { safeReadFile } from '../utils/safe-fs.js';
import type { KnowledgeRetriever, Snippet } from './types.js';

/**
 * One entry of the knowledge base file.
 */
export interface KnowledgeEntry {
  readonly id: string;
  /** Domain the entry belongs to, or `general` for every domain. */
  readonly domain: string;
  readonly title: string;
  readonly text: string;
  readonly source: string;
  readonly tags?: readonly string[];
}

export interface KnowledgeBase {
  readonly entries: readonly KnowledgeEntry[];
}

/**
 * Domain whose entries match every filter.
 */
export const GENERAL_DOMAIN = 'general';

export const DEFAULT_MAX_RESULTS = 3;

const MIN_TERM_LENGTH = 3;

const STOP_WORDS: ReadonlySet<string> = new Set([
  'the',
  'and',
  'for',
  'with',
  'that',
  'this',
  'from',
  'are',
  'was',
  'our',
  'your',
  'who',
  'what',
  'how',
  'why',
  'into',
  'about',
  'will',
]);

const checkKnowledgeBase = createSchemaCheck<KnowledgeBase>('knowledge-base');

/**
 * Error thrown when a knowledge base cannot be loaded.
 */
export class KnowledgeBaseError extends Error {
  public readonly path: string;
  public override readonly cause: Error | undefined;

  constructor(message: string, path: string, cause?: Error) {
    super(message);
    this.name = 'KnowledgeBaseError';
    this.path = path;
    this.cause = cause;
  }
}

/**
 * Splits text into lower-case search terms, dropping short words and stop words.
 *
 * @example
 * ```typescript
 * tokenize('Why do users churn in FinTech?'); // ['users', 'churn', 'fintech']
 * ```
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((term) => term.length >= MIN_TERM_LENGTH && !STOP_WORDS.has(term));
}

function roundRelevance(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Term-overlap retriever.
 */
export class KeywordRetriever implements KnowledgeRetriever {
  private readonly indexed: readonly { entry: KnowledgeEntry; terms: ReadonlySet<string> }[];
  private readonly maxResults: number;

  constructor(knowledgeBase: KnowledgeBase, maxResults: number = DEFAULT_MAX_RESULTS) {
    if (!Number.isInteger(maxResults) || maxResults < 1) {
      throw new Error(`maxResults must be a positive integer, got: ${String(maxResults)}`);
    }
    this.maxResults = maxResults;
    this.indexed = knowledgeBase.entries.map((entry) => ({
      entry,
      terms: new Set(tokenize([entry.title, entry.text, ...(entry.tags ?? [])].join(' '))),
    }));
  }

  /**
   * Loads a knowledge base file.
   *
   * @throws KnowledgeBaseError if the file is unreadable or invalid.
   */
  static async fromFile(
    filePath: string,
    maxResults: number = DEFAULT_MAX_RESULTS
  ): Promise<KeywordRetriever> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await safeReadFile(filePath));
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new KnowledgeBaseError(
        `Cannot read knowledge base '${filePath}': ${cause.message}`,
        filePath,
        cause
      );
    }
    const result = checkKnowledgeBase(parsed);
    if (!result.valid) {
      throw new KnowledgeBaseError(
        `Invalid knowledge base '${filePath}': ${result.errors.join('; ')}`,
        filePath
      );
    }
    return new KeywordRetriever(result.value, maxResults);
  }

  get size(): number {
    return this.indexed.length;
  }

  search(query: string, domainFilter?: string): Promise<readonly Snippet[]> {
    const queryTerms = new Set(tokenize(query));
    if (queryTerms.size === 0) {
      return Promise.resolve([]);
    }
    const domain = domainFilter?.trim().toLowerCase();

    const scored = this.indexed
      .filter(
        ({ entry }) =>
          domain === undefined ||
          domain === '' ||
          entry.domain.toLowerCase() === domain ||
          entry.domain === GENERAL_DOMAIN
      )
      .map(({ entry, terms }) => {
        let matches = 0;
        for (const term of queryTerms) {
          if (terms.has(term)) {
            matches += 1;
          }
        }
        return { entry, score: matches / queryTerms.size };
      })
      .filter(({ score }) => score > 0)
      .sort((a, b) => b.score - a.score || a.entry.id.localeCompare(b.entry.id))
      .slice(0, this.maxResults);

    return Promise.resolve(
      scored.map(({ entry, score }) => ({
        text: entry.title === '' ? entry.text : `${entry.title}: ${entry.text}`,
        source: entry.source,
        relevance_score: roundRelevance(score),
      }))
    );
  }
}
