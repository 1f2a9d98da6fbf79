/**
 * Knowledge retrieval types.
 *
 * @packageDocumentation
 */

/**
 * A ranked piece of reference text handed to an agent as context.
 */
export interface Snippet {
  readonly text: string;
  /** Where the text came from, for attribution. */
  readonly source: string;
  /** Relevance in [0, 1]; higher ranks first. */
  readonly relevance_score: number;
}

/**
 * Read-only search over a knowledge base.
 */
export interface KnowledgeRetriever {
  /**
   * Returns snippets ranked by relevance, most relevant first.
   *
   * @param query - Free-text query.
   * @param domainFilter - Restricts results to one domain (plus general entries).
   */
  search(query: string, domainFilter?: string): Promise<readonly Snippet[]>;
}
