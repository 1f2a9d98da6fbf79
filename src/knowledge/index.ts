/**
 * Knowledge retrieval.
 *
 * @packageDocumentation
 */

export type { KnowledgeRetriever, Snippet } from './types.js';
export type { KnowledgeBase, KnowledgeEntry } from './keyword-retriever.js';
export {
  DEFAULT_MAX_RESULTS,
  GENERAL_DOMAIN,
  KeywordRetriever,
  KnowledgeBaseError,
  tokenize,
} from './keyword-retriever.js';
