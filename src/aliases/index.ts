/**
 * Alias matching and duplicate detection.
 *
 * @packageDocumentation
 */

export {
  AliasIndex,
  STOPWORDS,
  jaccardSimilarity,
  normalizeName,
  tokenize,
} from './alias-index.js';
export type { DuplicateCandidate } from './alias-index.js';
