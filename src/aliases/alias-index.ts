/**
 * Duplicate detection over feature titles and aliases.
 *
 * Names are compared as token sets: lowercased, punctuation replaced by
 * spaces, split on whitespace, filler words dropped. Similarity is the Jaccard
 * index of the two sets.
 *
 * @packageDocumentation
 */

import type { FeatureRecord } from '../feature/types.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger('AliasIndex');

/**
 * Words that carry no meaning when comparing feature names.
 */
export const STOPWORDS: ReadonlySet<string> = new Set([
  'the',
  'a',
  'an',
  'for',
  'to',
  'of',
  'in',
  'on',
  'with',
  'and',
  'or',
  'but',
  'is',
  'are',
  'be',
  'was',
  'were',
  'feature',
  'project',
  'initiative',
  'improvement',
  'implementation',
]);

/**
 * Splits a name into its comparable tokens.
 *
 * @param name - Title or alias.
 * @returns Tokens in order of appearance, stopwords removed.
 */
export function tokenize(name: string): string[] {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .split(/\s+/)
    .filter((token) => token !== '' && !STOPWORDS.has(token));
}

/**
 * Normalized form of a name; two names with the same form are identical for
 * duplicate detection.
 */
export function normalizeName(name: string): string {
  return tokenize(name).join(' ');
}

/**
 * Jaccard similarity of the token sets of two names.
 *
 * @param a - First name.
 * @param b - Second name.
 * @returns 0..1; 0 when either name has no tokens.
 */
export function jaccardSimilarity(a: string, b: string): number {
  const left = new Set(tokenize(a));
  const right = new Set(tokenize(b));
  if (left.size === 0 || right.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) {
      shared += 1;
    }
  }
  return shared / (left.size + right.size - shared);
}

function compareSlugs(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * An existing feature that may be the same as a new title.
 */
export interface DuplicateCandidate {
  slug: string;
  title: string;
  /** The title or alias that matched best. */
  matched: string;
  similarity: number;
}

/**
 * Finds existing features whose title or aliases resemble a new title.
 */
export class AliasIndex {
  private readonly threshold: number;

  /**
   * Creates an index.
   *
   * @param threshold - Minimum similarity for a candidate, in (0, 1].
   */
  constructor(threshold: number) {
    this.threshold = threshold;
  }

  /**
   * Scores one record against a title.
   *
   * @param title - New feature title.
   * @param record - Existing feature.
   * @returns The best match over the record's title and aliases.
   */
  score(title: string, record: FeatureRecord): DuplicateCandidate {
    let best: DuplicateCandidate = {
      slug: record.slug,
      title: record.title,
      matched: record.title,
      similarity: jaccardSimilarity(title, record.title),
    };
    for (const alias of record.aliases) {
      const similarity = jaccardSimilarity(title, alias);
      if (similarity > best.similarity) {
        best = { ...best, matched: alias, similarity };
      }
    }
    return best;
  }

  /**
   * Lists duplicate candidates for a new title within one product.
   *
   * @param title - New feature title.
   * @param productId - Product the new feature belongs to.
   * @param records - Existing features of any product.
   * @returns Candidates at or above the threshold, most similar first, ties
   *   broken by slug.
   */
  findCandidates(
    title: string,
    productId: string,
    records: readonly FeatureRecord[]
  ): DuplicateCandidate[] {
    const candidates = records
      .filter((record) => record.product_id === productId)
      .map((record) => this.score(title, record))
      .filter((candidate) => candidate.similarity >= this.threshold)
      .sort((a, b) => b.similarity - a.similarity || compareSlugs(a.slug, b.slug));

    if (candidates.length > 0) {
      logger.debug('duplicate_candidates_scored', {
        title,
        productId,
        candidates: candidates.map((candidate) => candidate.slug),
      });
    }
    return candidates;
  }
}
