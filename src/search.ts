/**
 * SearchRanker - lexical scoring of knowledge records against a free-text query
 */

import type { KnowledgeStore } from './knowledge.js';
import type { KnowledgeRecord } from './types.js';

export const SCORE_WEIGHTS = {
  title: 5,
  question: 4,
  tag: 3,
  answerToken: 1,
} as const;

export interface ScoredRecord {
  record: KnowledgeRecord;
  score: number;
}

/**
 * Either a ranked hit list, or the fallback records served when nothing matched.
 */
export type RankResult =
  | { kind: 'ranked'; records: KnowledgeRecord[] }
  | { kind: 'fallback'; records: KnowledgeRecord[] };

export class SearchRanker {
  constructor(private readonly store: KnowledgeStore) {}

  /**
   * Score one record.
   * Note the direction of each match: the query must sit inside title/question,
   * while each tag must sit inside the query.
   */
  static score(record: KnowledgeRecord, query: string): number {
    const q = query.toLowerCase();
    if (q.trim().length === 0) return 0;

    let score = 0;
    if (record.title.toLowerCase().includes(q)) {
      score += SCORE_WEIGHTS.title;
    }
    if (record.question.toLowerCase().includes(q)) {
      score += SCORE_WEIGHTS.question;
    }
    for (const tag of record.tags) {
      if (q.includes(tag.toLowerCase())) {
        score += SCORE_WEIGHTS.tag;
      }
    }
    const answer = record.answer.toLowerCase();
    for (const token of q.split(/\s+/)) {
      if (token && answer.includes(token)) {
        score += SCORE_WEIGHTS.answerToken;
      }
    }
    return score;
  }

  /**
   * Scored hits, best first; equal scores keep storage order.
   */
  scoreAll(query: string): ScoredRecord[] {
    if (query.trim().length === 0) return [];

    return this.store
      .all()
      .map((record) => ({ record, score: SearchRanker.score(record, query) }))
      .filter((hit) => hit.score > 0)
      .sort((a, b) => b.score - a.score);
  }

  search(query: string, topN: number): KnowledgeRecord[] {
    return this.scoreAll(query)
      .slice(0, Math.max(0, topN))
      .map((hit) => hit.record);
  }

  /**
   * Search, falling back to the first records in storage order when nothing scores.
   */
  rank(query: string, topN: number, fallbackCount: number = topN): RankResult {
    const records = this.search(query, topN);
    if (records.length > 0) {
      return { kind: 'ranked', records };
    }
    return { kind: 'fallback', records: this.store.first(fallbackCount) };
  }
}
