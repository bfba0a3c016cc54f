/**
 * KnowledgeStore - read-only FAQ records loaded once at startup
 */

import { readFileSync, existsSync } from 'fs';
import { z } from 'zod';
import { StartupError } from './errors.js';
import type { KnowledgeRecord } from './types.js';

const KnowledgeRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  question: z.string(),
  answer: z.string(),
  tags: z.array(z.string()).default([]),
  source_url: z.string().default(''),
  type: z.string().default(''),
});

const KnowledgeFileSchema = z.array(KnowledgeRecordSchema);

export class KnowledgeStore {
  private readonly records: readonly KnowledgeRecord[];
  private readonly byId: ReadonlyMap<string, KnowledgeRecord>;

  constructor(records: readonly KnowledgeRecord[]) {
    const byId = new Map<string, KnowledgeRecord>();
    for (const record of records) {
      if (byId.has(record.id)) {
        throw new StartupError(`Duplicate knowledge record id: ${record.id}`, 'knowledge');
      }
      byId.set(record.id, Object.freeze({ ...record, tags: Object.freeze([...record.tags]) }));
    }

    this.records = Object.freeze(records.map((record) => byId.get(record.id) ?? record));
    this.byId = byId;
  }

  /**
   * Read and validate the knowledge file. Any problem here is fatal.
   */
  static load(filePath: string): KnowledgeStore {
    if (!existsSync(filePath)) {
      throw new StartupError(`Knowledge file not found at: ${filePath}`, filePath);
    }

    let text: string;
    try {
      text = readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new StartupError(`Knowledge file could not be read: ${filePath}`, filePath, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new StartupError(`Knowledge file is not valid JSON: ${filePath}`, filePath, { cause: error });
    }

    const parsed = KnowledgeFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new StartupError(`Knowledge file is malformed: ${issues}`, filePath);
    }

    return new KnowledgeStore(parsed.data);
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * All records in storage order
   */
  all(): readonly KnowledgeRecord[] {
    return this.records;
  }

  findById(id: string): KnowledgeRecord | undefined {
    return this.byId.get(id);
  }

  first(count: number): KnowledgeRecord[] {
    return this.records.slice(0, Math.max(0, count));
  }
}
