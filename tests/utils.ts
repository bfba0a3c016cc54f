/**
 * Test utilities for the Huggies widget server
 * Provides temp-directory fixtures: a small knowledge file and one HTML shell per widget
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { bootstrap, type BootstrapOptions, type ServerState } from '../src/bootstrap.js';
import { getDefaultConfig, resetConfigCache } from '../src/config.js';
import { WIDGET_DEFINITIONS } from '../src/widgets.js';
import type { KnowledgeRecord, ServerConfig } from '../src/types.js';

// ============================================================================
// Types
// ============================================================================

export interface TestContext {
  dir: string;
  config: ServerConfig;
  state: ServerState;
  cleanup: () => void;
}

// ============================================================================
// Fixture Data
// ============================================================================

export const FIXTURE_RECORDS: KnowledgeRecord[] = [
  {
    id: 'kb-1',
    title: 'Choosing a diaper size',
    question: 'What size should I buy?',
    answer: 'Match the weight range printed on the pack.',
    tags: ['size'],
    source_url: 'https://example.com/kb-1',
    type: 'faq',
  },
  {
    id: 'kb-2',
    title: 'Newborn bathing',
    question: 'How often should I bathe a newborn?',
    answer: 'Two or three times a week is enough; keep the water warm.',
    tags: ['bath', 'newborn'],
    source_url: 'https://example.com/kb-2',
    type: 'guide',
  },
  {
    id: 'kb-3',
    title: 'Overnight leaks',
    question: 'Why does the diaper leak at night?',
    answer: 'Try an overnight diaper or go up one size for longer stretches.',
    tags: ['leaks'],
    source_url: 'https://example.com/kb-3',
    type: 'faq',
  },
  {
    id: 'kb-4',
    title: 'Travel tips',
    question: 'What should I pack for a trip?',
    answer: 'Pack extra diapers, wipes and a changing mat.',
    tags: [],
    source_url: 'https://example.com/kb-4',
    type: 'guide',
  },
];

export function fixtureHtml(name: string): string {
  return `<div id="${name}-root"></div>`;
}

// ============================================================================
// Temporary Directory Helpers
// ============================================================================

/**
 * Create a temporary directory for testing
 */
export function createTempDir(prefix: string = 'huggies-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export function removeDir(dirPath: string): void {
  if (fs.existsSync(dirPath)) {
    fs.rmSync(dirPath, { recursive: true, force: true });
  }
}

export function writeKnowledgeFile(dir: string, records: unknown = FIXTURE_RECORDS): string {
  const file = path.join(dir, 'knowledge.json');
  fs.writeFileSync(file, JSON.stringify(records, null, 2), 'utf-8');
  return file;
}

/**
 * Write `<name>.html` for each file name (without extension) given
 */
export function writeAssets(
  dir: string,
  files: string[] = WIDGET_DEFINITIONS.map((widget) => widget.identifier)
): string {
  const assetsDir = path.join(dir, 'assets');
  fs.mkdirSync(assetsDir, { recursive: true });
  for (const file of files) {
    fs.writeFileSync(path.join(assetsDir, `${file}.html`), fixtureHtml(file), 'utf-8');
  }
  return assetsDir;
}

// ============================================================================
// Server State
// ============================================================================

/**
 * Build a full server state from fixture files in a fresh temp directory
 */
export function createTestContext(options: BootstrapOptions = {}): TestContext {
  const dir = createTempDir();
  const defaults = getDefaultConfig();
  const config: ServerConfig = {
    ...defaults,
    data: {
      knowledgeFile: writeKnowledgeFile(dir),
      assetsDir: writeAssets(dir),
    },
  };

  return {
    dir,
    config,
    state: bootstrap(config, options),
    cleanup: () => {
      removeDir(dir);
      resetConfigCache();
    },
  };
}

/**
 * Random source that replays the given values, then repeats the last one
 */
export function sequenceRandom(values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)] ?? 0.5;
    index += 1;
    return value;
  };
}
