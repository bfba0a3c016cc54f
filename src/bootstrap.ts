/**
 * Bootstrap - builds the server's read-only state once
 *
 * Nothing here is global: the returned objects are handed to the dispatcher
 * and the transports by reference, so tests can build the same graph from
 * fixture files.
 */

import { Dispatcher } from './dispatcher.js';
import { KnowledgeStore } from './knowledge.js';
import { ToolRegistry, type ToolContext, type ToolDefinition } from './registry.js';
import { SearchRanker } from './search.js';
import { TOOL_DEFINITIONS, registerTools } from './tools/index.js';
import { WIDGET_DEFINITIONS, WidgetCatalog } from './widgets.js';
import type { ServerConfig, WidgetDefinition } from './types.js';

export interface BootstrapOptions {
  random?: () => number;
  widgets?: readonly WidgetDefinition[];
  tools?: readonly ToolDefinition[];
}

export interface ServerState {
  config: ServerConfig;
  knowledge: KnowledgeStore;
  catalog: WidgetCatalog;
  ranker: SearchRanker;
  registry: ToolRegistry;
  dispatcher: Dispatcher;
}

/**
 * Load the knowledge file and widget markup, register the tool set.
 * Throws StartupError when any backing file is missing or malformed.
 */
export function bootstrap(config: ServerConfig, options: BootstrapOptions = {}): ServerState {
  const knowledge = KnowledgeStore.load(config.data.knowledgeFile);
  const catalog = WidgetCatalog.load(config.data.assetsDir, options.widgets ?? WIDGET_DEFINITIONS);
  const ranker = new SearchRanker(knowledge);
  const registry = registerTools(new ToolRegistry(catalog), options.tools ?? TOOL_DEFINITIONS);

  const context: ToolContext = {
    knowledge,
    ranker,
    random: options.random ?? Math.random,
    topN: config.search.topN,
  };

  return {
    config,
    knowledge,
    catalog,
    ranker,
    registry,
    dispatcher: new Dispatcher(registry, catalog, context),
  };
}
