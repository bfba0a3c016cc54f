/**
 * Huggies widget server - MCP tools and widget resources
 *
 * Main exports for the library
 */

// Types
export * from './types.js';

// Errors
export { StartupError, ToolArgumentError, errorMessage } from './errors.js';

// State
export { KnowledgeStore } from './knowledge.js';
export {
  SearchRanker,
  SCORE_WEIGHTS,
  type RankResult,
  type ScoredRecord,
} from './search.js';
export {
  WidgetCatalog,
  WIDGET_DEFINITIONS,
  WIDGET_MIME_TYPE,
  loadWidgetHtml,
  resolveWidgetAsset,
} from './widgets.js';

// Registry and dispatch
export {
  ToolRegistry,
  defineTool,
  deriveInputSchema,
  type ToolArgs,
  type ToolContext,
  type ToolDefinition,
  type ToolSpec,
  type RegisteredTool,
} from './registry.js';
export {
  META_KEYS,
  TOOL_ANNOTATIONS,
  buildEnvelope,
  errorEnvelope,
  invocationMeta,
  toolMeta,
} from './envelope.js';
export { Dispatcher } from './dispatcher.js';
export { TOOL_DEFINITIONS, registerTools } from './tools/index.js';

// Server
export { bootstrap, type BootstrapOptions, type ServerState } from './bootstrap.js';
export { createServer } from './server.js';
export { startHttpServer, resolveRoute, type HttpRoute } from './http.js';

// Config
export {
  getConfig,
  loadConfig,
  resetConfigCache,
  getDefaultConfig,
  resolveConfigFile,
} from './config.js';

// Version
export { VERSION } from './version.js';
