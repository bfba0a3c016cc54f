/**
 * Core types for the Huggies widget server
 */

// ============================================================================
// Knowledge Types
// ============================================================================

export interface KnowledgeRecord {
  id: string;
  title: string;
  question: string;
  answer: string;
  tags: readonly string[];
  source_url: string;
  type: string;
}

// ============================================================================
// Widget Types
// ============================================================================

/**
 * Presentation template a tool result is rendered with.
 * `templateUri` doubles as the resource URI the markup is served under.
 */
export interface WidgetDescriptor {
  identifier: string;
  title: string;
  templateUri: string;
  invoking: string;
  invoked: string;
  html: string;
  responseText: string;
}

export type WidgetDefinition = Omit<WidgetDescriptor, 'html'>;

// ============================================================================
// Tool Types
// ============================================================================

export type ParameterType = 'string' | 'number' | 'boolean';

export type InputProperty = {
  type: ParameterType;
  description: string;
};

export type InputSchema = {
  type: 'object';
  properties: Record<string, InputProperty>;
  required: string[];
  additionalProperties: false;
};

/**
 * What a handler hands back. Widget metadata is never part of it;
 * the dispatcher attaches that from the tool's binding.
 */
export interface ToolOutcome {
  text: string;
  content?: Record<string, unknown>;
  isError?: boolean;
}

// ============================================================================
// Configuration Types
// ============================================================================

export type TransportMode = 'stdio' | 'http';

export interface ServerConfig {
  server: {
    name: string;
    version: string;
  };
  data: {
    knowledgeFile: string;
    assetsDir: string;
  };
  transport: {
    mode: TransportMode;
    host: string;
    port: number;
    path: string;
  };
  search: {
    topN: number;
  };
}
