/**
 * Tool Registry
 *
 * Holds every tool the server exposes, keyed by name. Each tool declares its
 * arguments as a zod shape; the JSON input schema advertised to clients is
 * derived from that declaration once, when the tool is defined.
 */

import { z } from 'zod';
import { StartupError, ToolArgumentError } from './errors.js';
import type { KnowledgeStore } from './knowledge.js';
import type { SearchRanker } from './search.js';
import type { WidgetCatalog } from './widgets.js';
import type { InputSchema, ParameterType, ToolOutcome, WidgetDescriptor } from './types.js';

/**
 * Read-only collaborators every handler may consult
 */
export interface ToolContext {
  knowledge: KnowledgeStore;
  ranker: SearchRanker;
  random: () => number;
  topN: number;
}

export type ToolArgs<T extends z.ZodRawShape> = z.output<z.ZodObject<T, 'strict'>>;

export interface ToolSpec<T extends z.ZodRawShape> {
  name: string;
  title: string;
  description: string;
  widgetId: string;
  args: T;
  handler: (args: ToolArgs<T>, context: ToolContext) => ToolOutcome;
}

/**
 * A declared tool: input schema derived, argument types erased behind `invoke`
 */
export interface ToolDefinition {
  name: string;
  title: string;
  description: string;
  widgetId: string;
  inputSchema: InputSchema;
  invoke: (args: Record<string, unknown> | undefined, context: ToolContext) => ToolOutcome;
}

/**
 * A tool bound to the widget its results render in
 */
export interface RegisteredTool extends ToolDefinition {
  widget: WidgetDescriptor;
}

function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return unwrap(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return unwrap(schema.removeDefault());
  }
  if (schema instanceof z.ZodEffects) {
    return unwrap(schema.innerType());
  }
  return schema;
}

export function parameterType(schema: z.ZodTypeAny): ParameterType {
  const inner = unwrap(schema);
  if (inner instanceof z.ZodNumber) return 'number';
  if (inner instanceof z.ZodBoolean) return 'boolean';
  return 'string';
}

/**
 * Derive the advertised JSON schema from a declared argument shape.
 * A parameter is required unless it is optional or has a default.
 */
export function deriveInputSchema(shape: z.ZodRawShape): InputSchema {
  const properties: InputSchema['properties'] = {};
  const required: string[] = [];

  for (const [name, schema] of Object.entries(shape)) {
    properties[name] = {
      type: parameterType(schema),
      description: schema.description ?? name,
    };
    if (!schema.isOptional()) {
      required.push(name);
    }
  }

  return {
    type: 'object',
    properties,
    required,
    additionalProperties: false,
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    if (issue.code === 'unrecognized_keys') {
      return `unexpected argument(s) ${issue.keys.join(', ')}`;
    }
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Declare a tool. The handler is typed against its own argument shape and
 * only ever sees arguments that passed strict validation.
 */
export function defineTool<T extends z.ZodRawShape>(spec: ToolSpec<T>): ToolDefinition {
  const schema = z.object(spec.args).strict();
  return {
    name: spec.name,
    title: spec.title,
    description: spec.description,
    widgetId: spec.widgetId,
    inputSchema: deriveInputSchema(spec.args),
    invoke: (args, context) => {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new ToolArgumentError(spec.name, formatIssues(parsed.error));
      }
      return spec.handler(parsed.data, context);
    },
  };
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(private readonly catalog: WidgetCatalog) {}

  /**
   * Bind a tool to its widget. Duplicate names and unknown widgets are startup errors.
   */
  register(definition: ToolDefinition): RegisteredTool {
    if (this.tools.has(definition.name)) {
      throw new StartupError(`Tool already registered: ${definition.name}`, 'tools');
    }
    const widget = this.catalog.get(definition.widgetId);
    if (!widget) {
      throw new StartupError(
        `Tool ${definition.name} is bound to unknown widget: ${definition.widgetId}`,
        'tools'
      );
    }

    const tool: RegisteredTool = { ...definition, widget };
    this.tools.set(tool.name, tool);
    return tool;
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  /**
   * Registered tools in registration order
   */
  describeAll(): RegisteredTool[] {
    return [...this.tools.values()];
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }
}
