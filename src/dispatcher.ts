/**
 * Dispatcher - request-facing facade over the registry and the widget catalog
 *
 * Stateless: every call reads only the read-only state built at startup.
 * No failure raised by a tool escapes `callTool`; it comes back as an
 * error envelope instead.
 */

import type {
  CallToolResult,
  ReadResourceResult,
  Resource,
  ResourceTemplate,
  Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { buildEnvelope, errorEnvelope, toolMeta, TOOL_ANNOTATIONS } from './envelope.js';
import { errorMessage } from './errors.js';
import { WIDGET_MIME_TYPE, type WidgetCatalog } from './widgets.js';
import type { ToolContext, ToolRegistry } from './registry.js';
import type { WidgetDescriptor } from './types.js';

function resourceDescription(widget: WidgetDescriptor): string {
  return `${widget.title} widget markup`;
}

export class Dispatcher {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly catalog: WidgetCatalog,
    private readonly context: ToolContext
  ) {}

  listTools(): Tool[] {
    return this.registry.describeAll().map((tool) => ({
      name: tool.name,
      title: tool.title,
      description: tool.description,
      inputSchema: tool.inputSchema,
      _meta: toolMeta(tool.widget),
      annotations: { ...TOOL_ANNOTATIONS },
    }));
  }

  listResources(): Resource[] {
    return this.catalog.list().map((widget) => ({
      name: widget.title,
      title: widget.title,
      uri: widget.templateUri,
      description: resourceDescription(widget),
      mimeType: WIDGET_MIME_TYPE,
      _meta: toolMeta(widget),
    }));
  }

  listResourceTemplates(): ResourceTemplate[] {
    return this.catalog.list().map((widget) => ({
      name: widget.title,
      title: widget.title,
      uriTemplate: widget.templateUri,
      description: resourceDescription(widget),
      mimeType: WIDGET_MIME_TYPE,
      _meta: toolMeta(widget),
    }));
  }

  /**
   * Serve widget markup by URI. A miss is reported in `_meta.error`, not thrown.
   */
  readResource(uri: string): ReadResourceResult {
    const widget = this.catalog.resolveByUri(uri);
    if (!widget) {
      return {
        contents: [],
        _meta: { error: `Unknown resource: ${uri}` },
      };
    }

    return {
      contents: [
        {
          uri: widget.templateUri,
          mimeType: WIDGET_MIME_TYPE,
          text: widget.html,
          _meta: toolMeta(widget),
        },
      ],
    };
  }

  callTool(name: string, args?: Record<string, unknown>): CallToolResult {
    const tool = this.registry.get(name);
    if (!tool) {
      return errorEnvelope(`Unknown tool: ${name}`);
    }

    try {
      return buildEnvelope(tool.invoke(args, this.context), tool.widget);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[HuggiesServer] Error handling ${name}:`, message);
      return errorEnvelope(`Tool execution error: ${message}`, tool.widget);
    }
  }
}
