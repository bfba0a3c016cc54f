/**
 * Widget-binding metadata and the uniform tool-call response envelope
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ToolOutcome, WidgetDescriptor } from './types.js';

// Key names are read verbatim by Apps SDK clients.
export const META_KEYS = {
  outputTemplate: 'openai/outputTemplate',
  invoking: 'openai/toolInvocation/invoking',
  invoked: 'openai/toolInvocation/invoked',
  widgetAccessible: 'openai/widgetAccessible',
  resultCanProduceWidget: 'openai/resultCanProduceWidget',
} as const;

export const TOOL_ANNOTATIONS = {
  destructiveHint: false,
  openWorldHint: false,
  readOnlyHint: true,
} as const;

/**
 * Full binding metadata advertised on tools and resources
 */
export function toolMeta(widget: WidgetDescriptor): Record<string, unknown> {
  return {
    [META_KEYS.outputTemplate]: widget.templateUri,
    [META_KEYS.invoking]: widget.invoking,
    [META_KEYS.invoked]: widget.invoked,
    [META_KEYS.widgetAccessible]: true,
    [META_KEYS.resultCanProduceWidget]: true,
  };
}

/**
 * Invocation labels attached to every tool-call result
 */
export function invocationMeta(widget: WidgetDescriptor): Record<string, unknown> {
  return {
    [META_KEYS.invoking]: widget.invoking,
    [META_KEYS.invoked]: widget.invoked,
  };
}

export function buildEnvelope(outcome: ToolOutcome, widget: WidgetDescriptor): CallToolResult {
  const text = outcome.text.trim().length > 0 ? outcome.text : widget.responseText;
  return {
    content: [{ type: 'text', text }],
    structuredContent: { text, ...outcome.content },
    isError: outcome.isError ?? false,
    _meta: invocationMeta(widget),
  };
}

export function errorEnvelope(text: string, widget?: WidgetDescriptor): CallToolResult {
  const result: CallToolResult = {
    content: [{ type: 'text', text }],
    isError: true,
  };
  if (widget) {
    result._meta = invocationMeta(widget);
  }
  return result;
}
