/**
 * Tool set
 *
 * Every tool the server exposes, in the order clients see them listed.
 * The set is fixed at startup; to add a tool, declare it with defineTool
 * and append it here.
 */

import type { ToolDefinition, ToolRegistry } from '../registry.js';
import { getFaq, listFaqs, getItemById } from './faq.js';
import { diaperSizeCalc } from './size-calculator.js';
import { mapWidget } from './store-locator.js';
import { coupons } from './offers.js';
import { suggestNames } from './names.js';
import { predictGender } from './gender.js';

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  getFaq,
  listFaqs,
  getItemById,
  diaperSizeCalc,
  mapWidget,
  coupons,
  suggestNames,
  predictGender,
];

export function registerTools(
  registry: ToolRegistry,
  definitions: readonly ToolDefinition[] = TOOL_DEFINITIONS
): ToolRegistry {
  for (const definition of definitions) {
    registry.register(definition);
  }
  return registry;
}
