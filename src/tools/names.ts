import { z } from 'zod';
import { defineTool } from '../registry.js';

export const BASE_NAMES: readonly string[] = [
  'Aria',
  'Elowen',
  'Kaia',
  'Soren',
  'Zavian',
  'Lumi',
  'Aerin',
  'Mylo',
  'Renley',
  'Zephyr',
  'Mira',
  'Caspian',
  'Nova',
  'Orin',
  'Junia',
];

export function filterNames(names: readonly string[], prefix: string | null | undefined, count: number): string[] {
  const needle = prefix ? prefix.toLowerCase() : '';
  return names.filter((name) => name.toLowerCase().startsWith(needle)).slice(0, count);
}

export const suggestNames = defineTool({
  name: 'suggest_names',
  title: 'Suggest unique baby names.',
  description: 'Suggest unique baby names, optionally only those starting with a prefix.',
  widgetId: 'huggies-names',
  args: {
    prefix: z.string().nullish().describe('Case-insensitive prefix the names must start with'),
    count: z.number().int().nonnegative().default(10).describe('Maximum number of names'),
  },
  handler: ({ prefix, count }) => {
    const names = filterNames(BASE_NAMES, prefix, count);
    return {
      text: `Here are ${names.length} name suggestions.`,
      content: {
        backend: { names, prefix: prefix ?? null, count },
        widget: { widget_type: 'names_list', names },
      },
    };
  },
});
