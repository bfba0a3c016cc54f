/**
 * FAQ tools: search, list and fetch knowledge records.
 * All three render in the cards widget.
 */

import { z } from 'zod';
import { defineTool } from '../registry.js';
import type { KnowledgeRecord } from '../types.js';

const CARDS_WIDGET = 'huggies-cards';
const PREVIEW_LENGTH = 300;

function toResult(record: KnowledgeRecord) {
  return {
    id: record.id,
    title: record.title,
    answer: record.answer,
    source_url: record.source_url,
    type: record.type,
    tags: [...record.tags],
  };
}

type FaqResult = ReturnType<typeof toResult>;

function toCard(result: FaqResult) {
  return {
    type: 'card',
    title: result.title,
    text: result.answer,
    meta: { id: result.id, source_url: result.source_url },
  };
}

export const getFaq = defineTool({
  name: 'get_faq',
  title: 'Search FAQs and return results with widget cards.',
  description:
    'Search FAQs and return results with widget cards. Returns up to three ranked answers; when nothing matches, the first FAQs are shown instead.',
  widgetId: CARDS_WIDGET,
  args: {
    query: z.string().nullable().describe('Free-text question or keywords'),
  },
  handler: ({ query }, { ranker, topN }) => {
    const q = (query ?? '').trim();
    if (!q) {
      return {
        text: 'Query is required',
        content: {
          results: [],
          widget: { widget_type: 'cards', cards: [] },
        },
      };
    }

    const ranked = ranker.rank(q, topN);
    const results = ranked.records.map(toResult);
    const top = results[0];
    const text = top ? `${top.title}: ${top.answer}` : `No matching FAQ found for "${q}".`;

    return {
      text,
      content: {
        results,
        fallback: ranked.kind === 'fallback',
        widget: {
          widget_type: 'cards',
          cards: results.map(toCard),
        },
      },
    };
  },
});

export const listFaqs = defineTool({
  name: 'list_faqs',
  title: 'List all available FAQs.',
  description: 'List all available FAQs.',
  widgetId: CARDS_WIDGET,
  args: {},
  handler: (_args, { knowledge }) => {
    const items = knowledge.all().map((record) => ({
      id: record.id,
      title: record.title,
      type: record.type,
    }));
    return {
      text: `${items.length} FAQs available.`,
      content: { results: items },
    };
  },
});

export const getItemById = defineTool({
  name: 'get_item_by_id',
  title: 'Get a specific FAQ item by ID.',
  description: 'Get a specific FAQ item by ID.',
  widgetId: CARDS_WIDGET,
  args: {
    item_id: z.string().describe('FAQ record id, as returned by list_faqs'),
  },
  handler: ({ item_id }, { knowledge }) => {
    const record = knowledge.findById(item_id);
    if (!record) {
      const text = `Item with id=${item_id} not found`;
      return { text, content: { error: text }, isError: true };
    }

    return {
      text: `${record.title}: ${Array.from(record.answer).slice(0, PREVIEW_LENGTH).join('')}...`,
      content: { item: { ...record, tags: [...record.tags] } },
    };
  },
});
