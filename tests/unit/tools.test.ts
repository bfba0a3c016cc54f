/**
 * Unit tests for the tool handlers
 */

import { describe, it, expect } from 'vitest';
import type { ToolContext } from '../../src/registry.js';
import { KnowledgeStore } from '../../src/knowledge.js';
import { SearchRanker } from '../../src/search.js';
import { ToolArgumentError } from '../../src/errors.js';
import { getFaq, listFaqs, getItemById } from '../../src/tools/faq.js';
import { SIZING_ADVICE, diaperSizeCalc, matchSizeBand } from '../../src/tools/size-calculator.js';
import { BASE_COORDINATE, STORE_PHONE, jitter, mapWidget } from '../../src/tools/store-locator.js';
import { coupons } from '../../src/tools/offers.js';
import { BASE_NAMES, filterNames, suggestNames } from '../../src/tools/names.js';
import { predictFromDueDate, predictGender } from '../../src/tools/gender.js';
import { FIXTURE_RECORDS, sequenceRandom } from '../utils.js';

function makeContext(random: () => number = () => 0.5): ToolContext {
  const knowledge = new KnowledgeStore(FIXTURE_RECORDS);
  return { knowledge, ranker: new SearchRanker(knowledge), random, topN: 3 };
}

const ctx = makeContext();

describe('Tools', () => {
  // ============================================================================
  // FAQ
  // ============================================================================

  describe('get_faq', () => {
    it('should answer with the best match and render cards', () => {
      const outcome = getFaq.invoke({ query: 'size' }, ctx);

      expect(outcome.text).toBe('Choosing a diaper size: Match the weight range printed on the pack.');
      expect(outcome.isError).toBeUndefined();
      expect(outcome.content).toEqual({
        results: [
          {
            id: 'kb-1',
            title: 'Choosing a diaper size',
            answer: 'Match the weight range printed on the pack.',
            source_url: 'https://example.com/kb-1',
            type: 'faq',
            tags: ['size'],
          },
          {
            id: 'kb-3',
            title: 'Overnight leaks',
            answer: 'Try an overnight diaper or go up one size for longer stretches.',
            source_url: 'https://example.com/kb-3',
            type: 'faq',
            tags: ['leaks'],
          },
        ],
        fallback: false,
        widget: {
          widget_type: 'cards',
          cards: [
            {
              type: 'card',
              title: 'Choosing a diaper size',
              text: 'Match the weight range printed on the pack.',
              meta: { id: 'kb-1', source_url: 'https://example.com/kb-1' },
            },
            {
              type: 'card',
              title: 'Overnight leaks',
              text: 'Try an overnight diaper or go up one size for longer stretches.',
              meta: { id: 'kb-3', source_url: 'https://example.com/kb-3' },
            },
          ],
        },
      });
    });

    it('should fall back to the first records when nothing matches', () => {
      const outcome = getFaq.invoke({ query: 'zzz' }, ctx);

      expect(outcome.text).toBe('Choosing a diaper size: Match the weight range printed on the pack.');
      expect(outcome.content?.fallback).toBe(true);
      expect(outcome.content?.results).toHaveLength(3);
    });

    it('should honour the configured result count', () => {
      const outcome = getFaq.invoke({ query: 'zzz' }, { ...ctx, topN: 1 });
      expect(outcome.content?.results).toHaveLength(1);
    });

    it('should treat a null query as blank', () => {
      expect(getFaq.invoke({ query: null }, ctx)).toEqual({
        text: 'Query is required',
        content: { results: [], widget: { widget_type: 'cards', cards: [] } },
      });
    });

    it('should ask for a query when it is blank', () => {
      const outcome = getFaq.invoke({ query: '   ' }, ctx);

      expect(outcome).toEqual({
        text: 'Query is required',
        content: { results: [], widget: { widget_type: 'cards', cards: [] } },
      });
    });

    it('should require the query argument', () => {
      expect(() => getFaq.invoke({}, ctx)).toThrow(ToolArgumentError);
    });
  });

  describe('list_faqs', () => {
    it('should list every record briefly', () => {
      const outcome = listFaqs.invoke({}, ctx);

      expect(outcome.text).toBe('4 FAQs available.');
      expect(outcome.content).toEqual({
        results: [
          { id: 'kb-1', title: 'Choosing a diaper size', type: 'faq' },
          { id: 'kb-2', title: 'Newborn bathing', type: 'guide' },
          { id: 'kb-3', title: 'Overnight leaks', type: 'faq' },
          { id: 'kb-4', title: 'Travel tips', type: 'guide' },
        ],
      });
    });

    it('should report an empty store', () => {
      const knowledge = new KnowledgeStore([]);
      const outcome = listFaqs.invoke({}, { ...ctx, knowledge, ranker: new SearchRanker(knowledge) });
      expect(outcome.text).toBe('0 FAQs available.');
    });
  });

  describe('get_item_by_id', () => {
    it('should return the record with a preview', () => {
      const outcome = getItemById.invoke({ item_id: 'kb-2' }, ctx);

      expect(outcome.text).toBe('Newborn bathing: Two or three times a week is enough; keep the water warm....');
      expect(outcome.content).toEqual({ item: FIXTURE_RECORDS[1] });
    });

    it('should not split characters outside the basic plane', () => {
      const answer = `${'a'.repeat(299)}\u{1F476}bbb`;
      const knowledge = new KnowledgeStore([{ ...FIXTURE_RECORDS[0], id: 'emoji', answer }]);
      const outcome = getItemById.invoke({ item_id: 'emoji' }, { ...ctx, knowledge });

      expect(outcome.text).toBe(`Choosing a diaper size: ${'a'.repeat(299)}\u{1F476}...`);
    });

    it('should cut long answers to 300 characters', () => {
      const knowledge = new KnowledgeStore([{ ...FIXTURE_RECORDS[0], id: 'long', answer: 'a'.repeat(400) }]);
      const outcome = getItemById.invoke({ item_id: 'long' }, { ...ctx, knowledge });

      expect(outcome.text).toBe(`Choosing a diaper size: ${'a'.repeat(300)}...`);
    });

    it('should flag a missing record as an error', () => {
      expect(getItemById.invoke({ item_id: 'kb-99' }, ctx)).toEqual({
        text: 'Item with id=kb-99 not found',
        content: { error: 'Item with id=kb-99 not found' },
        isError: true,
      });
    });
  });

  // ============================================================================
  // Size calculator
  // ============================================================================

  describe('diaper_size_calc', () => {
    it.each([
      [9, 'N'],
      [10, 'N'],
      [10.5, '1'],
      [13, '1'],
      [15, '2'],
      [20, '3'],
      [30, '4'],
      [38, '5'],
      [41, '6'],
    ])('should map %s lb to size %s', (weight, size) => {
      expect(matchSizeBand(weight).size).toBe(size);
    });

    it('should describe the recommendation from pounds', () => {
      const outcome = diaperSizeCalc.invoke({ weight_lb: 9 }, ctx);

      expect(outcome.text).toBe(
        `For approx 9 lbs, recommended size: N (Newborn) (up to 10 lbs). ${SIZING_ADVICE}`
      );
      const backend = {
        weight_lb: 9,
        recommended_size: 'N',
        size_label: 'N (Newborn)',
        weight_range_description: 'up to 10 lbs',
        advice: SIZING_ADVICE,
      };
      expect(outcome.content).toEqual({
        backend,
        widget: { widget_type: 'info_card', data: backend },
      });
    });

    it('should convert kilograms to pounds', () => {
      const outcome = diaperSizeCalc.invoke({ weight_kg: 5 }, ctx);

      expect(outcome.text).toBe(`For approx 11.02 lbs, recommended size: 1 (8–14 lbs). ${SIZING_ADVICE}`);
    });

    it('should prefer pounds when both weights are given', () => {
      const outcome = diaperSizeCalc.invoke({ weight_kg: 20, weight_lb: 9 }, ctx);
      expect(outcome.text.startsWith('For approx 9 lbs, recommended size: N (Newborn)')).toBe(true);
    });

    it('should accept explicit nulls as absent', () => {
      const outcome = diaperSizeCalc.invoke({ weight_kg: 5, weight_lb: null }, ctx);
      expect(outcome.text.startsWith('For approx 11.02 lbs')).toBe(true);
    });

    it('should ask for a weight when none is given', () => {
      expect(diaperSizeCalc.invoke({}, ctx)).toEqual({
        text: 'Please provide weight_kg or weight_lb.',
        content: { error: 'Please provide weight_kg or weight_lb.' },
        isError: true,
      });
    });

    it('should round exact halves to even', () => {
      expect(diaperSizeCalc.invoke({ weight_lb: 10.125 }, ctx).text).toBe(
        `For approx 10.12 lbs, recommended size: 1 (8–14 lbs). ${SIZING_ADVICE}`
      );
    });

    it('should reject negative weights', () => {
      expect(() => diaperSizeCalc.invoke({ weight_lb: -1 }, ctx)).toThrow(ToolArgumentError);
    });
  });

  // ============================================================================
  // Store locator
  // ============================================================================

  describe('map_widget', () => {
    it('should widen the jitter with list position', () => {
      expect(jitter(10, 0, () => 1)).toBeCloseTo(10.01, 6);
      expect(jitter(10, 2, () => 0)).toBeCloseTo(9.97, 6);
      expect(jitter(10, 4, () => 0.5)).toBe(10);
    });

    it('should list five retailers by default', () => {
      const outcome = mapWidget.invoke({ zip_code: '10001' }, ctx);
      const markers = [
        { name: 'Target', address: '123 Main St', distance_miles: 1.2 },
        { name: 'Walmart', address: '456 Market Ave', distance_miles: 2.1 },
        { name: 'Amazon Pickup Point', address: '789 Commerce Rd', distance_miles: 3.8 },
        { name: 'Local Pharmacy', address: '12 Pharmacy Ln', distance_miles: 0.6 },
        { name: 'Costco', address: '55 Warehouse Dr', distance_miles: 4.5 },
      ].map((retailer) => ({
        name: retailer.name,
        address: retailer.address,
        zip: '10001',
        distance_miles: retailer.distance_miles,
        lat: BASE_COORDINATE.lat,
        lon: BASE_COORDINATE.lon,
        phone: STORE_PHONE,
      }));

      expect(outcome.text).toBe('Found 5 retailers near 10001.');
      expect(outcome.content).toEqual({
        backend: { results: markers },
        widget: { widget_type: 'map', markers },
      });
    });

    it('should draw latitude before longitude for each retailer', () => {
      const outcome = mapWidget.invoke({ limit: 1 }, makeContext(sequenceRandom([1, 0])));

      expect(outcome.content?.widget).toMatchObject({
        widget_type: 'map',
        markers: [
          {
            name: 'Target',
            zip: '00000',
            lat: expect.closeTo(28.66195, 6),
            lon: expect.closeTo(77.22149, 6),
          },
        ],
      });
    });

    it('should name the place searched', () => {
      expect(mapWidget.invoke({ location: 'Springfield', limit: 2 }, ctx).text).toBe(
        'Found 2 retailers near Springfield.'
      );
      expect(mapWidget.invoke({ zip_code: '', location: 'Springfield' }, ctx).text).toBe(
        'Found 5 retailers near Springfield.'
      );
      expect(mapWidget.invoke({ limit: 0 }, ctx).text).toBe('Found 0 retailers near your area.');
    });

    it('should reject a fractional limit', () => {
      expect(() => mapWidget.invoke({ limit: 1.5 }, ctx)).toThrow(ToolArgumentError);
    });
  });

  // ============================================================================
  // Offers
  // ============================================================================

  describe('coupons', () => {
    it('should list the current offers', () => {
      const outcome = coupons.invoke({}, ctx);

      expect(outcome.text).toBe('2 current offers available.');
      expect(outcome.content?.widget).toMatchObject({
        widget_type: 'offers_list',
        offers: [{ id: 'offer-001' }, { id: 'offer-002', expires: null }],
      });
    });

    it('should take no arguments', () => {
      expect(() => coupons.invoke({ code: 'X' }, ctx)).toThrow('unexpected argument(s) code');
    });
  });

  // ============================================================================
  // Names
  // ============================================================================

  describe('suggest_names', () => {
    it('should filter by a case-insensitive prefix', () => {
      expect(filterNames(BASE_NAMES, 'z', 10)).toEqual(['Zavian', 'Zephyr']);
      expect(filterNames(BASE_NAMES, 'zo', 10)).toEqual([]);
      expect(filterNames(BASE_NAMES, 'M', 1)).toEqual(['Mylo']);
    });

    it('should return the first names without a prefix', () => {
      const outcome = suggestNames.invoke({ count: 3 }, ctx);

      expect(outcome.text).toBe('Here are 3 name suggestions.');
      expect(outcome.content).toEqual({
        backend: { names: ['Aria', 'Elowen', 'Kaia'], prefix: null, count: 3 },
        widget: { widget_type: 'names_list', names: ['Aria', 'Elowen', 'Kaia'] },
      });
    });

    it('should default to ten names', () => {
      expect(suggestNames.invoke({}, ctx).text).toBe('Here are 10 name suggestions.');
    });

    it('should report zero matches', () => {
      expect(suggestNames.invoke({ prefix: 'Q' }, ctx).text).toBe('Here are 0 name suggestions.');
    });
  });

  // ============================================================================
  // Gender
  // ============================================================================

  describe('predict_gender', () => {
    it('should read the day of the due date', () => {
      expect(predictFromDueDate('2025-03-15')).toBe('boy');
      expect(predictFromDueDate('2025-03-08')).toBe('girl');
      expect(predictFromDueDate('soon')).toBe('unknown');
      expect(predictFromDueDate('2025-03-')).toBe('unknown');
      expect(predictFromDueDate(null)).toBe('unknown');
    });

    it('should label the prediction as playful', () => {
      const outcome = predictGender.invoke({ due_date: '2025-03-15' }, ctx);

      expect(outcome.text).toBe('Playful prediction: boy (not medical).');
      expect(outcome.content).toEqual({
        backend: { prediction: 'boy', due_date: '2025-03-15', conception_date: null },
        widget: { widget_type: 'gender_predictor', prediction: 'boy' },
      });
    });

    it('should answer unknown without a due date', () => {
      expect(predictGender.invoke({ conception_date: '2024-06-01' }, ctx).text).toBe(
        'Playful prediction: unknown (not medical).'
      );
    });
  });
});
