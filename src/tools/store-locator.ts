/**
 * Store locator. Mock data: coordinates are jittered around a fixed point,
 * nothing is geocoded.
 */

import { z } from 'zod';
import { defineTool } from '../registry.js';
import { roundTo } from '../utils.js';

export const BASE_COORDINATE = { lat: 28.65195, lon: 77.23149 } as const;
export const STORE_PHONE = '1800-555-0123';
const JITTER_STEP = 0.02;

export const EXAMPLE_RETAILERS = [
  { name: 'Target', address: '123 Main St', distance_miles: 1.2 },
  { name: 'Walmart', address: '456 Market Ave', distance_miles: 2.1 },
  { name: 'Amazon Pickup Point', address: '789 Commerce Rd', distance_miles: 3.8 },
  { name: 'Local Pharmacy', address: '12 Pharmacy Ln', distance_miles: 0.6 },
  { name: 'Costco', address: '55 Warehouse Dr', distance_miles: 4.5 },
] as const;

/**
 * Offset a base coordinate; the spread widens with list position.
 */
export function jitter(base: number, position: number, random: () => number): number {
  return roundTo(base + (random() - 0.5) * JITTER_STEP * (position + 1), 6);
}

export const mapWidget = defineTool({
  name: 'map_widget',
  title: 'Find retailers near a location and display on a map.',
  description: 'Find retailers near a location and display on a map.',
  widgetId: 'huggies-map',
  args: {
    zip_code: z.string().nullish().describe('Postal code to search near'),
    location: z.string().nullish().describe('Free-text location, used when no zip code is given'),
    limit: z.number().int().nonnegative().default(5).describe('Maximum number of retailers'),
  },
  handler: ({ zip_code, location, limit }, { random }) => {
    const results = EXAMPLE_RETAILERS.slice(0, limit).map((retailer, index) => ({
      name: retailer.name,
      address: retailer.address,
      zip: zip_code || '00000',
      distance_miles: retailer.distance_miles,
      lat: jitter(BASE_COORDINATE.lat, index, random),
      lon: jitter(BASE_COORDINATE.lon, index, random),
      phone: STORE_PHONE,
    }));

    const place = zip_code || location || 'your area';
    return {
      text: `Found ${results.length} retailers near ${place}.`,
      content: {
        backend: { results },
        widget: { widget_type: 'map', markers: results },
      },
    };
  },
});
