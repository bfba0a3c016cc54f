/**
 * Diaper size calculator
 */

import { z } from 'zod';
import { defineTool } from '../registry.js';
import { roundTo } from '../utils.js';

export const LB_PER_KG = 2.2046226218;

export const SIZING_ADVICE =
  'If you see red marks around the legs, frequent leaks, or difficulty closing tabs, consider sizing up.';

export interface SizeBand {
  size: string;
  label: string;
  range: string;
  matches: (weightLb: number) => boolean;
}

// Bands overlap; the first match in this order wins. Kept as published
// even though 13 lb reads as size 1 and never reaches size 2.
export const SIZE_BANDS: readonly SizeBand[] = [
  { size: 'N', label: 'N (Newborn)', range: 'up to 10 lbs', matches: (w) => w <= 10 },
  { size: '1', label: '1', range: '8–14 lbs', matches: (w) => w >= 8 && w <= 14 },
  { size: '2', label: '2', range: '12–18 lbs', matches: (w) => w >= 12 && w <= 18 },
  { size: '3', label: '3', range: '16–28 lbs', matches: (w) => w >= 16 && w <= 28 },
  { size: '4', label: '4', range: '22–37 lbs', matches: (w) => w >= 22 && w <= 37 },
  { size: '5', label: '5', range: '27+ lbs (varies by product)', matches: (w) => w >= 27 && w <= 40 },
];

const LARGEST_BAND: SizeBand = { size: '6', label: '6', range: '35+ lbs', matches: () => true };

export function matchSizeBand(weightLb: number): SizeBand {
  return SIZE_BANDS.find((band) => band.matches(weightLb)) ?? LARGEST_BAND;
}

export const diaperSizeCalc = defineTool({
  name: 'diaper_size_calc',
  title: "Calculate recommended diaper size based on baby's weight.",
  description:
    "Calculate recommended diaper size based on baby's weight. Provide weight_lb or weight_kg; pounds win when both are given.",
  widgetId: 'huggies-size-calc',
  args: {
    weight_kg: z.number().nonnegative().nullish().describe('Baby weight in kilograms'),
    weight_lb: z.number().nonnegative().nullish().describe('Baby weight in pounds'),
  },
  handler: ({ weight_kg, weight_lb }) => {
    let weightLb: number;
    if (weight_lb !== undefined && weight_lb !== null) {
      weightLb = weight_lb;
    } else if (weight_kg !== undefined && weight_kg !== null) {
      weightLb = weight_kg * LB_PER_KG;
    } else {
      const text = 'Please provide weight_kg or weight_lb.';
      return { text, content: { error: text }, isError: true };
    }

    const band = matchSizeBand(weightLb);
    const rounded = roundTo(weightLb, 2);
    const backend = {
      weight_lb: rounded,
      recommended_size: band.size,
      size_label: band.label,
      weight_range_description: band.range,
      advice: SIZING_ADVICE,
    };

    return {
      text: `For approx ${rounded} lbs, recommended size: ${band.label} (${band.range}). ${SIZING_ADVICE}`,
      content: {
        backend,
        widget: { widget_type: 'info_card', data: backend },
      },
    };
  },
});
