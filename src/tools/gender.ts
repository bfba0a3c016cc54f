import { z } from 'zod';
import { defineTool } from '../registry.js';

export type GenderPrediction = 'boy' | 'girl' | 'unknown';

const DAY_PATTERN = /^\s*\+?\d+\s*$/;

/**
 * Playful guess from the day component of a YYYY-MM-DD date: odd is boy, even is girl.
 */
export function predictFromDueDate(dueDate: string | null | undefined): GenderPrediction {
  if (!dueDate) return 'unknown';

  const segments = dueDate.split('-');
  const day = segments[segments.length - 1] ?? '';
  if (!DAY_PATTERN.test(day)) return 'unknown';

  return Number.parseInt(day, 10) % 2 === 1 ? 'boy' : 'girl';
}

export const predictGender = defineTool({
  name: 'predict_gender',
  title: 'Playful gender prediction (not medical).',
  description: 'Playful gender prediction (not medical). Based on the day of the due date.',
  widgetId: 'huggies-gender',
  args: {
    due_date: z.string().nullish().describe('Expected due date, YYYY-MM-DD'),
    conception_date: z.string().nullish().describe('Conception date, YYYY-MM-DD'),
  },
  handler: ({ due_date, conception_date }) => {
    const prediction = predictFromDueDate(due_date);
    return {
      text: `Playful prediction: ${prediction} (not medical).`,
      content: {
        backend: {
          prediction,
          due_date: due_date ?? null,
          conception_date: conception_date ?? null,
        },
        widget: { widget_type: 'gender_predictor', prediction },
      },
    };
  },
});
