import { defineTool } from '../registry.js';

export interface Offer {
  id: string;
  title: string;
  type: 'manufacturer_coupon' | 'subscribe';
  expires: string | null;
  source_url: string;
}

export const CURRENT_OFFERS: readonly Offer[] = [
  {
    id: 'offer-001',
    title: 'Save $2 on Huggies Special Delivery',
    type: 'manufacturer_coupon',
    expires: '2026-01-31',
    source_url: 'https://www.huggies.com/en-us/offers',
  },
  {
    id: 'offer-002',
    title: 'Subscribe & Save 10% on monthly diaper delivery',
    type: 'subscribe',
    expires: null,
    source_url: 'https://www.retailer.example/subscribe',
  },
];

export const coupons = defineTool({
  name: 'coupons',
  title: 'Get current Huggies coupons and offers.',
  description: 'Get current Huggies coupons and offers.',
  widgetId: 'huggies-offers',
  args: {},
  handler: () => {
    const offers = CURRENT_OFFERS.map((offer) => ({ ...offer }));
    return {
      text: `${offers.length} current offers available.`,
      content: {
        backend: { offers },
        widget: { widget_type: 'offers_list', offers },
      },
    };
  },
});
