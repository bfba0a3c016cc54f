/**
 * Widget catalog and resource resolver
 *
 * Widget markup is read from the assets directory once, at startup. A widget
 * named `huggies-map` is served from `huggies-map.html`, or failing that from
 * the lexicographically last `huggies-map-*.html` (hashed build output).
 */

import { existsSync, readFileSync, readdirSync, statSync } from 'fs';
import { join } from 'path';
import { StartupError } from './errors.js';
import type { WidgetDefinition, WidgetDescriptor } from './types.js';

export const WIDGET_MIME_TYPE = 'text/html+skybridge';

export const WIDGET_DEFINITIONS: readonly WidgetDefinition[] = [
  {
    identifier: 'huggies-cards',
    title: 'Show FAQ Cards',
    templateUri: 'ui://widget/huggies-cards.html',
    invoking: 'Searching FAQs',
    invoked: 'Found FAQ results',
    responseText: 'Displayed FAQ cards!',
  },
  {
    identifier: 'huggies-size-calc',
    title: 'Diaper Size Calculator',
    templateUri: 'ui://widget/huggies-size-calc.html',
    invoking: 'Calculating diaper size',
    invoked: 'Size recommendation ready',
    responseText: 'Calculated diaper size!',
  },
  {
    identifier: 'huggies-map',
    title: 'Store Locator Map',
    templateUri: 'ui://widget/huggies-map.html',
    invoking: 'Finding nearby stores',
    invoked: 'Store locations found',
    responseText: 'Displayed store map!',
  },
  {
    identifier: 'huggies-offers',
    title: 'Coupons & Offers',
    templateUri: 'ui://widget/huggies-offers.html',
    invoking: 'Loading current offers',
    invoked: 'Offers displayed',
    responseText: 'Showed available offers!',
  },
  {
    identifier: 'huggies-names',
    title: 'Baby Name Suggestions',
    templateUri: 'ui://widget/huggies-names.html',
    invoking: 'Generating name suggestions',
    invoked: 'Name suggestions ready',
    responseText: 'Displayed name suggestions!',
  },
  {
    identifier: 'huggies-gender',
    title: 'Gender Predictor',
    templateUri: 'ui://widget/huggies-gender.html',
    invoking: 'Predicting gender',
    invoked: 'Prediction complete',
    responseText: 'Showed gender prediction!',
  },
];

/**
 * Resolve the asset file for a widget: exact name first, then the last hashed variant
 */
export function resolveWidgetAsset(assetsDir: string, name: string): string {
  if (!existsSync(assetsDir) || !statSync(assetsDir).isDirectory()) {
    throw new StartupError(`Widget assets directory not found: ${assetsDir}`, assetsDir);
  }

  const exact = join(assetsDir, `${name}.html`);
  if (existsSync(exact)) {
    return exact;
  }

  const candidates = readdirSync(assetsDir)
    .filter((file) => file.startsWith(`${name}-`) && file.endsWith('.html'))
    .sort();
  const last = candidates[candidates.length - 1];
  if (last !== undefined) {
    return join(assetsDir, last);
  }

  throw new StartupError(
    `Widget HTML for "${name}" not found in ${assetsDir}. Build the widget assets before starting the server.`,
    assetsDir
  );
}

export function loadWidgetHtml(assetsDir: string, name: string): string {
  return readFileSync(resolveWidgetAsset(assetsDir, name), 'utf8');
}

export class WidgetCatalog {
  private readonly widgets: readonly WidgetDescriptor[];
  private readonly byId = new Map<string, WidgetDescriptor>();
  private readonly byUri = new Map<string, WidgetDescriptor>();

  constructor(widgets: WidgetDescriptor[]) {
    for (const widget of widgets) {
      if (this.byId.has(widget.identifier)) {
        throw new StartupError(`Duplicate widget identifier: ${widget.identifier}`, 'widgets');
      }
      if (this.byUri.has(widget.templateUri)) {
        throw new StartupError(`Duplicate widget template URI: ${widget.templateUri}`, 'widgets');
      }
      const frozen = Object.freeze({ ...widget });
      this.byId.set(frozen.identifier, frozen);
      this.byUri.set(frozen.templateUri, frozen);
    }
    this.widgets = Object.freeze([...this.byId.values()]);
  }

  /**
   * Build the catalog, preloading every widget's markup from disk
   */
  static load(assetsDir: string, definitions: readonly WidgetDefinition[] = WIDGET_DEFINITIONS): WidgetCatalog {
    return new WidgetCatalog(
      definitions.map((definition) => ({
        ...definition,
        html: loadWidgetHtml(assetsDir, definition.identifier),
      }))
    );
  }

  get size(): number {
    return this.widgets.length;
  }

  list(): readonly WidgetDescriptor[] {
    return this.widgets;
  }

  get(identifier: string): WidgetDescriptor | undefined {
    return this.byId.get(identifier);
  }

  resolveByUri(uri: string): WidgetDescriptor | undefined {
    return this.byUri.get(uri);
  }
}
