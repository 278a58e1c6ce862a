/**
 * Page rendering with Handlebars
 */

import * as handlebars from 'handlebars';
import { readFileSync } from 'fs';
import path from 'path';
import { PageData } from '../types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('PageRenderer');

export const DEFAULT_TEMPLATE_PATH = path.resolve(__dirname, '../../templates/index.hbs');

const NANO_PER_TON = 1_000_000_000;
const CENTS_PER_EUR = 100;

/**
 * Display an amount given in minor units: nanotons for `ton`, cents for
 * everything else.
 */
export function formatAmount(amount: number, currency: string): string {
  if (currency === 'ton') {
    return `${(amount / NANO_PER_TON).toFixed(2)} TON`;
  }
  return `${(amount / CENTS_PER_EUR).toFixed(2)} EUR`;
}

/**
 * Unix seconds as `YYYY-MM-DD HH:mm:ss` in UTC
 */
export function formatTime(seconds: number): string {
  const date = new Date(seconds * 1000);
  if (Number.isNaN(date.getTime())) {
    return String(seconds);
  }
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export interface Renderer {
  render(data: PageData): string;
}

/**
 * Renders the mini app page. Templates are compiled once per instance.
 */
export class PageRenderer implements Renderer {
  private readonly template: handlebars.TemplateDelegate<PageData>;

  constructor(source: string) {
    const env = handlebars.create();

    env.registerHelper('formatAmount', (amount: unknown, currency: unknown) =>
      formatAmount(Number(amount), String(currency))
    );
    env.registerHelper('formatTime', (seconds: unknown) => formatTime(Number(seconds)));
    env.registerHelper('eq', (a: unknown, b: unknown) => a === b);

    this.template = env.compile<PageData>(source);
    logger.debug('Template compiled');
  }

  /**
   * Load a template from disk
   */
  static fromFile(templatePath: string = DEFAULT_TEMPLATE_PATH): PageRenderer {
    return new PageRenderer(readFileSync(templatePath, 'utf8'));
  }

  render(data: PageData): string {
    return this.template(data);
  }
}
