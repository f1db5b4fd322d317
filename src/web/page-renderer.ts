import Handlebars from 'handlebars';
import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { DEFAULT_URGENCY, URGENCY_LEVELS } from '../config/constants';

export interface PageContext {
  TITLE: string;
  URGENCY_LEVELS: ReadonlyArray<{ value: string; selected: boolean }>;
  [key: string]: unknown;
}

export const DEFAULT_TEMPLATE_DIR = resolve(__dirname, '..', '..', 'templates');

export class PageRenderer {
  private templateDir: string;
  private cache = new Map<string, Handlebars.TemplateDelegate>();

  constructor(templateDir: string = DEFAULT_TEMPLATE_DIR) {
    this.templateDir = templateDir;
  }

  /**
   * Render a template with the given context
   */
  public render(templateName: string, context: PageContext): string {
    return this.load(templateName)(context);
  }

  public createContext(title: string): PageContext {
    return {
      TITLE: title,
      URGENCY_LEVELS: URGENCY_LEVELS.map((value) => ({ value, selected: value === DEFAULT_URGENCY })),
    };
  }

  private load(templateName: string): Handlebars.TemplateDelegate {
    const cached = this.cache.get(templateName);
    if (cached) {
      return cached;
    }

    const templatePath = join(this.templateDir, templateName);
    if (!existsSync(templatePath)) {
      throw new Error(`Template not found: ${templatePath}`);
    }

    const template = Handlebars.compile(readFileSync(templatePath, 'utf-8'));
    this.cache.set(templateName, template);
    return template;
  }
}
