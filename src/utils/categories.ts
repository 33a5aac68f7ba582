import type { Category } from '../types/technology.js';

/** Builds a per-category record in canonical category order. */
export function mapCategories<T>(build: (category: Category) => T): Record<Category, T> {
  return {
    cms: build('cms'),
    web_frameworks: build('web_frameworks'),
    programming_languages: build('programming_languages'),
    javascript_frameworks: build('javascript_frameworks'),
    javascript_libraries: build('javascript_libraries'),
    ui_frameworks: build('ui_frameworks'),
    analytics: build('analytics'),
    tag_managers: build('tag_managers'),
    cdn: build('cdn'),
    caching: build('caching'),
    reverse_proxies: build('reverse_proxies'),
    font_scripts: build('font_scripts'),
    security: build('security'),
    cookie_compliance: build('cookie_compliance'),
    rum: build('rum'),
    performance: build('performance'),
    hosting: build('hosting'),
    miscellaneous: build('miscellaneous'),
  };
}
