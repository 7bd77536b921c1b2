/**
 * Field Rule Utilities
 */

import type { CheerioAPI } from 'cheerio';
import { FieldRule, FieldRules } from './field-rules.types';

/**
 * Read every match of the rule's selector, one value per match
 */
export function readRule<T>($: CheerioAPI, rule: FieldRule<T>): string[] {
  const { read } = rule;

  return $(rule.selector)
    .toArray()
    .map((node) => {
      const element = $(node);

      switch (read.kind) {
        case 'text':
          return element.text().trim();
        case 'firstTextNode':
          return element
            .contents()
            .filter((_, child) => child.type === 'text')
            .first()
            .text()
            .trim();
        case 'attribute':
          return read.names.map((name) => element.attr(name)).find((value) => !!value) ?? '';
        case 'count':
          return '';
      }
    });
}

export function applyRule<T>($: CheerioAPI, rule: FieldRule<T>): T {
  return rule.normalize(readRule($, rule));
}

/**
 * Names of required fields whose selector matches nothing
 */
export function missingRequiredFields<F>($: CheerioAPI, rules: FieldRules<F>): string[] {
  return Object.entries<FieldRule<unknown>>(rules)
    .filter(([, rule]) => rule.required === true && $(rule.selector).length === 0)
    .map(([field]) => field);
}
