/**
 * Link Discoverer
 * Detail-page links from a listing page, in document order
 */

import * as cheerio from 'cheerio';
import { normalizeUrl } from './url-normalizer';

/** Item-card anchors on a listing page */
export const ITEM_CARD_SELECTOR = 'section.ticket-item a.address';

export class LinkDiscoverer {
  constructor(private readonly selector: string = ITEM_CARD_SELECTOR) {}

  /**
   * Discover detail links; anchors without href are dropped.
   * Relative hrefs are resolved against `baseUrl` when it is given.
   */
  discover(html: string, baseUrl?: string): string[] {
    const $ = cheerio.load(html);
    const links: string[] = [];

    $(this.selector).each((_, el) => {
      const href = $(el).attr('href')?.trim();
      if (!href) return;

      links.push(normalizeUrl(href, baseUrl));
    });

    return links;
  }
}
