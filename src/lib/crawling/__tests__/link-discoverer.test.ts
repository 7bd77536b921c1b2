/**
 * Link Discoverer Tests
 */

import { LinkDiscoverer } from '../link-discoverer';
import { listingPageUrl } from '../url-normalizer';
import { LISTING_URL, buildListingHtml, detailUrl } from '../../../__tests__/helpers/fixtures';

describe('LinkDiscoverer', () => {
  const discoverer = new LinkDiscoverer();

  it('should return item-card links in document order', () => {
    const html = buildListingHtml([detailUrl(3), detailUrl(1), detailUrl(2)]);

    expect(discoverer.discover(html)).toEqual([detailUrl(3), detailUrl(1), detailUrl(2)]);
  });

  it('should ignore anchors outside item cards', () => {
    const links = discoverer.discover(buildListingHtml([detailUrl(1)]));

    expect(links).toEqual([detailUrl(1)]);
  });

  it('should drop card anchors without href', () => {
    const html = buildListingHtml([detailUrl(1), null, detailUrl(2)]);

    expect(discoverer.discover(html)).toEqual([detailUrl(1), detailUrl(2)]);
  });

  it('should resolve relative hrefs against the listing URL', () => {
    const html = buildListingHtml(['/uk/auto_audi_a6_77.html']);

    expect(discoverer.discover(html, LISTING_URL)).toEqual([
      'https://auto.example.com/uk/auto_audi_a6_77.html',
    ]);
    expect(discoverer.discover(html)).toEqual(['/uk/auto_audi_a6_77.html']);
  });

  it('should strip fragments from hrefs', () => {
    const html = buildListingHtml([`${detailUrl(4)}#photo`]);

    expect(discoverer.discover(html, LISTING_URL)).toEqual([detailUrl(4)]);
  });

  it('should return nothing for a page without cards', () => {
    expect(discoverer.discover('<html><body><p>Нічого не знайдено</p></body></html>')).toEqual([]);
  });
});

describe('listingPageUrl', () => {
  it('should add the page number as a query parameter', () => {
    expect(listingPageUrl(LISTING_URL, 2)).toBe('https://auto.example.com/uk/car/used/?page=2');
  });

  it('should replace an existing page parameter', () => {
    expect(listingPageUrl('https://auto.example.com/uk/car/used/?page=9&sort=price', 3)).toBe(
      'https://auto.example.com/uk/car/used/?page=3&sort=price'
    );
  });
});
