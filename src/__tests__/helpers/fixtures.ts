/**
 * Test Fixtures
 * Listing and detail page markup
 */

export const LISTING_URL = 'https://auto.example.com/uk/car/used/';

export const detailUrl = (id: number): string =>
  `https://auto.example.com/uk/auto_bmw_x5_${id}.html`;

export function buildListingHtml(hrefs: Array<string | null>): string {
  const cards = hrefs
    .map((href) => {
      const attr = href === null ? '' : ` href="${href}"`;
      return `
    <section class="ticket-item">
      <div class="content-bar">
        <a class="m-link-ticket"${attr}>photo</a>
        <div class="item ticket-title"><a class="address"${attr} title="car">Car</a></div>
      </div>
    </section>`;
    })
    .join('');

  return `<!DOCTYPE html>
<html>
<head><title>Вживані авто</title></head>
<body>
  <div id="searchResults">${cards}
  </div>
  <a class="address" href="https://auto.example.com/uk/not-a-card.html">outside a card</a>
</body>
</html>`;
}

export interface DetailFixture {
  title?: string | null;
  price?: string | null;
  odometer?: string | null;
  seller?: string | null;
  vin?: string | null;
  plate?: string | null;
  phones?: string[];
  images?: Array<Record<string, string>>;
}

const DEFAULT_DETAIL: Required<DetailFixture> = {
  title: 'BMW X5 2015',
  price: '24 200 €',
  odometer: '95 тис. км пробіг',
  seller: 'Олександр',
  vin: 'WBAKS410X00C12345',
  plate: 'AA 1234 BB',
  phones: ['(067) 123 45 67'],
  images: [
    { srcset: 'https://cdn.example.com/photo/1f.webp' },
    { src: 'https://cdn.example.com/photo/2f.jpg' },
    { 'data-src': 'https://cdn.example.com/photo/3f.jpg' },
  ],
};

export function buildDetailHtml(overrides: DetailFixture = {}): string {
  const d = { ...DEFAULT_DETAIL, ...overrides };

  const parts: string[] = [];
  if (d.title !== null) parts.push(`<h1 class="head" title="${d.title}">${d.title}</h1>`);
  if (d.price !== null) parts.push(`<div class="price_value"><strong>${d.price}</strong></div>`);
  if (d.odometer !== null) parts.push(`<div class="base-information bold">${d.odometer}</div>`);
  if (d.seller !== null) parts.push(`<div class="seller_info_name bold">${d.seller}</div>`);
  if (d.vin !== null) parts.push(`<span class="label-vin">${d.vin}</span>`);
  if (d.plate !== null) {
    parts.push(`<span class="state-num ua">${d.plate}<span class="popup">Перевірений номер</span></span>`);
  }
  for (const phone of d.phones) {
    parts.push(`<div class="phones_item"><span class="phone bold">${phone}</span></div>`);
  }

  const sources = d.images
    .map((attrs) => {
      const rendered = Object.entries(attrs)
        .map(([name, value]) => `${name}="${value}"`)
        .join(' ');
      return `<picture><source ${rendered} type="image/webp"></picture>`;
    })
    .join('');
  parts.push(`<div class="gallery"><div class="photo-620x465">${sources}</div></div>`);

  return `<!DOCTYPE html>
<html>
<head><title>${d.title ?? 'Оголошення'}</title></head>
<body>
  ${parts.join('\n  ')}
</body>
</html>`;
}
