export const SELECTORS = {
  // Listing pages
  bookLink: '.product_pod h3 a',
  nextPage: 'li.next a',

  // Book pages
  productMain: '.product_main',
  title: 'h1',
  price: 'p.price_color',
  starRating: 'p.star-rating',
  availability: '.availability',
  breadcrumbItems: '.breadcrumb li',
  image: '.item.active img',
  infoRows: 'table.table-striped tr',
  authorFallback: '[itemprop="author"]',
  descriptionHeading: '#product_description',
} as const;

export const CURRENCY_SYMBOLS: Record<string, string> = {
  '£': 'GBP',
  $: 'USD',
  '€': 'EUR',
};

export const CATEGORY_BREADCRUMB_INDEX = 2;
