/**
 * Global Golf CSS Selectors
 *
 * Category pages list products as `div.product-item` cards.
 * Product pages carry a specification table and review summary.
 */

export const SELECTORS = {
  // Category page cards
  productItem: 'div.product-item',
  itemTitle: 'h3.product-name',
  itemPrice: 'span.price',
  itemLink: 'a.product-link',
  itemOutOfStock: '.out-of-stock, .sold-out',

  // Product page
  title: 'h1.product-title',
  description: 'div.product-description',
  price: '.product-price span.price, span.price',
  stockStatus: '.stock-status',
  specRows: 'table.specifications tr',
  rating: 'span.rating-value',
  reviewCount: 'span.review-count',
  breadcrumbLinks: '.breadcrumb a',
} as const

/** Category slug → path under the base URL */
export const CATEGORY_PATHS = {
  drivers: '/golf-clubs/drivers/',
  'fairway-woods': '/golf-clubs/fairway-woods/',
  hybrids: '/golf-clubs/hybrids/',
  irons: '/golf-clubs/irons/',
  wedges: '/golf-clubs/wedges/',
  putters: '/golf-clubs/putters/',
} as const

/** Specification keys (lowercased) that may carry a release year */
export const YEAR_SPEC_KEYS = ['year', 'release year', 'model year', 'year released'] as const

/** Specification keys (lowercased) that may carry the club type */
export const TYPE_SPEC_KEYS = ['club type', 'type', 'category'] as const
