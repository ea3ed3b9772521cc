/** Rows per batch for bulk inserts — keeps each statement under SQLite's bound-parameter limit */
export const BATCH_SIZE = 1000;

/** Unit prices are held as integer ten-thousandths */
export const PRICE_DECIMALS = 4;
export const PRICE_SCALE = 10 ** PRICE_DECIMALS;

/** Country recorded when the source leaves it blank */
export const UNSPECIFIED_COUNTRY = 'Unspecified';

/** Customer id cell values that mean "no customer" */
export const UNKNOWN_CUSTOMER_TOKENS = new Set(['', 'nan', 'NaN', 'None', 'none', 'null', 'NULL', '<NA>']);

/** Whole-number ids exported as floats, e.g. "13085.0" */
export const FLOAT_ID_REGEX = /^(\d+)\.0+$/;

/** Limit for the top-products breakdown */
export const TOP_PRODUCTS_LIMIT = 10;

/** Warn if analytics query exceeds this threshold (ms) */
export const SLOW_QUERY_THRESHOLD_MS = 100;

export const MONTH_NAMES = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const;

/** ISO weekday order, index 0 = Monday */
export const WEEKDAY_NAMES = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;
