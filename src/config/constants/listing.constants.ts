export const LISTING_LIMITS = {
  TITLE_MAX: 100,
  CATEGORY_NAME_MAX: 64,
  COMMENT_TITLE_MAX: 100,
} as const;

// numeric(10, 2): eight integer digits, two fraction digits
export const MONEY = {
  MAX_INTEGER_DIGITS: 8,
  FRACTION_DIGITS: 2,
} as const;

export type ListingState = "open" | "closed";
