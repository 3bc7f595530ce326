export const APP = {
  NAME: "Auction House API",
  API_PREFIX: "/v1",
  DEFAULT_PORT: 4000,

  PAGINATION: {
    DEFAULT_LIMIT: 20,
    MAX_LIMIT: 100,
  },
} as const;
