export const API_PREFIX = 'api/v1';

export const PAGINATION = {
  DEFAULT_PAGE: 1,
  DEFAULT_PAGE_SIZE: 10,
  MAX_PAGE_SIZE: 100,
};

export const REPORT_LIMITS = {
  DEFAULT_LIMIT: 100,
  MAX_LIMIT: 1000,
};

export const DEFAULT_PORT = 5000;
export const DEFAULT_HOST = '0.0.0.0';

// Largest value a decimal(12,2) money column holds
export const MAX_MONEY_AMOUNT = 9999999999.99;
