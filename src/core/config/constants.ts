// src/core/config/constants.ts
export const APP_NAME = 'linkvault';
export const DEFAULT_OUTPUT_DIR = './downloads';
export const LEDGER_FILENAME = '.processed-links.db';
export const CREDENTIALS_FILENAME = 'credentials.json';
export const PAGE_FILENAME = 'page.html';

export const DEFAULT_TIMEOUT = 30000; // 30 seconds
export const DEFAULT_LINK_CONCURRENCY = 4;
export const DEFAULT_IMAGE_CONCURRENCY = 10;
export const PLATFORM_CONNECTION_RETRIES = 5;

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; linkvault/0.1)';
