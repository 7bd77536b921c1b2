import dotenv from 'dotenv';

dotenv.config();

const int = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const env = {
  // Server
  PORT: int(process.env.PORT, 3001),
  NODE_ENV: process.env.NODE_ENV || 'development',
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  // Database
  MONGODB_URI: process.env.MONGODB_URI || 'mongodb://localhost:27017/autoria?replicaSet=rs0',

  // Crawl range
  START_URL: process.env.START_URL || 'https://auto.ria.com/uk/car/used/',
  START_PAGE: int(process.env.START_PAGE, 1),
  MAX_PAGES: int(process.env.MAX_PAGES, 7),

  // Fetching
  MAX_CONCURRENT_REQUESTS: int(process.env.MAX_CONCURRENT_REQUESTS, 20),
  RETRY_ATTEMPTS: int(process.env.RETRY_ATTEMPTS, 2),
  REQUEST_TIMEOUT: int(process.env.REQUEST_TIMEOUT, 10000), // ms, per attempt
  REQUEST_DELAY_MIN: int(process.env.REQUEST_DELAY_MIN, 500),
  REQUEST_DELAY_MAX: int(process.env.REQUEST_DELAY_MAX, 1500),
  RATE_LIMIT_BACKOFF: int(process.env.RATE_LIMIT_BACKOFF, 5000), // multiplied by attempt number

  // Output
  SAVE_TO_JSON: process.env.SAVE_TO_JSON !== 'false', // Default true
  SAVE_TO_DB: process.env.SAVE_TO_DB !== 'false', // Default true
  JSON_INDENT: int(process.env.JSON_INDENT, 2),
  DUMPS_DIR: process.env.DUMPS_DIR || 'dumps',

  // Scheduler
  SCHEDULER_ENABLED: process.env.SCHEDULER_ENABLED !== 'false', // Default true
  SCRAPE_HOUR: int(process.env.SCRAPE_HOUR, 12),
  SCRAPE_MINUTE: int(process.env.SCRAPE_MINUTE, 0),
  SCRAPE_TIMEZONE: process.env.SCRAPE_TIMEZONE || 'Europe/Kyiv',
} as const;

export type Env = typeof env;

export default env;
