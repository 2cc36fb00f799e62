import dotenv from 'dotenv';

dotenv.config();

/**
 * Positive integer from an env value, or the fallback when unset or malformed
 */
export function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const env = {
  // Server
  PORT: parsePositiveInt(process.env.PORT, 3001),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Database
  MONGODB_URI: process.env.MONGODB_URI || 'mongodb://localhost:27017/crawl-frontier',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Jina Reader (fetch collaborator)
  JINA_API_KEY: process.env.JINA_API_KEY,
  JINA_READER_URL: process.env.JINA_READER_URL || 'https://r.jina.ai/',
  JINA_TIMEOUT: parsePositiveInt(process.env.JINA_TIMEOUT, 30000), // 30s per page
  USER_AGENT: process.env.USER_AGENT || 'Mozilla/5.0 (compatible; CrawlFrontier/1.0)',

  // Crawling
  CRAWL_MAX_WORKERS: parsePositiveInt(process.env.CRAWL_MAX_WORKERS, 3),
  CRAWL_MAX_ATTEMPTS: parsePositiveInt(process.env.CRAWL_MAX_ATTEMPTS, 3),
  CRAWL_OUTPUT_DIR: process.env.CRAWL_OUTPUT_DIR || 'output',
  CRAWL_FILENAME_MAX_LENGTH: parsePositiveInt(process.env.CRAWL_FILENAME_MAX_LENGTH, 100),

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 60000), // 1 minute
  RATE_LIMIT_MAX_REQUESTS: parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 30), // 30 requests per window
  RATE_LIMIT_ENABLED: process.env.RATE_LIMIT_ENABLED !== 'false', // Default true
} as const;

export default env;
