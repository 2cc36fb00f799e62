/**
 * Crawl Job Validation
 * Turns an untrusted request body into a crawl job configuration
 */

import { CrawlJobConfig, parseHttpUrl } from '../../lib/crawling';

export const MAX_WORKERS_LIMIT = 32;

/**
 * Raised before any crawl work starts when a job configuration is unusable
 */
export class CrawlConfigError extends Error {
  public readonly details: string[];

  constructor(details: string[]) {
    super(`Invalid crawl configuration: ${details.join('; ')}`);
    this.name = 'CrawlConfigError';
    this.details = details;
  }
}

export interface ValidatedCrawlRequest {
  config: CrawlJobConfig;
  maxWorkers?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBoolean(
  body: Record<string, unknown>,
  key: string,
  fallback: boolean,
  errors: string[]
): boolean {
  const value = body[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    errors.push(`${key} must be a boolean`);
    return fallback;
  }
  return value;
}

function readInteger(
  body: Record<string, unknown>,
  key: string,
  min: number,
  max: number,
  errors: string[]
): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    errors.push(`${key} must be an integer between ${min} and ${max}`);
    return undefined;
  }
  return value;
}

/**
 * Validate a crawl request body. Throws {@link CrawlConfigError} listing every
 * problem found.
 */
export function validateCrawlJobConfig(body: unknown): ValidatedCrawlRequest {
  if (!isRecord(body)) {
    throw new CrawlConfigError(['request body must be an object']);
  }

  const errors: string[] = [];

  const seedUrls: string[] = [];
  if (!Array.isArray(body.seedUrls) || body.seedUrls.length === 0) {
    errors.push('seedUrls must be a non-empty array of URLs');
  } else {
    for (const seed of body.seedUrls) {
      if (typeof seed !== 'string') {
        errors.push('seedUrls must only contain strings');
        continue;
      }
      const parsed = parseHttpUrl(seed);
      if (!parsed.ok) {
        errors.push(`invalid seed URL: ${seed}`);
        continue;
      }
      seedUrls.push(seed.trim());
    }
  }

  const exclusionPatterns: string[] = [];
  if (body.exclusionPatterns !== undefined) {
    if (!Array.isArray(body.exclusionPatterns)) {
      errors.push('exclusionPatterns must be an array of strings');
    } else {
      for (const pattern of body.exclusionPatterns) {
        if (typeof pattern !== 'string') {
          errors.push('exclusionPatterns must only contain strings');
        } else if (pattern) {
          exclusionPatterns.push(pattern);
        }
      }
    }
  }

  const config: CrawlJobConfig = {
    seedUrls,
    domainRestricted: readBoolean(body, 'domainRestricted', true, errors),
    pathRestricted: readBoolean(body, 'pathRestricted', true, errors),
    exclusionPatterns,
    maxPages: readInteger(body, 'maxPages', 1, Number.MAX_SAFE_INTEGER, errors),
    maxDepth: readInteger(body, 'maxDepth', 0, Number.MAX_SAFE_INTEGER, errors),
    followLinks: readBoolean(body, 'followLinks', true, errors),
  };
  const maxWorkers = readInteger(body, 'maxWorkers', 1, MAX_WORKERS_LIMIT, errors);

  if (errors.length > 0) {
    throw new CrawlConfigError(errors);
  }

  return { config, maxWorkers };
}
