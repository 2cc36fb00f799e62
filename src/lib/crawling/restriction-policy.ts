/**
 * Restriction Policy
 * Decides whether a candidate URL may be crawled under a job's configuration
 */

import { CrawlJobConfig, EligibilityDecision } from './crawling.types';
import { extractHost, firstPathSegment, parseHttpUrl } from './url-normalizer';

type PolicyConfig = Pick<
  CrawlJobConfig,
  'seedUrls' | 'domainRestricted' | 'pathRestricted' | 'exclusionPatterns'
>;

/**
 * Hosts of all parseable seed URLs
 */
export function getSeedHosts(seedUrls: string[]): Set<string> {
  const hosts = new Set<string>();
  for (const seed of seedUrls) {
    const host = extractHost(seed);
    if (host) {
      hosts.add(host);
    }
  }
  return hosts;
}

/**
 * First path segments the seeds allow, or null when the path is unconstrained.
 * A seed at the site root covers every path beneath it.
 */
export function getSeedPathScope(seedUrls: string[]): Set<string> | null {
  const segments = new Set<string>();
  for (const seed of seedUrls) {
    const parsed = parseHttpUrl(seed);
    if (!parsed.ok) {
      continue;
    }
    const segment = firstPathSegment(parsed.value);
    if (!segment) {
      return null;
    }
    segments.add(segment);
  }
  return segments.size > 0 ? segments : null;
}

/**
 * Evaluate the policy checks in order, stopping at the first refusal:
 * already done, domain, path, exclusion patterns.
 */
export function checkEligibility(
  url: string,
  config: PolicyConfig,
  doneUrls: ReadonlySet<string>
): EligibilityDecision {
  if (doneUrls.has(url)) {
    return { eligible: false, reason: 'already-done' };
  }

  const parsed = parseHttpUrl(url);
  if (!parsed.ok) {
    console.warn(`[RestrictionPolicy] Invalid URL ${url}: ${parsed.error.message}`);
    return { eligible: false, reason: 'malformed' };
  }
  const urlObj = parsed.value;

  if (config.domainRestricted) {
    const seedHosts = getSeedHosts(config.seedUrls);
    if (!seedHosts.has(urlObj.host)) {
      console.debug(`[RestrictionPolicy] Skipping ${url} - host ${urlObj.host} not among seed hosts`);
      return { eligible: false, reason: 'domain' };
    }
  }

  if (config.pathRestricted) {
    const scope = getSeedPathScope(config.seedUrls);
    const segment = firstPathSegment(urlObj);
    if (scope && segment && !scope.has(segment)) {
      console.debug(`[RestrictionPolicy] Skipping ${url} - path segment "${segment}" not among seed paths`);
      return { eligible: false, reason: 'path' };
    }
  }

  for (const pattern of config.exclusionPatterns) {
    if (pattern && url.includes(pattern)) {
      console.debug(`[RestrictionPolicy] Skipping ${url} - matches exclusion pattern "${pattern}"`);
      return { eligible: false, reason: 'excluded' };
    }
  }

  return { eligible: true };
}

/**
 * Boolean form of {@link checkEligibility}
 */
export function isEligible(
  url: string,
  config: PolicyConfig,
  doneUrls: ReadonlySet<string>
): boolean {
  return checkEligibility(url, config, doneUrls).eligible;
}
