/**
 * Restriction Policy Tests
 */

import { checkEligibility, getSeedHosts, getSeedPathScope, isEligible } from '../restriction-policy';
import { CrawlJobConfig } from '../crawling.types';

type PolicyConfig = Pick<
  CrawlJobConfig,
  'seedUrls' | 'domainRestricted' | 'pathRestricted' | 'exclusionPatterns'
>;

const docsConfig: PolicyConfig = {
  seedUrls: ['https://docs.example.com/guide/intro'],
  domainRestricted: true,
  pathRestricted: true,
  exclusionPatterns: [],
};

describe('RestrictionPolicy', () => {
  beforeEach(() => {
    jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('getSeedHosts', () => {
    it('should collect the hosts of parseable seeds', () => {
      const hosts = getSeedHosts(['https://a.com/x', 'https://B.com:8080/', 'nope']);
      expect(Array.from(hosts)).toEqual(['a.com', 'b.com:8080']);
    });
  });

  describe('getSeedPathScope', () => {
    it('should collect first path segments', () => {
      const scope = getSeedPathScope(['https://a.com/docs/x', 'https://a.com/blog']);
      expect(scope && Array.from(scope)).toEqual(['docs', 'blog']);
    });

    it('should be unconstrained when any seed is at the site root', () => {
      expect(getSeedPathScope(['https://a.com/docs/x', 'https://a.com/'])).toBeNull();
    });

    it('should be unconstrained without parseable seeds', () => {
      expect(getSeedPathScope(['nope'])).toBeNull();
    });
  });

  describe('checkEligibility', () => {
    it('should accept a same-host, same-section URL', () => {
      expect(
        checkEligibility('https://docs.example.com/guide/setup', docsConfig, new Set())
      ).toEqual({ eligible: true });
    });

    it('should refuse other hosts when domain restricted', () => {
      expect(checkEligibility('https://other.com/x', docsConfig, new Set())).toEqual({
        eligible: false,
        reason: 'domain',
      });
    });

    it('should refuse a different port of the seed host', () => {
      const config = { ...docsConfig, pathRestricted: false };
      expect(
        checkEligibility('https://docs.example.com:8080/guide/x', config, new Set())
      ).toEqual({ eligible: false, reason: 'domain' });
    });

    it('should refuse other first path segments when path restricted', () => {
      expect(
        checkEligibility('https://docs.example.com/api/ref', docsConfig, new Set())
      ).toEqual({ eligible: false, reason: 'path' });
    });

    it('should let a URL without path segments through the path check', () => {
      expect(checkEligibility('https://docs.example.com', docsConfig, new Set())).toEqual({
        eligible: true,
      });
    });

    it('should refuse URLs already done before any other check', () => {
      const done = new Set(['https://other.com/x']);
      expect(checkEligibility('https://other.com/x', docsConfig, done)).toEqual({
        eligible: false,
        reason: 'already-done',
      });
    });

    it('should refuse URLs containing an exclusion pattern', () => {
      const config = { ...docsConfig, exclusionPatterns: ['/private'] };
      expect(
        checkEligibility('https://docs.example.com/guide/private/keys', config, new Set())
      ).toEqual({ eligible: false, reason: 'excluded' });
    });

    it('should ignore empty exclusion patterns', () => {
      const config = { ...docsConfig, exclusionPatterns: [''] };
      expect(isEligible('https://docs.example.com/guide/setup', config, new Set())).toBe(true);
    });

    it('should refuse malformed URLs', () => {
      expect(checkEligibility('not a url', docsConfig, new Set())).toEqual({
        eligible: false,
        reason: 'malformed',
      });
    });

    it('should allow any host when not domain restricted', () => {
      const config = { ...docsConfig, domainRestricted: false };
      expect(isEligible('https://other.com/guide/x', config, new Set())).toBe(true);
      expect(checkEligibility('https://other.com/api', config, new Set())).toEqual({
        eligible: false,
        reason: 'path',
      });
    });

    it('should allow any path when not path restricted', () => {
      const config = { ...docsConfig, pathRestricted: false };
      expect(isEligible('https://docs.example.com/api/ref', config, new Set())).toBe(true);
    });

    it('should allow every path under a root seed', () => {
      const config = { ...docsConfig, seedUrls: ['https://a.com/'] };
      expect(isEligible('https://a.com/anything/below', config, new Set())).toBe(true);
    });

    it('should accept hosts and sections from any seed', () => {
      const config = {
        ...docsConfig,
        seedUrls: ['https://a.com/docs/x', 'https://b.com/blog'],
      };
      expect(isEligible('https://b.com/docs/y', config, new Set())).toBe(true);
      expect(isEligible('https://a.com/blog/post', config, new Set())).toBe(true);
      expect(isEligible('https://a.com/shop', config, new Set())).toBe(false);
    });
  });
});
