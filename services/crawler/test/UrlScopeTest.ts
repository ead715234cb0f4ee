import { describe, it, expect } from 'vitest';
import { hostOf, isInScope, normalizeUrl, resolveUrl } from '../UrlScope.js';

describe('UrlScope', () => {
  describe('normalizeUrl', () => {
    it('adds the root path to bare origins', () => {
      expect(normalizeUrl('https://example.com')).toBe('https://example.com/');
    });

    it('drops fragments', () => {
      expect(normalizeUrl('https://example.com/page#section')).toBe('https://example.com/page');
    });

    it('keeps query strings', () => {
      expect(normalizeUrl('https://example.com/search?q=a')).toBe('https://example.com/search?q=a');
    });

    it('returns null for relative or invalid input', () => {
      expect(normalizeUrl('/about')).toBeNull();
      expect(normalizeUrl('not a url')).toBeNull();
    });
  });

  describe('resolveUrl', () => {
    it('resolves root-relative links', () => {
      expect(resolveUrl('https://example.com', '/about')).toBe('https://example.com/about');
    });

    it('resolves path-relative links against the base directory', () => {
      expect(resolveUrl('https://example.com/docs/', 'intro')).toBe('https://example.com/docs/intro');
      expect(resolveUrl('https://example.com/docs', 'intro')).toBe('https://example.com/intro');
    });

    it('keeps absolute links', () => {
      expect(resolveUrl('https://example.com/', 'https://www.external.com/a')).toBe('https://www.external.com/a');
    });

    it('strips the fragment of the result', () => {
      expect(resolveUrl('https://example.com/page', '#top')).toBe('https://example.com/page');
    });

    it('returns null for links that cannot be resolved', () => {
      expect(resolveUrl('https://example.com/', 'http://[broken')).toBeNull();
    });
  });

  describe('hostOf', () => {
    it('includes a non-default port', () => {
      expect(hostOf('http://localhost:8080/x')).toBe('localhost:8080');
    });

    it('omits the default port', () => {
      expect(hostOf('https://example.com:443/x')).toBe('example.com');
    });

    it('is empty for URLs without a host', () => {
      expect(hostOf('mailto:someone@example.com')).toBe('');
      expect(hostOf('garbage')).toBe('');
    });
  });

  describe('isInScope', () => {
    it('compares hosts when there is no scope base', () => {
      expect(isInScope('https://example.com/about', 'https://example.com/')).toBe(true);
      expect(isInScope('https://www.example.com/about', 'https://example.com/')).toBe(false);
      expect(isInScope('https://example.com:8443/about', 'https://example.com/')).toBe(false);
    });

    it('rejects host-less links when there is no scope base', () => {
      expect(isInScope('mailto:someone@example.com', 'https://example.com/')).toBe(false);
    });

    it('uses a literal prefix test with a scope base', () => {
      expect(isInScope('https://example.com/docs/a', 'https://example.com/', 'https://example.com/docs/')).toBe(true);
      expect(isInScope('https://example.com/blog', 'https://example.com/docs/', 'https://example.com/docs/')).toBe(false);
    });

    it('admits hosts that extend the scope base string', () => {
      expect(isInScope('https://example.com.evil.com/', 'https://example.com/', 'https://example.com')).toBe(true);
    });
  });
});
