import { describe, it, expect } from 'vitest';
import { fingerprint, jaccard } from '../src/evolution/fingerprint.js';

const LOGIN_HTML = `
  <form>
    <input type="email" name="user_email" placeholder="Email address">
    <input type='password' id="pwd" autocomplete="current-password">
    <button type="submit" aria-label="Sign in">Go</button>
  </form>`;

describe('fingerprint', () => {
  it('is deterministic', () => {
    expect(fingerprint('https://example.com/login', LOGIN_HTML)).toEqual(
      fingerprint('https://example.com/login', LOGIN_HTML),
    );
  });

  it('collects url and whitelisted attribute tokens', () => {
    expect(fingerprint('https://Example.com/login', LOGIN_HTML)).toEqual({
      version: 1,
      domain: 'example.com',
      path: '/login',
      tokens: ['address', 'com', 'current', 'email', 'example', 'in', 'login', 'password', 'pwd', 'sign', 'submit', 'user'],
    });
  });

  it('ignores attributes outside the whitelist and button-only exclusions', () => {
    const fp = fingerprint('https://a.io', '<input class="fancy" data-x="y"><button placeholder="nope">');
    expect(fp.tokens).toEqual(['a', 'io']);
    expect(fp.path).toBe('/');
  });

  it('tolerates a missing or invalid url', () => {
    expect(fingerprint(undefined, '<input name="q">')).toEqual({ version: 1, domain: '', path: '/', tokens: ['q'] });
    expect(fingerprint('not a url', '').domain).toBe('');
  });
});

describe('jaccard', () => {
  it('divides the intersection by the union', () => {
    expect(jaccard(['a', 'b', 'c'], ['b', 'c', 'd'])).toBe(0.5);
  });

  it('is 0 for two empty sets', () => {
    expect(jaccard([], [])).toBe(0);
  });
});
