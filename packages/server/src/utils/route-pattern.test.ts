import { describe, it, expect } from 'vitest';
import { isListedRoute, matchesRoutePattern } from './route-pattern.js';

describe('matchesRoutePattern', () => {
  it('matches literal paths exactly', () => {
    expect(matchesRoutePattern('/token', '/token')).toBe(true);
    expect(matchesRoutePattern('/token', '/token/refresh')).toBe(false);
  });

  it('matches a placeholder against one segment', () => {
    expect(matchesRoutePattern('/users/verify-email/{token}', '/users/verify-email/abc-123')).toBe(true);
    expect(matchesRoutePattern('/users/verify-email/{token}', '/users/verify-email')).toBe(false);
    expect(matchesRoutePattern('/users/verify-email/{token}', '/users/verify-email/a/b')).toBe(false);
  });

  it('ignores a trailing slash', () => {
    expect(matchesRoutePattern('/notes', '/notes/')).toBe(true);
  });
});

describe('isListedRoute', () => {
  const rules = [
    { method: 'POST', path: '/users' },
    { method: 'GET', path: '/notes/{id}' },
  ];

  it('requires the method to match', () => {
    expect(isListedRoute(rules, 'post', '/users')).toBe(true);
    expect(isListedRoute(rules, 'GET', '/users')).toBe(false);
    expect(isListedRoute(rules, 'GET', '/notes/5')).toBe(true);
    expect(isListedRoute(rules, 'DELETE', '/notes/5')).toBe(false);
  });
});
