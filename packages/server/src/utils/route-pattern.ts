/**
 * Method and path template; `{name}` matches one non-empty segment
 */
export interface RouteRule {
  method: string;
  path: string;
}

function segments(path: string): string[] {
  return path.split('/').filter(segment => segment.length > 0);
}

export function matchesRoutePattern(pattern: string, path: string): boolean {
  const expected = segments(pattern);
  const actual = segments(path);

  if (expected.length !== actual.length) {
    return false;
  }

  return expected.every((segment, index) =>
    /^\{[^/{}]+\}$/.test(segment) ? actual[index] !== '' : segment === actual[index]
  );
}

export function isListedRoute(rules: readonly RouteRule[], method: string, path: string): boolean {
  const upper = method.toUpperCase();
  return rules.some(rule => rule.method === upper && matchesRoutePattern(rule.path, path));
}
