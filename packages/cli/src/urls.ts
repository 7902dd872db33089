/**
 * The marketplace indexes domains without their scheme.
 *
 * "https://example.com/a" → "example.com/a"
 */
export function stripScheme(url: string): string {
  return url.trim().replace(/^[a-z][a-z0-9+.-]*:\/\//i, "");
}
