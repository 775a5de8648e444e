/**
 * Normalise a zone name as typed into the environment.
 *
 * Examples:
 * - `example.com` → `example.com`
 * - `https://example.com/path` → `example.com`
 * - `EXAMPLE.COM.` → `example.com`
 *
 * Empty input stays empty; the provider reports it.
 */
export function cleanDomain(input: string): string {
  let domain = input.trim().toLowerCase();

  // Extract hostname from URL
  if (domain.includes('://')) {
    try {
      domain = new URL(domain).hostname;
    } catch {
      // If URL parsing fails, strip protocol manually
      domain = domain.split('://')[1]?.split('/')[0] ?? domain;
    }
  }

  // Remove path, query, fragment if present (non-URL input with path)
  domain = domain.split('/')[0] ?? '';

  // Remove trailing dot (FQDN notation)
  if (domain.endsWith('.')) {
    domain = domain.slice(0, -1);
  }

  return domain;
}
