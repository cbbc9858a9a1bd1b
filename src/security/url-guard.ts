/**
 * Outbound URL guard.
 *
 * Callback URLs and attachment locators come from the caller, so requests to
 * them must not reach internal services (cloud metadata endpoints, loopback
 * admin APIs, RFC 1918 hosts). This does not resolve DNS; it rejects literal
 * addresses and well-known internal host names only.
 */

/**
 * Validate that a URL is safe to send HTTP requests to.
 * Returns an error message if the URL is unsafe, or null if safe.
 */
export function validatePublicUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `Invalid URL: ${url}`;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return `URL must use http or https protocol, got: ${parsed.protocol}`;
  }

  const hostname = parsed.hostname.toLowerCase().replace(/^\[|\]$/g, '');

  if (hostname === 'localhost' || hostname.endsWith('.localhost') || hostname === '127.0.0.1' || hostname === '::1') {
    return `URL must not point to localhost: ${hostname}`;
  }

  if (hostname === '::') {
    return `URL must not point to unspecified address: ${hostname}`;
  }

  // IPv4-mapped IPv6 literals are checked as the IPv4 address they carry.
  const ipv4 = embeddedIpv4(hostname) ?? hostname;

  if (ipv4 === '169.254.169.254' || hostname === 'metadata.google.internal') {
    return `URL must not point to cloud metadata endpoints: ${hostname}`;
  }

  const ipv4Match = ipv4.match(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/);
  if (ipv4Match) {
    const a = Number(ipv4Match[1]);
    const b = Number(ipv4Match[2]);
    if (a === 10) return `URL must not point to private IP range: ${hostname}`;
    if (a === 172 && b >= 16 && b <= 31) return `URL must not point to private IP range: ${hostname}`;
    if (a === 192 && b === 168) return `URL must not point to private IP range: ${hostname}`;
    if (a === 127) return `URL must not point to loopback range: ${hostname}`;
    if (a === 169 && b === 254) return `URL must not point to link-local range: ${hostname}`;
    if (a === 0) return `URL must not point to unspecified address: ${hostname}`;
  }

  // IPv6 unique-local (fc00::/7) and link-local (fe80::/10)
  if (/^f[cd][0-9a-f]{2}:/.test(hostname) || /^fe[89ab][0-9a-f]:/.test(hostname)) {
    return `URL must not point to private IPv6 range: ${hostname}`;
  }

  return null;
}

/**
 * Dotted IPv4 form of an IPv4-mapped IPv6 literal (`::ffff:7f00:1` or
 * `::ffff:127.0.0.1`), or null for any other host.
 */
export function embeddedIpv4(hostname: string): string | null {
  const dotted = hostname.match(/^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/);
  if (dotted) return dotted[1];

  const hex = hostname.match(/^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/);
  if (!hex) return null;
  const high = parseInt(hex[1], 16);
  const low = parseInt(hex[2], 16);
  return [high >> 8, high & 0xff, low >> 8, low & 0xff].join('.');
}
