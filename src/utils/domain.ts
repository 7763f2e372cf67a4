import net from 'net';

const HOSTNAME_LABEL = /^(?!-)[a-z0-9-]{1,63}(?<!-)$/;

export function normalizeHostname(input: string): string {
  return input.trim().toLowerCase().replace(/\.$/, '');
}

export function isIpAddress(value: string): boolean {
  return net.isIP(value) !== 0;
}

export function isValidHostname(hostname: string): boolean {
  if (!hostname || hostname.length > 253) return false;
  if (isIpAddress(hostname)) return false;

  const labels = hostname.split('.');
  if (labels.length < 2) return false;

  return labels.every((label) => HOSTNAME_LABEL.test(label));
}

/**
 * Normalises a certificate-transparency or brute-force name and keeps it only
 * if it is a proper subdomain of `root`.
 */
export function toSubdomainOf(candidate: string, root: string): string | null {
  let name = normalizeHostname(candidate);
  if (name.startsWith('*.')) {
    name = name.substring(2);
  }
  if (name === root || !name.endsWith(`.${root}`)) return null;
  return isValidHostname(name) ? name : null;
}

export function firstLabel(domain: string): string {
  return domain.split('.')[0] ?? domain;
}

/** Host part for a URL; IPv6 literals need brackets. */
export function hostForUrl(host: string): string {
  return net.isIPv6(host) ? `[${host}]` : host;
}
