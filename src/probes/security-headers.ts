import type { SecurityHeaderName } from '../types/index.js';

export interface SecurityHeaderRule {
  name: SecurityHeaderName;
  label: string;
  remediation: string;
}

// Fixed checklist; the header score is the share of these present
export const SECURITY_HEADER_CHECKLIST: readonly SecurityHeaderRule[] = [
  {
    name: 'strict-transport-security',
    label: 'Strict-Transport-Security',
    remediation: 'Send Strict-Transport-Security with max-age of at least 31536000 and includeSubDomains.',
  },
  {
    name: 'content-security-policy',
    label: 'Content-Security-Policy',
    remediation: 'Define a Content-Security-Policy that restricts script, style and frame sources.',
  },
  {
    name: 'x-frame-options',
    label: 'X-Frame-Options',
    remediation: 'Send X-Frame-Options: DENY or SAMEORIGIN to prevent clickjacking.',
  },
  {
    name: 'x-content-type-options',
    label: 'X-Content-Type-Options',
    remediation: 'Send X-Content-Type-Options: nosniff.',
  },
  {
    name: 'referrer-policy',
    label: 'Referrer-Policy',
    remediation: 'Send Referrer-Policy: strict-origin-when-cross-origin or stricter.',
  },
  {
    name: 'permissions-policy',
    label: 'Permissions-Policy',
    remediation: 'Send a Permissions-Policy that disables unused browser features.',
  },
];

export function emptySecurityHeaders(): Record<SecurityHeaderName, string | null> {
  return {
    'strict-transport-security': null,
    'content-security-policy': null,
    'x-frame-options': null,
    'x-content-type-options': null,
    'referrer-policy': null,
    'permissions-policy': null,
  };
}
