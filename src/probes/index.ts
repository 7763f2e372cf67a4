export { ProbeHttpClient, normalizeHeaders } from './http-client.js';
export type { HttpFetcher } from './http-client.js';
export { DnsProbe } from './dns-probe.js';
export type { DnsLookup, DnsProbeOptions } from './dns-probe.js';
export { TlsProbe, parseCertificate } from './tls-probe.js';
export type { TlsProber, TlsProbeOptions } from './tls-probe.js';
export { HttpProbe, toHttpInfo, extractGenerator } from './http-probe.js';
export type { HttpProber } from './http-probe.js';
export { TcpProbe } from './tcp-probe.js';
export type { PortProber } from './tcp-probe.js';
export { CtLogProbe, parseCtNames } from './ct-log-probe.js';
export type { CertificateTransparencySource } from './ct-log-probe.js';
export { BreachProbe } from './breach-probe.js';
export type { BreachLookup, BreachProbeOptions } from './breach-probe.js';
export { ServiceDetector } from './service-detector.js';
export { SECURITY_HEADER_CHECKLIST, emptySecurityHeaders } from './security-headers.js';
export type { SecurityHeaderRule } from './security-headers.js';
export * from './port-profiles.js';
