import tls from 'tls';
import { ConcurrencyLimiter } from '../utils/concurrency.js';
import { isIpAddress } from '../utils/domain.js';
import { ProbeUnavailableError } from '../errors.js';
import type { TlsInfo } from '../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface TlsProber {
  inspect(host: string, port?: number): Promise<TlsInfo>;
}

export interface TlsProbeOptions {
  timeout?: number | undefined;
  maxConcurrent?: number | undefined;
}

function formatDistinguishedName(name: tls.Certificate | undefined): string {
  if (!name) return '';
  return Object.entries(name)
    .filter(([, value]) => value !== undefined && value !== '')
    .map(([key, value]) => `${key}=${Array.isArray(value) ? value.join('+') : String(value)}`)
    .join(', ');
}

function parseSubjectAltNames(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.startsWith('DNS:') || entry.startsWith('IP Address:'))
    .map((entry) => entry.substring(entry.indexOf(':') + 1));
}

export function parseCertificate(
  cert: tls.PeerCertificate,
  authorized: boolean,
  protocol: string | null,
  now: Date = new Date()
): TlsInfo {
  const notAfter = new Date(cert.valid_to);
  if (Number.isNaN(notAfter.getTime())) {
    throw new ProbeUnavailableError('tls', `unparseable certificate expiry "${cert.valid_to}"`);
  }

  const subject = formatDistinguishedName(cert.subject);
  const issuer = formatDistinguishedName(cert.issuer);
  const daysUntilExpiry = Math.floor((notAfter.getTime() - now.getTime()) / DAY_MS);

  return {
    issuer,
    subject,
    notAfter: notAfter.toISOString(),
    daysUntilExpiry,
    selfSigned: subject === issuer,
    valid: authorized && daysUntilExpiry >= 0,
    protocol,
    subjectAltNames: parseSubjectAltNames(cert.subjectaltname),
  };
}

export class TlsProbe implements TlsProber {
  private readonly timeout: number;
  private readonly limiter: ConcurrencyLimiter;

  constructor(options: TlsProbeOptions = {}) {
    this.timeout = options.timeout ?? 8000;
    this.limiter = new ConcurrencyLimiter(options.maxConcurrent ?? 20);
  }

  inspect(host: string, port = 443): Promise<TlsInfo> {
    return this.limiter.run(() => this.handshake(host, port));
  }

  private handshake(host: string, port: number): Promise<TlsInfo> {
    return new Promise((resolve, reject) => {
      const socket = tls.connect({
        host,
        port,
        // SNI is not allowed for IP literals
        ...(isIpAddress(host) ? {} : { servername: host }),
        rejectUnauthorized: false,
        timeout: this.timeout,
      });

      socket.once('secureConnect', () => {
        try {
          const cert = socket.getPeerCertificate();
          if (!cert || Object.keys(cert).length === 0) {
            reject(new ProbeUnavailableError('tls', `${host}:${port} presented no certificate`));
            return;
          }
          resolve(parseCertificate(cert, socket.authorized, socket.getProtocol()));
        } catch (error) {
          reject(error);
        } finally {
          socket.destroy();
        }
      });

      socket.once('timeout', () => {
        socket.destroy();
        reject(new ProbeUnavailableError('tls', `handshake with ${host}:${port} timed out`));
      });

      socket.once('error', (err) => {
        socket.destroy();
        reject(new ProbeUnavailableError('tls', err.message));
      });
    });
  }
}
