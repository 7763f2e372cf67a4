import type { DetectedService, ServiceSignature } from '../types/probe.js';

// Signatures for banners read passively after a successful connect
const SERVICE_SIGNATURES: ServiceSignature[] = [
  {
    name: 'ssh',
    patterns: [/^SSH-[\d.]+/i],
    ports: [22, 2222],
    versionExtractor: /^SSH-[\d.]+-(\S+)/,
  },
  {
    name: 'ftp',
    patterns: [/^220[\s-].*FTP/i, /vsftpd/i, /ProFTPD/i, /FileZilla Server/i],
    ports: [21],
    versionExtractor: /(vsftpd\s+[\d.]+)|(ProFTPD\s+[\d.]+)|(FileZilla Server\s+[\d.]+)/i,
  },
  {
    name: 'smtp',
    patterns: [/^220[\s-].*SMTP/i, /^220[\s-].*ESMTP/i, /Postfix/i, /Exim/i, /Sendmail/i],
    ports: [25, 465, 587],
    versionExtractor: /(Exim\s+[\d.]+)|(Sendmail\s+[\d.]+)/i,
  },
  {
    name: 'http',
    patterns: [/^HTTP\/[\d.]+/i, /Server:/i],
    ports: [80, 443, 8080, 8443],
    versionExtractor: /Server:\s*([^\r\n]+)/i,
  },
  {
    name: 'mysql',
    patterns: [/mysql_native_password/i, /MariaDB/i, /\d+\.\d+\.\d+-(?:log|MariaDB)/i],
    ports: [3306],
    versionExtractor: /(\d+\.\d+\.\d+-MariaDB)|(\d+\.\d+\.\d+)/i,
  },
  {
    name: 'postgresql',
    patterns: [/PostgreSQL/i, /pg_hba\.conf/i],
    ports: [5432],
    versionExtractor: /(PostgreSQL\s+[\d.]+)/i,
  },
  {
    name: 'redis',
    patterns: [/^-NOAUTH/i, /^-ERR/i, /redis_version/i],
    ports: [6379],
    versionExtractor: /redis_version:([\d.]+)/i,
  },
  {
    name: 'telnet',
    patterns: [/\xff[\xfb-\xfe]/, /login:/i],
    ports: [23],
  },
  {
    name: 'imap',
    patterns: [/^\*\s+OK.*IMAP/i, /Dovecot/i],
    ports: [143, 993],
  },
  {
    name: 'pop3',
    patterns: [/^\+OK\s+/i],
    ports: [110, 995],
  },
];

export class ServiceDetector {
  private readonly signatures: ServiceSignature[];

  constructor(customSignatures?: ServiceSignature[]) {
    this.signatures = customSignatures ?? SERVICE_SIGNATURES;
  }

  detect(port: number, banner: string | null): DetectedService | null {
    if (!banner || banner.trim().length === 0) {
      return null;
    }

    let bestMatch: DetectedService | null = null;
    let bestConfidence = 0;

    for (const sig of this.signatures) {
      const confidence = this.calculateConfidence(port, banner, sig);

      if (confidence > bestConfidence) {
        bestConfidence = confidence;
        bestMatch = {
          port,
          serviceName: sig.name,
          serviceVersion: this.extractVersion(banner, sig),
          confidence,
          rawBanner: banner.substring(0, 256),
        };
      }
    }

    // A port match alone is not enough
    if (bestMatch && bestConfidence >= 40) {
      return bestMatch;
    }

    return null;
  }

  detectAll(results: Array<{ port: number; banner: string | null }>): DetectedService[] {
    const services: DetectedService[] = [];

    for (const result of results) {
      const service = this.detect(result.port, result.banner);
      if (service) {
        services.push(service);
      }
    }

    return services;
  }

  private calculateConfidence(port: number, banner: string, sig: ServiceSignature): number {
    let confidence = 0;

    if (sig.ports.includes(port)) {
      confidence += 30;
    }

    if (sig.patterns.some((pattern) => pattern.test(banner))) {
      confidence += 40;
    }

    if (sig.versionExtractor && sig.versionExtractor.test(banner)) {
      confidence += 20;
    }

    return Math.min(confidence, 100);
  }

  private extractVersion(banner: string, sig: ServiceSignature): string | null {
    if (!sig.versionExtractor) {
      return null;
    }

    const match = banner.match(sig.versionExtractor);
    if (!match) {
      return null;
    }

    // First non-empty capture group
    for (const group of match.slice(1)) {
      if (group) {
        return group.trim();
      }
    }

    return null;
  }
}
