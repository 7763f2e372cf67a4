import net from 'net';
import { ServiceDetector } from './service-detector.js';
import { ConcurrencyLimiter } from '../utils/concurrency.js';
import type { PortProbeData, PortScanResult, PortState, TcpProbeOptions } from '../types/probe.js';

export interface PortProber {
  scanPorts(host: string, ports: readonly number[]): Promise<PortProbeData>;
}

/**
 * Plain connect scan. An open port gets a short passive read so services that
 * greet first (SSH, FTP, SMTP, MySQL) can be fingerprinted without sending
 * anything.
 */
export class TcpProbe implements PortProber {
  private readonly timeout: number;
  private readonly bannerTimeout: number;
  private readonly limiter: ConcurrencyLimiter;
  private readonly serviceDetector: ServiceDetector;

  constructor(options: TcpProbeOptions = {}, limiter?: ConcurrencyLimiter) {
    this.timeout = options.timeout ?? 3000;
    this.bannerTimeout = options.bannerTimeout ?? 1500;
    this.limiter = limiter ?? new ConcurrencyLimiter(options.maxConcurrent ?? 100);
    this.serviceDetector = new ServiceDetector();
  }

  scanPort(host: string, port: number): Promise<PortScanResult> {
    return this.limiter.run(() => this.connect(host, port));
  }

  async scanPorts(host: string, ports: readonly number[]): Promise<PortProbeData> {
    const results = await this.limiter.map(ports, (port) => this.connect(host, port));

    const open = results.filter((r) => r.state === 'open');
    const services = this.serviceDetector.detectAll(open.map((r) => ({ port: r.port, banner: r.banner })));

    return {
      openPorts: open.map((r) => r.port).sort((a, b) => a - b),
      services,
    };
  }

  private connect(host: string, port: number): Promise<PortScanResult> {
    return new Promise((resolve) => {
      const startTime = Date.now();
      const socket = new net.Socket();
      let settled = false;
      let connected = false;
      let banner = '';
      let bannerTimer: ReturnType<typeof setTimeout> | null = null;

      const finish = (state: PortState): void => {
        if (settled) return;
        settled = true;
        if (bannerTimer) clearTimeout(bannerTimer);
        socket.destroy();
        resolve({
          port,
          state,
          responseTimeMs: Date.now() - startTime,
          banner: banner.length > 0 ? banner : null,
        });
      };

      socket.setTimeout(this.timeout);

      socket.on('connect', () => {
        connected = true;
        socket.setTimeout(0);
        bannerTimer = setTimeout(() => finish('open'), this.bannerTimeout);
      });

      socket.on('data', (chunk: Buffer) => {
        banner += chunk.toString('latin1');
        if (banner.length >= 256 || banner.includes('\n')) {
          finish('open');
        }
      });

      socket.on('timeout', () => finish(connected ? 'open' : 'timeout'));

      socket.on('error', (err: NodeJS.ErrnoException) => {
        if (connected) {
          finish('open');
        } else if (err.code === 'ECONNREFUSED') {
          finish('closed');
        } else {
          finish('filtered');
        }
      });

      socket.on('close', () => finish(connected ? 'open' : 'closed'));

      socket.connect(port, host);
    });
  }
}
