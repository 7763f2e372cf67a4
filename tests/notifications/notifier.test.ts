import { describe, it, expect, vi } from 'vitest';
import { LogNotifier } from '../../src/notifications/notifier.js';
import { createLogger } from '../../src/utils/logger.js';

describe('LogNotifier', () => {
  it('writes one warning per critical asset', async () => {
    const logger = createLogger({ name: 'test', level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');

    await new LogNotifier(logger).notifyHighRisk('team-a', 'scan-1', [
      { assetValue: '192.0.2.1', assetType: 'ip_address', score: 91, riskFactors: ['open_port_3389_rdp', 'exposed_database'] },
      { assetValue: 'example.com', assetType: 'domain', score: 88, riskFactors: [] },
    ]);

    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenNthCalledWith(
      1,
      'Critical asset for team-a: 192.0.2.1 (ip_address) scored 91; factors: open_port_3389_rdp, exposed_database',
      { scanId: 'scan-1' }
    );
    expect(warn).toHaveBeenNthCalledWith(
      2,
      'Critical asset for team-a: example.com (domain) scored 88; factors: none recorded',
      { scanId: 'scan-1' }
    );
  });
});
