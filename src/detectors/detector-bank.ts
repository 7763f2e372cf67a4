import type winston from 'winston';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { DetectorSkippedError, describeError } from '../errors.js';
import type { Detector, EnrichedAsset, Finding } from '../types/index.js';

export interface DetectorBankOptions {
  timeout: number;
  logger?: winston.Logger | undefined;
}

/**
 * Runs every registered detector against one asset. A detector that throws,
 * skips or overruns its budget contributes no findings; the others still count.
 */
export class DetectorBank {
  private readonly detectors: readonly Detector[];
  private readonly timeout: number;
  private readonly logger: winston.Logger;

  constructor(detectors: readonly Detector[], options: DetectorBankOptions) {
    this.detectors = detectors;
    this.timeout = options.timeout;
    this.logger = options.logger ?? createLogger({ name: 'detectors' });
  }

  get detectorNames(): string[] {
    return this.detectors.map((detector) => detector.name);
  }

  async run(asset: EnrichedAsset): Promise<Finding[]> {
    const settled = await Promise.allSettled(
      this.detectors.map((detector) =>
        withTimeout(Promise.resolve().then(() => detector.detect(asset)), this.timeout, `detector ${detector.name}`)
      )
    );

    const findings: Finding[] = [];

    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        findings.push(...outcome.value);
        return;
      }

      const name = this.detectors[index]?.name ?? 'unknown';
      if (outcome.reason instanceof DetectorSkippedError) {
        this.logger.debug(`${describeError(outcome.reason)} for ${asset.assetValue}`);
      } else {
        this.logger.warn(`Detector ${name} failed on ${asset.assetValue}: ${describeError(outcome.reason)}`);
      }
    });

    return findings;
  }
}
