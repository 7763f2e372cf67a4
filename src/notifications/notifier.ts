import type winston from 'winston';
import { createLogger } from '../utils/logger.js';
import type { AssetType } from '../types/index.js';

export interface CriticalAssetSummary {
  assetValue: string;
  assetType: AssetType;
  score: number;
  riskFactors: string[];
}

/** Best-effort alert channel; a failure here never affects the scan. */
export interface Notifier {
  notifyHighRisk(owner: string, scanId: string, assets: readonly CriticalAssetSummary[]): Promise<void>;
}

export class LogNotifier implements Notifier {
  private readonly logger: winston.Logger;

  constructor(logger?: winston.Logger) {
    this.logger = logger ?? createLogger({ name: 'notifier' });
  }

  async notifyHighRisk(owner: string, scanId: string, assets: readonly CriticalAssetSummary[]): Promise<void> {
    for (const asset of assets) {
      const factors = asset.riskFactors.length > 0 ? asset.riskFactors.join(', ') : 'none recorded';
      this.logger.warn(`Critical asset for ${owner}: ${asset.assetValue} (${asset.assetType}) scored ${asset.score}; factors: ${factors}`, {
        scanId,
      });
    }
  }
}
