import { hostForUrl } from '../utils/domain.js';
import type { EnrichedAsset, HttpInfo } from '../types/index.js';

/**
 * Origin to probe for path-based checks: the scheme the HTTP probe ended up
 * on, always against the asset's own host.
 */
export function webOriginOf(asset: EnrichedAsset): string | null {
  if (!asset.httpInfo.success) return null;
  return originFor(asset.assetValue, asset.httpInfo.data);
}

export function originFor(host: string, http: HttpInfo): string {
  return `${http.scheme}://${hostForUrl(host)}`;
}
