export { EnrichmentCoordinator, notApplicable, dataOf } from './enrichment-coordinator.js';
export type { EnrichmentProbes, EnrichmentOptions } from './enrichment-coordinator.js';
export {
  collectTechnologies,
  countOutdatedSoftware,
  parseProductVersions,
  isOutdated,
} from './technology-detector.js';
export type { ProductVersion } from './technology-detector.js';
