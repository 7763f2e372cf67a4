import type { DetectedService, HttpInfo } from '../types/index.js';

export interface ProductVersion {
  product: string;
  version: number[];
  raw: string;
}

type OutdatedRule = (version: number[]) => boolean;

const PRODUCT_TOKEN = /([A-Za-z][A-Za-z-]*)[/_](\d+(?:\.\d+)*)/g;

function compareVersions(a: number[], b: number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

const below = (limit: number[]): OutdatedRule => (version) => compareVersions(version, limit) < 0;
const atMost = (limit: number[]): OutdatedRule => (version) => compareVersions(version, limit) <= 0;

// Lower-cased product name -> end-of-life or known-vulnerable range
const OUTDATED_RULES: Record<string, OutdatedRule> = {
  nginx: below([1, 18]),
  apache: below([2, 4, 41]),
  php: below([7, 4]),
  openssl: below([1, 1]),
  openssh: below([7, 4]),
  'microsoft-iis': atMost([7, 5]),
};

export function parseProductVersions(technology: string): ProductVersion[] {
  const products: ProductVersion[] = [];
  for (const match of technology.matchAll(PRODUCT_TOKEN)) {
    const [raw, product, version] = match;
    if (!product || !version) continue;
    products.push({
      product: product.toLowerCase(),
      version: version.split('.').map((part) => parseInt(part, 10)),
      raw,
    });
  }
  return products;
}

export function isOutdated(product: ProductVersion): boolean {
  const rule = OUTDATED_RULES[product.product];
  return rule ? rule(product.version) : false;
}

/** Distinct outdated product/version tokens across all technology strings. */
export function countOutdatedSoftware(technologies: readonly string[]): number {
  const outdated = new Set<string>();
  for (const technology of technologies) {
    for (const product of parseProductVersions(technology)) {
      if (isOutdated(product)) {
        outdated.add(`${product.product}/${product.version.join('.')}`);
      }
    }
  }
  return outdated.size;
}

function serviceTechnology(service: DetectedService): string | null {
  if (!service.serviceVersion) return null;
  // "OpenSSH_7.4p1" already names the product; "5.7.33" does not
  return /^[A-Za-z]/.test(service.serviceVersion)
    ? service.serviceVersion
    : `${service.serviceName}/${service.serviceVersion}`;
}

export function collectTechnologies(http: HttpInfo | null, services: readonly DetectedService[]): string[] {
  const technologies: string[] = [];
  const push = (value: string | null): void => {
    const trimmed = value?.trim();
    if (trimmed && !technologies.includes(trimmed)) {
      technologies.push(trimmed);
    }
  };

  if (http) {
    push(http.serverHeader);
    push(http.poweredByHeader);
    push(http.generator);
  }
  for (const service of services) {
    push(serviceTechnology(service));
  }

  return technologies;
}
