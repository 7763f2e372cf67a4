// Candidate ports for the connect scan, grouped by what an exposure means

export type PortCategory = 'file' | 'remote' | 'mail' | 'web' | 'database';

export const PORT_CATEGORIES: Record<PortCategory, number[]> = {
  file: [21, 445],
  remote: [22, 23, 3389],
  mail: [25, 110, 143, 993, 995],
  web: [80, 443, 8080, 8443],
  database: [1433, 3306, 5432, 6379, 27017],
};

const PORT_CATEGORY_ORDER: PortCategory[] = ['file', 'remote', 'mail', 'web', 'database'];

export const CANDIDATE_PORTS: number[] = Object.values(PORT_CATEGORIES)
  .flat()
  .sort((a, b) => a - b);

export const SSH_PORT = 22;
export const RDP_PORT = 3389;
export const DATABASE_PORTS: readonly number[] = PORT_CATEGORIES.database;

export function getPortCategory(port: number): PortCategory | null {
  for (const category of PORT_CATEGORY_ORDER) {
    if (PORT_CATEGORIES[category].includes(port)) {
      return category;
    }
  }
  return null;
}
