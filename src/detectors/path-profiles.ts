// Paths probed by the web-exposure detectors

// Any of these served back is a leak
export const SENSITIVE_FILE_PATHS: readonly string[] = [
  '.env',
  '.git/config',
  '.git/HEAD',
  '.DS_Store',
  'backup.zip',
  'backup.sql',
  'config.php',
  'wp-config.php',
  '.htaccess',
  '.htpasswd',
  'phpinfo.php',
];

// Directories that commonly end up with autoindex switched on
export const DIRECTORY_LISTING_PATHS: readonly string[] = [
  '/',
  '/uploads/',
  '/images/',
  '/files/',
  '/assets/',
  '/backup/',
  '/admin/',
  '/api/',
  '/public/',
  '/static/',
  '/media/',
  '/downloads/',
  '/docs/',
  '/data/',
];

const SENSITIVE_EXTENSIONS = [
  '.sql', '.db', '.sqlite', '.bak', '.backup',
  '.env', '.config', '.conf', '.key', '.pem',
  '.log', '.zip', '.tar', '.gz', '.rar',
];

const SENSITIVE_KEYWORDS = [
  'password', 'secret', 'private', 'backup',
  'config', 'database', 'admin', 'credential',
];

export function isSensitiveFileName(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return SENSITIVE_EXTENSIONS.some((ext) => lower.endsWith(ext))
    || SENSITIVE_KEYWORDS.some((keyword) => lower.includes(keyword));
}

export function generateBaselinePath(random: () => number = Math.random): string {
  const chars = 'abcdefghijklmnopqrstuvwxyz0123456789';
  let path = '';
  for (let i = 0; i < 16; i++) {
    path += chars[Math.floor(random() * chars.length)];
  }
  return `${path}-not-a-real-path`;
}
