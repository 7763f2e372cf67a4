import fs from 'fs';
import { fileURLToPath } from 'url';

export const DEFAULT_WORDLIST_PATH = fileURLToPath(new URL('../../data/subdomain-wordlist.txt', import.meta.url));

const LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

export function parseWordlist(text: string): string[] {
  const labels = new Set<string>();
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim().toLowerCase();
    if (!line || line.startsWith('#')) continue;
    if (LABEL.test(line)) labels.add(line);
  }
  return [...labels];
}

export function loadWordlist(path: string = DEFAULT_WORDLIST_PATH): string[] {
  return parseWordlist(fs.readFileSync(path, 'utf8'));
}
