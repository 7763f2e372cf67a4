export { AssetDiscoverer } from './asset-discoverer.js';
export type { AssetDiscovererOptions, SubdomainCandidates } from './asset-discoverer.js';
export { loadWordlist, parseWordlist, DEFAULT_WORDLIST_PATH } from './wordlist.js';
