import path from 'path';

// Repository root: two levels above this file in both src/config and dist/config.
export const REPO_ROOT = path.resolve(__dirname, '..', '..');

export const ATTACK_SOURCE_NAME = 'mitre-attack';
export const ATTACK_BASE_URL = 'https://attack.mitre.org';

export const TECHNIQUE_URLS_FILENAME = 'mitre_technique_urls.txt';
export const MITIGATION_URLS_FILENAME = 'mitre_mitigation_urls.txt';

// Directory names not descended into when scanning the default repository root.
export const SCAN_SKIP_DIRS: readonly string[] = ['node_modules', '.git'];

export const HARVEST_DEFAULTS = {
  outputDir: 'text_outputs',
  workers: 3,
  timeoutMs: 30000,
  waitSeconds: 0.5,
  selector: '#v-attckmatrix > .row',
  headless: true,
  viewport: { width: 1280, height: 1024 },
} as const;

// Sanitized filename length cap, excluding the .txt suffix.
export const MAX_FILENAME_LENGTH = 180;

export function defaultUrlListFiles(repoRoot: string = REPO_ROOT): string[] {
  return [
    path.join(repoRoot, TECHNIQUE_URLS_FILENAME),
    path.join(repoRoot, MITIGATION_URLS_FILENAME),
  ];
}
