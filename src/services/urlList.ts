import fs from 'fs';
import path from 'path';
import { defaultUrlListFiles, REPO_ROOT } from '../config/pipelineDefaults';
import { atomicWriteLines } from './atomicFs';
import { fail } from './errors';
import { logDebug, logWarn } from './logger';

export function stripTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}

/** Final path segment of a URL, e.g. T1548 for .../techniques/T1548/. */
export function urlSortKey(url: string): string {
  const segments = stripTrailingSlashes(url).split('/');
  return segments[segments.length - 1];
}

// Code-unit ordering; localeCompare would make output depend on the host locale.
function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareUrls(a: string, b: string): number {
  return compareStrings(urlSortKey(a), urlSortKey(b)) || compareStrings(a, b);
}

/**
 * Canonical, deterministic list form of a URL set: trailing slashes stripped,
 * duplicates removed, ordered by identifier segment then by full URL.
 */
export function formatUrlList(urls: Iterable<string>): string[] {
  const canonical = new Set<string>();
  for(const u of urls){
    const c = stripTrailingSlashes(u);
    if(c) canonical.add(c);
  }
  return Array.from(canonical).sort(compareUrls);
}

/** Writes the formatted list and returns how many lines were written. Nothing is written for an empty list. */
export function writeUrlList(filePath: string, urls: Iterable<string>): number {
  const lines = formatUrlList(urls);
  if(!lines.length) return 0;
  atomicWriteLines(filePath, lines);
  return lines.length;
}

/**
 * Read URL list files in order. Every non-blank line, trimmed, becomes one
 * entry; duplicates are kept. Missing or unreadable files are logged and skipped.
 */
export function readUrlsFromFiles(files: readonly string[]): string[] {
  const urls: string[] = [];
  for(const file of files){
    if(!fs.existsSync(file)){
      logWarn('input_missing', { file });
      continue;
    }
    let raw: string;
    try {
      raw = fs.readFileSync(file, 'utf8');
    } catch(err){
      logWarn('input_unreadable', { file, error: (err as NodeJS.ErrnoException).code ?? String(err) });
      continue;
    }
    let count = 0;
    for(const line of raw.split(/\r\n|\r|\n/)){
      const u = line.trim();
      if(!u) continue;
      urls.push(u);
      count++;
    }
    logDebug('input_read', { file, urls: count });
  }
  return urls;
}

/**
 * Input list files for the harvester: the explicit ones when given, otherwise
 * whichever default list files exist at the repository root.
 */
export function resolveInputFiles(explicit: readonly string[], repoRoot: string = REPO_ROOT): string[] {
  if(explicit.length) return explicit.map(f => path.resolve(f));
  const found = defaultUrlListFiles(repoRoot).filter(f => fs.existsSync(f));
  if(!found.length){
    fail('NO_INPUT_FILES', 'No input URL files provided and no default files found.', { searched: defaultUrlListFiles(repoRoot) });
  }
  return found;
}
