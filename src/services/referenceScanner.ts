import fs from 'fs';
import path from 'path';
import { ATTACK_SOURCE_NAME } from '../config/pipelineDefaults';
import { ScanResult, ScanSummary } from '../models/harvest';
import { zExternalReference, zStixBundle, zStixObject } from '../schemas';
import { ReferenceRule } from './referenceRules';
import { writeUrlList } from './urlList';
import { logDebug, logInfo, logWarn } from './logger';

export type SkipReason = 'read-error' | 'parse-error' | 'not-a-bundle';

/**
 * Every *.json file below root, depth first, entries visited in name order.
 * Symbolic links to directories are not followed; directories named in
 * skipDirs are pruned at any depth.
 */
export function listJsonFiles(root: string, skipDirs: readonly string[] = []): string[] {
  const out: string[] = [];
  const visit = (dir: string) => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch(err){
      logWarn('scan_dir_unreadable', { dir, error: (err as NodeJS.ErrnoException).code ?? String(err) });
      return;
    }
    entries.sort((a, b) => a.name < b.name ? -1 : a.name > b.name ? 1 : 0);
    for(const e of entries){
      const full = path.join(dir, e.name);
      if(e.isDirectory()){
        if(!skipDirs.includes(e.name)) visit(full);
      } else if((e.isFile() || e.isSymbolicLink()) && e.name.endsWith('.json')){
        out.push(full);
      }
    }
  };
  visit(path.resolve(root));
  return out;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

type ParsedFile = { ok: true; objects: unknown[] } | { ok: false; reason: SkipReason; error: string };

function readBundleObjects(file: string): ParsedFile {
  let raw: string;
  try {
    // malformed UTF-8 is a read failure, not text with replacement characters
    raw = utf8.decode(fs.readFileSync(file));
  } catch(err){
    return { ok: false, reason: 'read-error', error: (err as NodeJS.ErrnoException).code ?? String(err) };
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch(err){
    return { ok: false, reason: 'parse-error', error: err instanceof Error ? err.message : String(err) };
  }
  const bundle = zStixBundle.safeParse(data);
  if(!bundle.success) return { ok: false, reason: 'not-a-bundle', error: 'no objects array' };
  return { ok: true, objects: bundle.data.objects };
}

/** Apply a rule to the objects of one bundle, adding hits to urls. */
export function collectFromObjects(objects: readonly unknown[], rule: ReferenceRule, urls: Set<string>): number {
  let added = 0;
  for(const candidate of objects){
    const obj = zStixObject.safeParse(candidate);
    if(!obj.success || !rule.acceptsObject(obj.data)) continue;
    for(const rawRef of obj.data.external_references ?? []){
      const ref = zExternalReference.safeParse(rawRef);
      if(!ref.success || ref.data.source_name !== ATTACK_SOURCE_NAME) continue;
      const url = rule.collect(ref.data);
      if(url && !urls.has(url)){
        urls.add(url);
        added++;
      }
    }
  }
  return added;
}

/**
 * Collect the URLs a rule derives from every bundle below root.
 * Unreadable, unparsable and non-bundle files are counted and skipped; they
 * never fail the scan.
 */
export function scanReferences(root: string, rule: ReferenceRule, skipDirs: readonly string[] = []): ScanResult {
  const urls = new Set<string>();
  const summary: ScanSummary = { scanned: 0, parsed: 0, skipped: 0, reasons: {} };
  const start = Date.now();
  for(const file of listJsonFiles(root, skipDirs)){
    summary.scanned++;
    const parsed = readBundleObjects(file);
    if(!parsed.ok){
      summary.skipped++;
      summary.reasons[parsed.reason] = (summary.reasons[parsed.reason] || 0) + 1;
      logDebug('scan_file_skipped', { file, reason: parsed.reason, error: parsed.error });
      continue;
    }
    summary.parsed++;
    const added = collectFromObjects(parsed.objects, rule, urls);
    if(added) logDebug('scan_file_collected', { file, added });
  }
  logInfo('scan_complete', { root, category: rule.category, urls: urls.size, ms: Date.now() - start, ...summary });
  return { urls, summary };
}

export interface ScannerOptions {
  root: string;
  outputFile: string;
  rule: ReferenceRule;
  skipDirs?: readonly string[];
}

export interface ScannerRunResult {
  written: number;
  outputFile: string;
  summary: ScanSummary;
}

/** Scan and write the URL list. An empty result writes no file and reports zero. */
export function runScanner(options: ScannerOptions): ScannerRunResult {
  const { urls, summary } = scanReferences(options.root, options.rule, options.skipDirs);
  const written = writeUrlList(options.outputFile, urls);
  if(written) logInfo('url_list_written', { file: options.outputFile, count: written });
  return { written, outputFile: options.outputFile, summary };
}
