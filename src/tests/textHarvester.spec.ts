import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { HarvestOptions } from '../models/harvest';
import { createLimiter } from '../services/concurrency';
import { extractElementText, fetchAndSaveText, harvestUrls, planJobs } from '../services/textHarvester';
import { FakeBrowser, fakeLauncher } from './fakeBrowser';

const T1548 = 'https://attack.mitre.org/techniques/T1548/';

function options(outputDir: string, overrides: Partial<HarvestOptions> = {}): HarvestOptions {
  return {
    outputDir,
    workers: 3,
    timeoutMs: 30000,
    waitSeconds: 0,
    selector: '#v-attckmatrix > .row',
    headless: true,
    viewport: { width: 1280, height: 1024 },
    ...overrides,
  };
}

describe('extractElementText', () => {
  it('prefers rendered text', async () => {
    await expect(extractElementText({ innerText: async () => 'rendered', textContent: async () => 'raw' })).resolves.toBe('rendered');
  });

  it('falls back to text content, then to empty', async () => {
    const broken = async (): Promise<string> => { throw new Error('detached'); };
    await expect(extractElementText({ innerText: broken, textContent: async () => 'raw' })).resolves.toBe('raw');
    await expect(extractElementText({ innerText: broken, textContent: async () => null })).resolves.toBe('');
    await expect(extractElementText({ innerText: broken, textContent: async () => { throw new Error('gone'); } })).resolves.toBe('');
  });
});

describe('text harvester', () => {
  let dir: string;
  beforeEach(() => { dir = fs.mkdtempSync(path.join(os.tmpdir(), 'harvest-')); });
  afterEach(() => { fs.rmSync(dir, { recursive: true, force: true }); });

  it('plans one output path per URL, duplicates included', () => {
    expect(planJobs([T1548, T1548], dir)).toEqual([
      { url: T1548, outputPath: path.join(dir, 'attack.mitre.org_techniques_T1548.txt') },
      { url: T1548, outputPath: path.join(dir, 'attack.mitre.org_techniques_T1548.txt') },
    ]);
  });

  it('joins trimmed non-empty element texts with a blank line', async () => {
    const browser = new FakeBrowser({
      [T1548]: { elements: ['  Abuse Elevation Control Mechanism  ', '   ', { innerText: new Error('x'), textContent: '\nID: T1548\n' }] },
    });
    const out = path.join(dir, 'nested', 'T1548.txt');
    const outcome = await fetchAndSaveText(browser, createLimiter(1), { url: T1548, outputPath: out }, options(dir));
    expect(outcome.ok).toBe(true);
    expect(fs.readFileSync(out, 'utf8')).toBe('Abuse Elevation Control Mechanism\n\nID: T1548');
    expect(browser.viewports).toEqual([{ width: 1280, height: 1024 }]);
    expect(browser.selectors).toEqual(['#v-attckmatrix > .row']);
    expect(browser.timeouts).toEqual([30000]);
    expect(browser.pagesClosed).toBe(1);
  });

  it('writes an empty file when the selector matches nothing', async () => {
    const browser = new FakeBrowser({ [T1548]: { elements: [] } });
    const summary = await harvestUrls([T1548], options(dir), fakeLauncher(browser));
    const file = path.join(dir, 'attack.mitre.org_techniques_T1548.txt');
    expect(summary).toEqual({ attempted: 1, saved: 1, failed: 0, failures: [] });
    expect(fs.existsSync(file)).toBe(true);
    expect(fs.readFileSync(file, 'utf8')).toBe('');
  });

  it('overwrites an existing output file', async () => {
    const file = path.join(dir, 'attack.mitre.org_techniques_T1548.txt');
    fs.writeFileSync(file, 'stale');
    const browser = new FakeBrowser({ [T1548]: { elements: ['fresh'] } });
    await harvestUrls([T1548], options(dir), fakeLauncher(browser));
    expect(fs.readFileSync(file, 'utf8')).toBe('fresh');
  });

  it('keeps going when one URL in five times out', async () => {
    const urls = ['T1001', 'T1002', 'T1003', 'T1004', 'T1005'].map(id => `https://attack.mitre.org/techniques/${id}`);
    const timeout = new Error('page.goto: Timeout 30000ms exceeded.');
    timeout.name = 'TimeoutError';
    const browser = new FakeBrowser(Object.fromEntries(urls.map(u => [u, u.endsWith('T1003') ? { gotoError: timeout } : { elements: [u.slice(-5)] }])));

    const summary = await harvestUrls(urls, options(dir, { workers: 2 }), fakeLauncher(browser));

    expect(summary.attempted).toBe(5);
    expect(summary.saved).toBe(4);
    expect(summary.failures).toEqual([{ url: 'https://attack.mitre.org/techniques/T1003', error: 'TimeoutError: page.goto: Timeout 30000ms exceeded.' }]);
    expect(fs.readdirSync(dir).sort()).toEqual([
      'attack.mitre.org_techniques_T1001.txt',
      'attack.mitre.org_techniques_T1002.txt',
      'attack.mitre.org_techniques_T1004.txt',
      'attack.mitre.org_techniques_T1005.txt',
    ]);
    expect(fs.readFileSync(path.join(dir, 'attack.mitre.org_techniques_T1005.txt'), 'utf8')).toBe('T1005');
    // failed page still closed, browser closed once all tasks settle
    expect(browser.pagesClosed).toBe(5);
    expect(browser.closed).toBe(true);
  });

  it('caps open pages at the worker count', async () => {
    const urls = Array.from({ length: 8 }, (_, i) => `https://attack.mitre.org/mitigations/M10${10 + i}`);
    const browser = new FakeBrowser(Object.fromEntries(urls.map(u => [u, { elements: ['text'], gotoDelayMs: 5 }])));
    const launcher = fakeLauncher(browser);
    const summary = await harvestUrls(urls, options(dir, { workers: 3, headless: false }), launcher);
    expect(summary.saved).toBe(8);
    expect(browser.maxOpenPages).toBe(3);
    expect(browser.openPages).toBe(0);
    expect(launcher.launches).toEqual([{ headless: false }]);
  });

  it('waits the configured extra delay before extracting', async () => {
    const browser = new FakeBrowser({ [T1548]: { elements: ['late'] } });
    const start = Date.now();
    const outcome = await fetchAndSaveText(browser, createLimiter(1), { url: T1548, outputPath: path.join(dir, 'late.txt') }, options(dir, { waitSeconds: 0.05 }));
    expect(outcome.ok).toBe(true);
    expect(Date.now() - start).toBeGreaterThanOrEqual(45);
  });

  it('reports a failed write without leaving a partial file', async () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, 'a file where a directory is needed');
    const browser = new FakeBrowser({ [T1548]: { elements: ['text'] } });
    const outcome = await fetchAndSaveText(browser, createLimiter(1), { url: T1548, outputPath: path.join(blocker, 'out.txt') }, options(dir));
    expect(outcome.ok).toBe(false);
    expect(fs.readdirSync(dir)).toEqual(['blocker']);
    expect(browser.pagesClosed).toBe(1);
  });
});
