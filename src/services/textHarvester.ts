import fs from 'fs';
import path from 'path';
import { HarvestJob, HarvestOptions, HarvestOutcome, HarvestSummary } from '../models/harvest';
import { atomicWriteText } from './atomicFs';
import { BrowserDriver, BrowserLauncher, BrowserPage, PageElement } from './browserDriver';
import { createLimiter, Limiter, sleep } from './concurrency';
import { describeError } from './errors';
import { sanitizeFilenameFromUrl } from './filenames';
import { log, logDebug, logInfo, logWarn } from './logger';

/** Rendered text of an element, falling back to its raw text content, then to ''. */
export async function extractElementText(el: PageElement): Promise<string> {
  try {
    return await el.innerText();
  } catch(innerErr){
    logDebug('inner_text_failed', { error: describeError(innerErr) });
    try {
      return (await el.textContent()) ?? '';
    } catch(contentErr){
      logDebug('text_content_failed', { error: describeError(contentErr) });
      return '';
    }
  }
}

/** Trimmed text of every selector match, blank blocks dropped, joined by a blank line. */
export async function extractSelectorText(page: BrowserPage, selector: string): Promise<string> {
  const elements = await page.queryAll(selector);
  const parts: string[] = [];
  for(const el of elements){
    const text = (await extractElementText(el)).trim();
    if(text) parts.push(text);
  }
  return parts.join('\n\n');
}

export function planJobs(urls: readonly string[], outputDir: string): HarvestJob[] {
  return urls.map(url => ({ url, outputPath: path.join(outputDir, sanitizeFilenameFromUrl(url)) }));
}

type PageSettings = Pick<HarvestOptions, 'timeoutMs' | 'waitSeconds' | 'selector' | 'viewport'>;

/**
 * Fetch one URL and write its selector text. Holds a limiter slot from before
 * the page opens until after it closes. Never rejects: a failure is logged and
 * returned as an outcome so sibling jobs carry on.
 */
export function fetchAndSaveText(driver: BrowserDriver, limiter: Limiter, job: HarvestJob, settings: PageSettings): Promise<HarvestOutcome> {
  return limiter.run(async (): Promise<HarvestOutcome> => {
    const start = Date.now();
    let page: BrowserPage | undefined;
    try {
      page = await driver.newPage();
      await page.setViewportSize(settings.viewport);
      await page.goto(job.url, { timeoutMs: settings.timeoutMs });
      if(settings.waitSeconds > 0) await sleep(settings.waitSeconds * 1000);
      const text = await extractSelectorText(page, settings.selector);
      atomicWriteText(job.outputPath, text);
      const ms = Date.now() - start;
      log('info', 'text_saved', { url: job.url, msg: job.outputPath, ms, data: { length: text.length } });
      return { ok: true, url: job.url, outputPath: job.outputPath, length: text.length, ms };
    } catch(err){
      const ms = Date.now() - start;
      log('error', 'text_save_failed', {
        url: job.url,
        msg: describeError(err),
        ms,
        data: err instanceof Error && err.stack ? { stack: err.stack } : undefined,
      });
      return { ok: false, url: job.url, outputPath: job.outputPath, error: describeError(err), ms };
    } finally {
      if(page){
        try {
          await page.close();
        } catch(closeErr){
          logWarn('page_close_failed', { url: job.url, error: describeError(closeErr) });
        }
      }
    }
  });
}

export function summarizeOutcomes(outcomes: readonly HarvestOutcome[]): HarvestSummary {
  const failures: HarvestSummary['failures'] = [];
  for(const o of outcomes){
    if(!o.ok) failures.push({ url: o.url, error: o.error });
  }
  return {
    attempted: outcomes.length,
    saved: outcomes.length - failures.length,
    failed: failures.length,
    failures,
  };
}

/**
 * Fetch every URL through one browser, at most options.workers pages at a
 * time, and wait for all of them. Completion order is unspecified.
 */
export async function harvestUrls(urls: readonly string[], options: HarvestOptions, launch: BrowserLauncher): Promise<HarvestSummary> {
  fs.mkdirSync(options.outputDir, { recursive: true });
  const jobs = planJobs(urls, options.outputDir);
  const limiter = createLimiter(options.workers);
  const driver = await launch({ headless: options.headless });
  logDebug('browser_launched', { headless: options.headless, workers: options.workers });
  try {
    const outcomes = await Promise.all(jobs.map(job => fetchAndSaveText(driver, limiter, job, options)));
    const summary = summarizeOutcomes(outcomes);
    logInfo('harvest_complete', { outputDir: options.outputDir, attempted: summary.attempted, saved: summary.saved, failed: summary.failed });
    return summary;
  } finally {
    await driver.close();
  }
}
