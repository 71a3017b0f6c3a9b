#!/usr/bin/env node
/**
 * Save the text under a CSS selector for every URL in one or more URL list
 * files, one .txt file per URL.
 *
 * Needs a Chromium build for Playwright: `npx playwright install chromium`.
 */
import path from 'path';
import { HARVEST_DEFAULTS, REPO_ROOT } from '../config/pipelineDefaults';
import { HarvestOptions, HarvestSummary } from '../models/harvest';
import { HarvestCliOptions } from '../schemas';
import { BrowserLauncher } from '../services/browserDriver';
import { describeError, fail, isPipelineFailure, UsageError } from '../services/errors';
import { logError, logInfo } from '../services/logger';
import { launchPlaywright } from '../services/playwrightDriver';
import { harvestUrls } from '../services/textHarvester';
import { readUrlsFromFiles, resolveInputFiles } from '../services/urlList';
import { HARVEST_USAGE, parseHarvestArgs } from './args';
import { CliIo, consoleIo } from './scannerCli';

export interface HarvestCliDeps {
  launch: BrowserLauncher;
  repoRoot: string;
  io: CliIo;
}

const defaultDeps: HarvestCliDeps = { launch: launchPlaywright, repoRoot: REPO_ROOT, io: consoleIo };

export function toHarvestOptions(cli: HarvestCliOptions): HarvestOptions {
  return {
    outputDir: path.resolve(cli.output),
    workers: cli.workers,
    timeoutMs: cli.timeoutMs,
    waitSeconds: cli.waitSeconds,
    selector: cli.selector,
    headless: cli.headless,
    viewport: { ...HARVEST_DEFAULTS.viewport },
  };
}

/** Resolve inputs and harvest; fatal preconditions throw before the browser is launched. */
export async function runHarvest(cli: HarvestCliOptions, deps: Pick<HarvestCliDeps, 'launch' | 'repoRoot'>): Promise<HarvestSummary> {
  const inputFiles = resolveInputFiles(cli.inputs, deps.repoRoot);
  const urls = readUrlsFromFiles(inputFiles);
  if(!urls.length) fail('NO_URLS', 'No URLs found in input files.', { inputFiles });

  const options = toHarvestOptions(cli);
  logInfo('harvest_start', { urls: urls.length, outputDir: options.outputDir, selector: options.selector, workers: options.workers });
  return harvestUrls(urls, options, deps.launch);
}

/** Exit code: 0 when the run completed (even with per-URL failures), 1 on a fatal precondition, 2 on bad usage. */
export async function main(argv: string[] = process.argv, deps: HarvestCliDeps = defaultDeps): Promise<number> {
  const { io } = deps;
  let cli: HarvestCliOptions;
  try {
    cli = parseHarvestArgs(argv);
  } catch(err){
    if(err instanceof UsageError){
      io.err(`save-urls-to-texts: error: ${err.message}`);
      io.err(HARVEST_USAGE);
      return 2;
    }
    throw err;
  }
  if(cli.help){
    io.out(HARVEST_USAGE);
    return 0;
  }

  try {
    const summary = await runHarvest(cli, deps);
    io.out(`Saved ${summary.saved} of ${summary.attempted} URLs to ${path.resolve(cli.output)} (${summary.failed} failed)`);
    return 0;
  } catch(err){
    if(isPipelineFailure(err)){
      logError('harvest_aborted', { code: err.code, ...err.data });
      io.err(err.message);
      return 1;
    }
    logError('harvest_crashed', { error: describeError(err) });
    io.err(`save-urls-to-texts: ${describeError(err)}`);
    return 1;
  }
}

if(require.main === module){
  main().then(
    code => { process.exitCode = code; },
    err => {
      logError('harvest_crashed', { error: describeError(err) });
      process.exitCode = 1;
    },
  );
}
