import path from 'path';
import { REPO_ROOT, SCAN_SKIP_DIRS } from '../config/pipelineDefaults';
import { describeError, UsageError } from '../services/errors';
import { logError } from '../services/logger';
import { ReferenceRule } from '../services/referenceRules';
import { runScanner } from '../services/referenceScanner';
import { parseScannerArgs, ScannerCliArgs, scannerUsage } from './args';

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const consoleIo: CliIo = {
  out: line => console.log(line),
  err: line => console.error(line),
};

/** Shared body of the two scanner entry points. Returns the process exit code. */
export function runScannerCli(prog: string, rule: ReferenceRule, argv: string[], io: CliIo = consoleIo, repoRoot: string = REPO_ROOT): number {
  const defaultOutput = path.join(repoRoot, rule.defaultOutputFilename);
  let args: ScannerCliArgs;
  try {
    args = parseScannerArgs(argv);
  } catch(err){
    if(err instanceof UsageError){
      io.err(`${prog}: error: ${err.message}`);
      io.err(scannerUsage(prog, defaultOutput));
      return 2;
    }
    throw err;
  }
  if(args.help){
    io.out(scannerUsage(prog, defaultOutput));
    return 0;
  }

  const root = path.resolve(args.root ?? repoRoot);
  // the repository root holds dependencies and VCS data; an explicit root is scanned in full
  const skipDirs = args.root === undefined ? SCAN_SKIP_DIRS : [];
  const outputFile = path.resolve(args.outputFile ?? defaultOutput);
  io.out(`Scanning JSON files under: ${root}`);
  try {
    const result = runScanner({ root, outputFile, rule, skipDirs });
    if(!result.written){
      io.out(`No ${rule.noun} URLs found.`);
      return 0;
    }
    io.out(`Wrote ${result.written} unique ${rule.noun} URLs to: ${outputFile}`);
    return 0;
  } catch(err){
    logError('scanner_failed', { outputFile, error: describeError(err) });
    io.err(`${prog}: failed to write ${outputFile}: ${describeError(err)}`);
    return 1;
  }
}
