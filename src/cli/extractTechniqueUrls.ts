#!/usr/bin/env node
// Collect ATT&CK technique and sub-technique page URLs from STIX bundles.
import { techniqueRule } from '../services/referenceRules';
import { runScannerCli } from './scannerCli';

export function main(argv: string[] = process.argv): number {
  return runScannerCli('extract-technique-urls', techniqueRule, argv);
}

if(require.main === module){
  process.exitCode = main();
}
