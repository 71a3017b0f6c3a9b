#!/usr/bin/env node
// Collect ATT&CK mitigation page URLs from STIX bundles, building the URL from
// an M-prefixed external id when a reference carries no mitigation URL.
import { mitigationRule } from '../services/referenceRules';
import { runScannerCli } from './scannerCli';

export function main(argv: string[] = process.argv): number {
  return runScannerCli('extract-mitigation-urls', mitigationRule, argv);
}

if(require.main === module){
  process.exitCode = main();
}
