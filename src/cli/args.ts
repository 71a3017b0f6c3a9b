import { HARVEST_DEFAULTS } from '../config/pipelineDefaults';
import { HarvestCliOptions, zHarvestCliOptions } from '../schemas';
import { UsageError } from '../services/errors';

export interface ScannerCliArgs {
  root?: string;
  outputFile?: string;
  help: boolean;
}

/** `prog [root_dir] [output_file]`; extra positionals and unknown flags are usage errors. */
export function parseScannerArgs(argv: string[]): ScannerCliArgs {
  const args = argv.slice(2);
  const positionals: string[] = [];
  let help = false;
  for(const raw of args){
    if(raw === '--help' || raw === '-h') help = true;
    else if(raw.startsWith('-') && raw !== '-') throw new UsageError(`unrecognized option: ${raw}`);
    else positionals.push(raw);
  }
  if(positionals.length > 2) throw new UsageError(`unexpected argument: ${positionals[2]}`);
  return { root: positionals[0], outputFile: positionals[1], help };
}

export function scannerUsage(prog: string, defaultOutput: string): string {
  return `usage: ${prog} [root_dir] [output_file]

  root_dir     directory scanned recursively for *.json bundles (default: repository root)
  output_file  URL list to write (default: ${defaultOutput})

  -h, --help   show this help and exit`;
}

export const HARVEST_USAGE = `usage: save-urls-to-texts [options]

Save the text of a CSS selector on every listed URL to .txt files.

  -i, --inputs FILE...   URL list files, one URL per line
                         (default: mitre_technique_urls.txt and mitre_mitigation_urls.txt
                         at the repository root, whichever exist)
  -o, --output DIR       output directory (default ${HARVEST_DEFAULTS.outputDir})
  -w, --workers N        concurrent pages (default ${HARVEST_DEFAULTS.workers})
  --timeout MS           navigation timeout in ms (default ${HARVEST_DEFAULTS.timeoutMs})
  --no-headless          show the browser window
  --wait SECONDS         extra wait after network idle before extracting (default ${HARVEST_DEFAULTS.waitSeconds})
  --selector CSS         selector to extract text from (default "${HARVEST_DEFAULTS.selector}")
  -h, --help             show this help and exit

Options also accept the --name=value form.`;

const VALUE_FLAGS: Record<string, 'output' | 'workers' | 'timeout' | 'wait' | 'selector'> = {
  '--output': 'output', '-o': 'output',
  '--workers': 'workers', '-w': 'workers',
  '--timeout': 'timeout',
  '--wait': 'wait',
  '--selector': 'selector',
};

function toNumber(flag: string, value: string): number {
  if(!value.trim()) throw new UsageError(`${flag} expects a number`);
  const n = Number(value);
  if(Number.isNaN(n)) throw new UsageError(`${flag} expects a number (got "${value}")`);
  return n;
}

/**
 * Harvester options. `--inputs` takes every following argument up to the
 * next option; an empty `--inputs` means the defaults. Later occurrences of
 * a flag override earlier ones.
 */
export function parseHarvestArgs(argv: string[]): HarvestCliOptions {
  const args = argv.slice(2);
  const raw: HarvestCliOptions = {
    inputs: [],
    output: HARVEST_DEFAULTS.outputDir,
    workers: HARVEST_DEFAULTS.workers,
    timeoutMs: HARVEST_DEFAULTS.timeoutMs,
    waitSeconds: HARVEST_DEFAULTS.waitSeconds,
    selector: HARVEST_DEFAULTS.selector,
    headless: HARVEST_DEFAULTS.headless,
    help: false,
  };

  for(let i = 0; i < args.length; i++){
    const arg = args[i];
    if(arg === '--help' || arg === '-h'){ raw.help = true; continue; }
    if(arg === '--no-headless'){ raw.headless = false; continue; }
    if(arg === '--inputs' || arg === '-i' || arg.startsWith('--inputs=')){
      const inline = arg.startsWith('--inputs=') ? arg.slice('--inputs='.length) : undefined;
      const files: string[] = inline ? [inline] : [];
      while(i + 1 < args.length && !args[i + 1].startsWith('-')) files.push(args[++i]);
      raw.inputs = files;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    const key = VALUE_FLAGS[flag];
    if(!key) throw new UsageError(`unrecognized argument: ${arg}`);
    let value: string;
    if(flag !== arg) value = arg.slice(eq + 1);
    else {
      if(i + 1 >= args.length) throw new UsageError(`${flag} expects a value`);
      value = args[++i];
    }

    switch(key){
      case 'output': raw.output = value; break;
      case 'workers': raw.workers = toNumber(flag, value); break;
      case 'timeout': raw.timeoutMs = toNumber(flag, value); break;
      case 'wait': raw.waitSeconds = toNumber(flag, value); break;
      case 'selector': raw.selector = value; break;
    }
  }

  const parsed = zHarvestCliOptions.safeParse(raw);
  if(!parsed.success){
    throw new UsageError(parsed.error.issues.map(issue => issue.message).join('; '));
  }
  return parsed.data;
}
