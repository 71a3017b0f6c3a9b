export interface ScanSummary {
  scanned: number; // .json files found below the root
  parsed: number;  // files that parsed into a bundle with an objects array
  skipped: number;
  reasons: Record<string, number>; // skip reason -> count, e.g. { 'parse-error': 2 }
}

export interface ScanResult {
  urls: Set<string>;
  summary: ScanSummary;
}

export interface ViewportSize { width: number; height: number; }

export interface HarvestOptions {
  outputDir: string;
  workers: number;
  timeoutMs: number;
  waitSeconds: number;
  selector: string;
  headless: boolean;
  viewport: ViewportSize;
}

export interface HarvestJob {
  url: string;
  outputPath: string;
}

export type HarvestOutcome =
  | { ok: true; url: string; outputPath: string; length: number; ms: number }
  | { ok: false; url: string; outputPath: string; error: string; ms: number };

export interface HarvestSummary {
  attempted: number;
  saved: number;
  failed: number;
  failures: { url: string; error: string }[];
}
