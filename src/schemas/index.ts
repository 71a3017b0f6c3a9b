import { z } from 'zod';

/**
 * Shape checks for scanned documents and harvester options.
 *
 * Bundle parsing is deliberately loose: only the fields the scanners read are
 * typed, a field of the wrong type degrades to undefined via .catch() instead
 * of rejecting the record, and everything else passes through untouched.
 */

export const zStixBundle = z.object({
  objects: z.array(z.unknown()),
}).passthrough();

export const zStixObject = z.object({
  type: z.string().optional().catch(undefined),
  external_references: z.array(z.unknown()).optional().catch(undefined),
}).passthrough();

export const zExternalReference = z.object({
  source_name: z.string().optional().catch(undefined),
  url: z.string().optional().catch(undefined),
  external_id: z.string().optional().catch(undefined),
}).passthrough();

export type StixObject = z.infer<typeof zStixObject>;
export type ExternalReference = z.infer<typeof zExternalReference>;

export const zHarvestCliOptions = z.object({
  inputs: z.array(z.string().min(1)),
  output: z.string().min(1, 'output directory must not be empty'),
  workers: z.number().int('workers must be an integer').min(1, 'workers must be at least 1'),
  timeoutMs: z.number().finite('timeout must be finite').int('timeout must be an integer').min(0, 'timeout must not be negative'),
  waitSeconds: z.number().finite('wait must be finite').min(0, 'wait must not be negative'),
  selector: z.string().trim().min(1, 'selector must not be empty'),
  headless: z.boolean(),
  help: z.boolean(),
}).strict();

export type HarvestCliOptions = z.infer<typeof zHarvestCliOptions>;
