import { ATTACK_BASE_URL, MITIGATION_URLS_FILENAME, TECHNIQUE_URLS_FILENAME } from '../config/pipelineDefaults';
import { ExternalReference, StixObject } from '../schemas';
import { stripTrailingSlashes } from './urlList';

export type ReferenceCategory = 'technique' | 'mitigation';

/**
 * Category-specific half of a scan: which STIX objects are inspected and what
 * URL, if any, a mitre-attack external reference contributes.
 */
export interface ReferenceRule {
  category: ReferenceCategory;
  /** Noun used in operator messages ("Wrote 3 unique <noun> URLs"). */
  noun: string;
  defaultOutputFilename: string;
  acceptsObject(obj: StixObject): boolean;
  collect(ref: ExternalReference): string | undefined;
}

export const MITIGATION_ID_PREFIX = 'M';
export const MITIGATION_PATH_FRAGMENT = '/mitigations/';

/** The one place that knows how ATT&CK lays out mitigation pages. */
export function synthesizeMitigationUrl(externalId: string): string {
  return `${ATTACK_BASE_URL}/mitigations/${externalId.toUpperCase()}`;
}

export function isMitigationId(externalId: string | undefined): externalId is string {
  return !!externalId && externalId.toUpperCase().startsWith(MITIGATION_ID_PREFIX);
}

export const techniqueRule: ReferenceRule = {
  category: 'technique',
  noun: 'technique',
  defaultOutputFilename: TECHNIQUE_URLS_FILENAME,
  acceptsObject: obj => obj.type === 'attack-pattern',
  // collected verbatim; trailing slashes go when the list is formatted
  collect: ref => ref.url ? ref.url : undefined,
};

export const mitigationRule: ReferenceRule = {
  category: 'mitigation',
  noun: 'mitigation',
  defaultOutputFilename: MITIGATION_URLS_FILENAME,
  acceptsObject: () => true,
  collect: ref => {
    if(ref.url && ref.url.includes(MITIGATION_PATH_FRAGMENT)) return stripTrailingSlashes(ref.url);
    if(isMitigationId(ref.external_id)) return synthesizeMitigationUrl(ref.external_id);
    return undefined;
  },
};

export function ruleFor(category: ReferenceCategory): ReferenceRule {
  return category === 'technique' ? techniqueRule : mitigationRule;
}
