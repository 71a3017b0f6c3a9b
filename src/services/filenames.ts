import { MAX_FILENAME_LENGTH } from '../config/pipelineDefaults';

const EMPTY_NAME_STEM = 'index';

/**
 * Derive a filesystem-safe .txt name from a URL.
 *
 * Scheme, query string and fragment are dropped, path separators become
 * underscores, anything outside [A-Za-z0-9._-] becomes an underscore, and
 * underscores left by a trailing separator are trimmed. Over-long names keep
 * their tail because ATT&CK identifiers sit at the end of the path. A URL
 * with nothing left after cleaning is saved as index.txt.
 *
 *   https://attack.mitre.org/techniques/T1548/  ->  attack.mitre.org_techniques_T1548.txt
 */
export function sanitizeFilenameFromUrl(url: string, maxLength: number = MAX_FILENAME_LENGTH): string {
  let name = url.trim().replace(/^https?:\/\//i, '');
  name = name.split('?', 1)[0].split('#', 1)[0];
  name = name.replace(/\//g, '_');
  name = name.replace(/[^A-Za-z0-9._-]/g, '_');
  name = name.replace(/_+$/, '');
  if(!name) name = EMPTY_NAME_STEM;
  if(name.length > maxLength) name = name.slice(-maxLength);
  if(!name.toLowerCase().endsWith('.txt')) name += '.txt';
  return name;
}
