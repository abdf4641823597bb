/**
 * Collection Detection
 *
 * Maps a relative storage path to the collection tag the dashboard groups by.
 *
 *   outputs/<kind>/<collection>/...  -> <collection>
 *   prompts/<method>/...             -> <method>
 *   anything else                    -> parent directory name
 */

export const UNKNOWN_COLLECTION = 'unknown';

export function detectCollection(relativePath: string): string {
  const parts = relativePath.split('/').filter(part => part.length > 0);

  if (parts.length >= 3 && parts[0] === 'outputs') {
    return parts[2] ?? UNKNOWN_COLLECTION;
  }

  if (parts.length >= 2 && parts[0] === 'prompts') {
    return parts[1] ?? UNKNOWN_COLLECTION;
  }

  return parts.length > 1 ? parts[parts.length - 2] ?? UNKNOWN_COLLECTION : UNKNOWN_COLLECTION;
}
