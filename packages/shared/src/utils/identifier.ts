/**
 * Runs of anything other than letters, decimal digits and underscore.
 */
const NON_IDENTIFIER_RUN = /[^\p{L}\p{Nd}_]+/gu;

/**
 * Turn an arbitrary label into a safe identifier fragment.
 *
 * Example: " Assign to existing batch " → "Assign_to_existing_batch"
 */
export function sanitizeIdentifier(raw: string): string {
  const cleaned = raw.trim().replace(NON_IDENTIFIER_RUN, '_');
  return cleaned.length > 0 ? cleaned : '_';
}
