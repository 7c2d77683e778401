/**
 * True when the operator's target text appears anywhere in the file's quality
 * label, ignoring case and surrounding whitespace. "1080p" matches
 * "WEBDL-1080p"; an empty label or target never matches.
 */
export function qualityTextMatches(qualityName: string, targetQuality: string) {
  const current = qualityName.trim().toLowerCase();
  const target = targetQuality.trim().toLowerCase();
  if (!current || !target) return false;
  return current.includes(target);
}
