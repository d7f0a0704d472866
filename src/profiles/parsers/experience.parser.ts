const MAX_PLAUSIBLE_YEARS = 60;

const YEARS_PATTERN =
  /(\d+(?:\.\d+)?)\s*\+?\s*(?:years?|yrs?)(?:\s+of)?(?:\s+[a-z][\w-]*){0,3}?\s+experience/gi;

/**
 * Largest "N years ... experience" figure in the text, or null when none is stated.
 */
export function parseExperienceYears(text: string): number | null {
  let best: number | null = null;
  for (const match of text.matchAll(YEARS_PATTERN)) {
    const years = Number(match[1]);
    if (!Number.isFinite(years) || years > MAX_PLAUSIBLE_YEARS) {
      continue;
    }
    best = best === null ? years : Math.max(best, years);
  }
  return best;
}
