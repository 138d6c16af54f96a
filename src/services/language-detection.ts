/**
 * AUTO-ME - Language Detection
 *
 * Majority vote over provider-reported languages of a few sample segments.
 */

export interface LanguageGuess {
  language: string;
  confidence: number;
}

export const FALLBACK_LANGUAGE: LanguageGuess = {
  language: 'en',
  confidence: 0.3,
};

/**
 * First, middle and last segment indices (deduplicated, ascending)
 */
export function pickSampleIndices(count: number): number[] {
  if (count <= 0) return [];
  const picks = new Set([0, Math.floor(count / 2), count - 1]);
  return [...picks].sort((a, b) => a - b);
}

/**
 * Most frequent language wins; ties go to the earliest sample.
 * Confidence is the winner's share of the votes.
 */
export function voteLanguage(
  languages: readonly (string | undefined)[]
): LanguageGuess | null {
  const counts = new Map<string, number>();
  let votes = 0;
  for (const language of languages) {
    if (!language) continue;
    counts.set(language, (counts.get(language) ?? 0) + 1);
    votes++;
  }
  if (votes === 0) return null;

  let winner = '';
  let winnerCount = 0;
  for (const [language, count] of counts) {
    if (count > winnerCount) {
      winner = language;
      winnerCount = count;
    }
  }
  return { language: winner, confidence: winnerCount / votes };
}
