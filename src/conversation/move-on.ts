/**
 * Explicit "move on" detection.
 *
 * Plain case-insensitive substring search against a fixed phrase list.
 * Typographic apostrophes are folded to ASCII first so "let’s move on"
 * typed on a phone still matches.
 */

function normalize(text: string): string {
  return text.toLowerCase().replace(/[‘’ʼ]/g, "'");
}

/**
 * Return the first phrase found in the utterance, or undefined.
 */
export function findMoveOnPhrase(
  utterance: string,
  phrases: readonly string[]
): string | undefined {
  const text = normalize(utterance);
  return phrases.find((phrase) => text.includes(normalize(phrase)));
}

export function detectMoveOn(utterance: string, phrases: readonly string[]): boolean {
  return findMoveOnPhrase(utterance, phrases) !== undefined;
}
