/**
 * Normalize extracted text before chunking.
 *
 * Symbols and control characters outside letters, digits, whitespace and
 * common punctuation become spaces, runs of dots collapse to an ellipsis,
 * repeated `!`/`?` collapse to `!`, and whitespace is squeezed and trimmed.
 */
export function cleanText(text: string): string {
  return text
    .replace(/[^\p{L}\p{N}_\s.,!?;:\-()[\]{}"'/\\]/gu, " ")
    .replace(/\.{3,}/g, "...")
    .replace(/[!?]{2,}/g, "!")
    .replace(/\s+/g, " ")
    .trim();
}
