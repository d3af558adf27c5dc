import type { Token } from "../types";

/**
 * Text-quality score for a page's tokens, in [0, 1].
 *
 * Garbled OCR tends to yield short, repetitive or fragmented tokens, so this averages a
 * mean-token-length score with a distinct-token ratio. It is a cheap proxy, not a calibrated
 * probability; scores are not comparable across document types.
 */
export function estimatePageConfidence(tokens: readonly Token[]): number {
  if (tokens.length === 0) return 0;
  const texts = tokens.map((t) => t.text).filter((t) => t.length > 0);
  if (texts.length === 0) return 0;
  const meanLength = texts.reduce((sum, t) => sum + t.length, 0) / texts.length;
  const lengthScore = Math.min(meanLength / 10, 1);
  const diversityScore = Math.min(new Set(texts).size / (tokens.length + 1e-5), 1);
  return round2((lengthScore + diversityScore) / 2);
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}
