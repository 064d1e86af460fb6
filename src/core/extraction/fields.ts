/**
 * Field-level extraction helpers
 */

import { RATING_WORDS } from "../constants/index";

const PLAIN_DECIMAL = /^\d+(?:\.\d+)?$/;

type RatingWord = keyof typeof RATING_WORDS;

function isRatingWord(token: string): token is RatingWord {
  return Object.hasOwn(RATING_WORDS, token);
}

export function cleanText(value: string | null | undefined): string {
  return (value ?? "").replace(/\s+/g, " ").trim();
}

/**
 * Parses a displayed price, ex: "£1,234.56" -> 1234.56.
 * Returns 0 when the remainder is not a plain decimal.
 */
export function extractPrice(text: string | null | undefined): number {
  const raw = (text ?? "").replace(/[£$€,\s]/g, "");
  if (!PLAIN_DECIMAL.test(raw)) return 0;
  return Math.round(Number(raw) * 100) / 100;
}

/**
 * Maps star-rating class tokens to 1..5, ex: "star-rating Three" -> 3.
 * Returns 0 when no rating word is present.
 */
export function extractRating(classAttr: string | null | undefined): number {
  for (const token of (classAttr ?? "").split(/\s+/)) {
    if (isRatingWord(token)) return RATING_WORDS[token];
  }
  return 0;
}

/** First integer token in the text, else 0 */
export function extractNumber(text: string | null | undefined): number {
  const m = (text ?? "").match(/\d+/);
  return m ? parseInt(m[0], 10) : 0;
}
