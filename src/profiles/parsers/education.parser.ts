import { EducationLevel } from "../../shared/types/profile.types";

// Highest level first; the first pattern that matches any line wins.
const LEVEL_PATTERNS: ReadonlyArray<[Exclude<EducationLevel, "unknown">, RegExp]> = [
  ["doctorate", /\b(ph\.?\s?d|doctorate|doctoral|d\.?phil)\b/i],
  ["master", /\b(master'?s?|m\.?sc|m\.?eng|mba|m\.s\.|m\.a\.)(?![a-z])/i],
  ["bachelor", /\b(bachelor'?s?|b\.?sc|b\.?eng|b\.s\.|b\.a\.|undergraduate degree)(?![a-z])/i],
  ["associate", /\bassociate'?s?\s+degree\b/i],
  ["high_school", /\b(high school|secondary school|ged)\b/i],
  ["none", /\b(no (formal )?degree|self-taught)\b/i],
];

export const DEGREE_KEYWORD_PATTERN =
  /\b(ph\.?\s?d|doctorate|master'?s?|m\.?sc|mba|bachelor'?s?|b\.?sc|degree|diploma|university|college|high school)\b/i;

export function parseEducationLevel(lines: ReadonlyArray<string>): EducationLevel {
  for (const [level, pattern] of LEVEL_PATTERNS) {
    if (lines.some((line) => pattern.test(line))) {
      return level;
    }
  }
  return "unknown";
}
