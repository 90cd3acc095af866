/**
 * @relaygate/verification - Judge reply parsing
 *
 * Structured first: the first balanced JSON object in the reply, checked
 * against a TypeBox schema. Anything else degrades to indicator-phrase
 * heuristics that lean conservative. Parsing never throws.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { clamp, truncate } from '@relaygate/core';

export type ParseSource = 'structured' | 'heuristic';

export interface ParsedSafety {
  isSafe: boolean;
  safetyScore: number;
  issues: string[];
  explanation: string;
  source: ParseSource;
}

export interface ParsedConfidence {
  confidenceScore: number;
  reasoning: string;
  source: ParseSource;
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const SafetyReplySchema = Type.Object({
  is_safe: Type.Boolean(),
  safety_score: Type.Number(),
  issues: Type.Optional(Type.Array(Type.String())),
  explanation: Type.Optional(Type.String()),
});
type SafetyReply = Static<typeof SafetyReplySchema>;

const ConfidenceReplySchema = Type.Object({
  confidence_score: Type.Number(),
  reasoning: Type.Optional(Type.String()),
});
type ConfidenceReply = Static<typeof ConfidenceReplySchema>;

// ---------------------------------------------------------------------------
// JSON extraction
// ---------------------------------------------------------------------------

/**
 * Return the first balanced `{...}` span in `text`, honouring string
 * literals and escapes, or null when there is none.
 */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return null;
}

function parseJson(text: string): unknown {
  const candidate = extractJsonObject(text);
  if (candidate === null) return undefined;
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Heuristics
// ---------------------------------------------------------------------------

const SAFETY_NEGATIVE: ReadonlyArray<readonly [RegExp, string]> = [
  [/\bunsafe\b|\bnot safe\b/, 'unsafe'],
  [/\bharmful\b|\bdangerous\b/, 'harmful_content'],
  [/hallucinat/, 'hallucination'],
  [/\bbias(ed)?\b/, 'bias'],
  [/\boff-topic\b|\birrelevant\b/, 'off_topic'],
  [/\boverconfiden/, 'overconfidence'],
];

const SAFETY_POSITIVE = /\bsafe\b|\bno issues\b|\bappropriate\b|\bacceptable\b/;

export const HEURISTIC_SAFE_SCORE = 0.8;
export const HEURISTIC_UNSAFE_SCORE = 0.3;

export function heuristicSafety(text: string): ParsedSafety {
  const lower = text.toLowerCase();
  const issues = SAFETY_NEGATIVE.filter(([pattern]) => pattern.test(lower)).map(([, tag]) => tag);
  const isSafe = issues.length === 0 && SAFETY_POSITIVE.test(lower);

  return {
    isSafe,
    safetyScore: isSafe ? HEURISTIC_SAFE_SCORE : HEURISTIC_UNSAFE_SCORE,
    issues,
    explanation: truncate(text.trim(), 200),
    source: 'heuristic',
  };
}

// Negative indicators first: "inadequate" and "not good" must never read as
// "adequate" or "good".
const CONFIDENCE_INDICATORS: ReadonlyArray<readonly [RegExp, number]> = [
  [/\b(poor|inadequate|failed|wrong|incorrect)\b/, 0.2],
  [/\bnot\s+(?:very\s+|a\s+|an\s+)?(?:good|adequate|reasonable|strong|excellent|correct)\b/, 0.2],
  [/\b(uncertain|incomplete|lacking)\b/, 0.4],
  [/\b(excellent|very good|strong|high confidence)\b/, 0.85],
  [/\b(good|adequate|reasonable)\b/, 0.7],
];

export const HEURISTIC_DEFAULT_CONFIDENCE = 0.5;

export function heuristicConfidence(text: string): ParsedConfidence {
  const lower = text.toLowerCase();
  const match = CONFIDENCE_INDICATORS.find(([pattern]) => pattern.test(lower));

  return {
    confidenceScore: match ? match[1] : HEURISTIC_DEFAULT_CONFIDENCE,
    reasoning: truncate(text.trim(), 200),
    source: 'heuristic',
  };
}

// ---------------------------------------------------------------------------
// Public parsers
// ---------------------------------------------------------------------------

export function parseSafetyReply(text: string): ParsedSafety {
  const data = parseJson(text);
  if (!Value.Check(SafetyReplySchema, data)) {
    return heuristicSafety(text);
  }
  const reply: SafetyReply = data;
  return {
    isSafe: reply.is_safe,
    safetyScore: clamp(reply.safety_score, 0, 1),
    issues: reply.issues ?? [],
    explanation: reply.explanation ?? '',
    source: 'structured',
  };
}

export function parseConfidenceReply(text: string): ParsedConfidence {
  const data = parseJson(text);
  if (!Value.Check(ConfidenceReplySchema, data)) {
    return heuristicConfidence(text);
  }
  const reply: ConfidenceReply = data;
  return {
    confidenceScore: clamp(reply.confidence_score, 0, 1),
    reasoning: reply.reasoning ?? '',
    source: 'structured',
  };
}
