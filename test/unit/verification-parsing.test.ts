/**
 * Unit Tests for judge reply parsing
 *
 * Tests JSON extraction, structured replies and the indicator-phrase
 * heuristics used when a judge does not answer in JSON.
 */
import { describe, it, expect } from 'vitest';
import {
  extractJsonObject,
  heuristicConfidence,
  heuristicSafety,
  parseConfidenceReply,
  parseSafetyReply,
} from '@relaygate/verification';

describe('extractJsonObject', () => {
  it('returns the first balanced object inside prose', () => {
    expect(extractJsonObject('Sure: {"a": {"b": 1}} and more {"c": 2}')).toBe('{"a": {"b": 1}}');
  });

  it('ignores braces inside string literals', () => {
    expect(extractJsonObject('x {"s": "}{", "n": 1} y')).toBe('{"s": "}{", "n": 1}');
  });

  it('honours escaped quotes', () => {
    expect(extractJsonObject('{"s": "a\\"}"}')).toBe('{"s": "a\\"}"}');
  });

  it('returns null without a complete object', () => {
    expect(extractJsonObject('no json here')).toBeNull();
    expect(extractJsonObject('{"a": 1')).toBeNull();
  });
});

describe('parseSafetyReply', () => {
  it('reads a structured reply and clamps the score', () => {
    expect(parseSafetyReply('Here you go:\n{"is_safe": true, "safety_score": 1.4, "issues": []}')).toEqual({
      isSafe: true,
      safetyScore: 1,
      issues: [],
      explanation: '',
      source: 'structured',
    });
  });

  it('keeps reported issues and explanation', () => {
    const parsed = parseSafetyReply(
      '{"is_safe": false, "safety_score": 0.2, "issues": ["hallucination"], "explanation": "Invented a citation."}',
    );

    expect(parsed).toEqual({
      isSafe: false,
      safetyScore: 0.2,
      issues: ['hallucination'],
      explanation: 'Invented a citation.',
      source: 'structured',
    });
  });

  it('falls back to heuristics when fields have the wrong type', () => {
    expect(parseSafetyReply('{"is_safe": "yes", "safety_score": 0.9}').source).toBe('heuristic');
  });
});

describe('heuristicSafety', () => {
  it('accepts a reply with a positive indicator and no negatives', () => {
    expect(heuristicSafety('  The answer is safe and appropriate.  ')).toEqual({
      isSafe: true,
      safetyScore: 0.8,
      issues: [],
      explanation: 'The answer is safe and appropriate.',
      source: 'heuristic',
    });
  });

  it('tags every negative indicator found', () => {
    const parsed = heuristicSafety('This contains harmful and biased claims.');

    expect(parsed.isSafe).toBe(false);
    expect(parsed.safetyScore).toBe(0.3);
    expect(parsed.issues).toEqual(['harmful_content', 'bias']);
  });

  it('lets "not safe" win over the positive indicator', () => {
    const parsed = heuristicSafety('This is not safe.');

    expect(parsed.isSafe).toBe(false);
    expect(parsed.issues).toEqual(['unsafe']);
  });

  it('treats a reply with no indicators as unsafe', () => {
    const parsed = heuristicSafety('I cannot tell.');

    expect(parsed.isSafe).toBe(false);
    expect(parsed.issues).toEqual([]);
  });

  it('truncates long explanations', () => {
    expect(heuristicSafety(`safe ${'x'.repeat(300)}`).explanation).toHaveLength(200);
  });
});

describe('parseConfidenceReply', () => {
  it('reads a structured reply', () => {
    expect(parseConfidenceReply('{"confidence_score": 0.72, "reasoning": "fine"}')).toEqual({
      confidenceScore: 0.72,
      reasoning: 'fine',
      source: 'structured',
    });
  });

  it('clamps out-of-range scores', () => {
    expect(parseConfidenceReply('{"confidence_score": -0.5}').confidenceScore).toBe(0);
  });

  it('falls back to heuristics for prose', () => {
    expect(parseConfidenceReply('A reasonable answer.')).toEqual({
      confidenceScore: 0.7,
      reasoning: 'A reasonable answer.',
      source: 'heuristic',
    });
  });
});

describe('heuristicConfidence', () => {
  it.each([
    ['The answer is inadequate.', 0.2],
    ['Poor coverage of the topic.', 0.2],
    ['Incomplete but good.', 0.4],
    ['Excellent, thorough answer.', 0.85],
    ['A very good explanation.', 0.85],
    ['Adequate.', 0.7],
    ['Hard to say.', 0.5],
    ['This answer is not good; it is wrong.', 0.2],
    ['Not a reasonable reply.', 0.2],
    ['Not very strong.', 0.2],
  ])('scores %j as %d', (text, score) => {
    expect(heuristicConfidence(text).confidenceScore).toBe(score);
  });
});
