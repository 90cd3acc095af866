/**
 * @relaygate/verification - Two-judge quality gate
 *
 * @packageDocumentation
 */

export { buildSafetyPrompt, buildConfidencePrompt, type JudgePromptInput } from './prompts.js';
export {
  extractJsonObject,
  parseSafetyReply,
  parseConfidenceReply,
  heuristicSafety,
  heuristicConfidence,
  HEURISTIC_SAFE_SCORE,
  HEURISTIC_UNSAFE_SCORE,
  HEURISTIC_DEFAULT_CONFIDENCE,
  type ParseSource,
  type ParsedSafety,
  type ParsedConfidence,
} from './parsing.js';
export { callJudge, type JudgeCall, type JudgeCallContext, type JudgeDeps } from './judge.js';
export {
  SafetyVerifier,
  isEffectivelySafe,
  failedVerification,
  VERIFICATION_ERROR_ISSUE,
  type SafetyOutcome,
  type SafetyVerifierOptions,
} from './safety.js';
export {
  ConfidenceScorer,
  recommendedActionFor,
  failedConfidence,
  type ConfidenceOutcome,
  type ConfidenceScorerOptions,
} from './confidence.js';
export {
  VerificationPipeline,
  decide,
  type Verdict,
  type VerificationInput,
  type VerificationOutcome,
  type VerificationPipelineOptions,
} from './pipeline.js';
