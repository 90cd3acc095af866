/**
 * @relaygate/escalation - Request routing entry point
 *
 * @packageDocumentation
 */

export {
  INTENTS,
  SYSTEM_PROMPTS,
  detectIntent,
  isIntent,
  systemPromptFor,
  type Intent,
} from './intent.js';
export {
  EscalationController,
  RequestLifecycle,
  bestAttempt,
  type AttemptDecision,
  type AttemptRecord,
  type EscalationControllerOptions,
  type RouteRejection,
  type RouteResult,
} from './controller.js';
export {
  RoutingService,
  PRUNE_JOB_ID,
  deriveOverallStatus,
  type HealthReport,
  type OverallStatus,
  type ProviderStatus,
  type RouteInput,
  type RoutingServiceOptions,
} from './service.js';
export { unwrapAnswer } from './unwrap.js';
