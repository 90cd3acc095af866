/**
 * E2E Tests for the escalation pipeline
 *
 * Drives RoutingService.route() through the real Router, Execution Client,
 * Verification Pipeline and Escalation Controller. Every backend, judges
 * included, is a scripted adapter.
 */
import { describe, it, expect, vi } from 'vitest';
import {
  NoProviderAvailableError,
  RelaygateError,
  RequestCancelledError,
  TransportError,
  VerificationRejectedError,
  type RelaygateConfig,
} from '@relaygate/core';
import type { RequestSummary } from '@relaygate/routing';
import { RequestLifecycle, RoutingService, SYSTEM_PROMPTS, unwrapAnswer } from '@relaygate/escalation';
import {
  ScriptedAdapter,
  confidenceReply,
  lookupFrom,
  safetyReply,
  testConfig,
  type Step,
} from '../helpers/fakes.js';

vi.mock('pino', () => {
  const make = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), fatal: vi.fn(), trace: vi.fn() });
  return { default: make, pino: make };
});

// ---------------------------------------------------------------------------
// Harness
// ---------------------------------------------------------------------------

interface Backends {
  gemma: ScriptedAdapter;
  phi3: ScriptedAdapter;
  qwen: ScriptedAdapter;
  mistral: ScriptedAdapter;
  safety: ScriptedAdapter;
  confidence: ScriptedAdapter;
}

interface HarnessOptions {
  answers?: Partial<Record<'gemma' | 'phi3' | 'qwen' | 'mistral', Step[]>>;
  safety?: Step[];
  confidence?: Step[];
  config?: (config: RelaygateConfig) => void;
}

function harness(options: HarnessOptions = {}): { service: RoutingService; backends: Backends } {
  const answer = (id: 'gemma' | 'phi3' | 'qwen' | 'mistral'): ScriptedAdapter =>
    new ScriptedAdapter(...(options.answers?.[id] ?? [{ text: `${id} answer` }]));

  const backends: Backends = {
    gemma: answer('gemma'),
    phi3: answer('phi3'),
    qwen: answer('qwen'),
    mistral: answer('mistral'),
    safety: new ScriptedAdapter(...(options.safety ?? [safetyReply(true, 0.9)])),
    confidence: new ScriptedAdapter(...(options.confidence ?? [confidenceReply(0.9)])),
  };

  const service = new RoutingService({
    config: testConfig(options.config),
    adapters: lookupFrom({
      gemma: backends.gemma,
      phi3: backends.phi3,
      qwen: backends.qwen,
      mistral: backends.mistral,
      'safety-judge': backends.safety,
      'confidence-judge': backends.confidence,
    }),
  });

  return { service, backends };
}

function answerCalls(backends: Backends): number {
  return backends.gemma.calls.length + backends.phi3.calls.length + backends.qwen.calls.length + backends.mistral.calls.length;
}

const lowCritical = (config: RelaygateConfig): void => {
  config.thresholds.confidenceCritical = 0.25;
};

describe('Escalation pipeline', () => {
  // ---------------------------------------------------------------------------
  // Accept
  // ---------------------------------------------------------------------------
  describe('acceptance', () => {
    it('accepts the first answer when both judges pass it', async () => {
      const { service, backends } = harness();

      const result = await service.route({ prompt: 'Tell me about the moon', requestId: 'req_accept' });

      expect(result.terminalState).toBe('accepted');
      expect(result.finalAnswer).toBe('gemma answer');
      expect(result.finalProvider).toBe('gemma');
      expect(result.originalProvider).toBe('gemma');
      expect(result.escalated).toBe(false);
      expect(result.bestEffort).toBe(false);
      expect(result.verification?.isSafe).toBe(true);
      expect(result.confidence).toEqual({ confidenceScore: 0.9, reasoning: 'scored 0.9', recommendedAction: 'accept' });
      expect(result.attemptHistory).toHaveLength(1);
      expect(result.attemptHistory[0]?.judgeAttempts.map((a) => a.purpose)).toEqual(['judge', 'judge']);
      expect(backends.phi3.calls).toHaveLength(0);
    });

    it('passes the intent system prompt to the answering backend', async () => {
      const { service, backends } = harness();

      const result = await service.route({ prompt: 'Write a function that adds two numbers' });

      expect(result.terminalState).toBe('accepted');
      expect(backends.gemma.calls[0]?.parameters.system).toBe(SYSTEM_PROMPTS.code);
    });

    it('keeps a caller-supplied system prompt', async () => {
      const { service, backends } = harness();

      await service.route({ prompt: 'hi', parameters: { system: 'Answer in French.', temperature: 0.1 } });

      expect(backends.gemma.calls[0]?.parameters).toEqual({ system: 'Answer in French.', temperature: 0.1 });
    });

    it('uses the configured attempt timeout for answers', async () => {
      const { service, backends } = harness({ config: (c) => (c.escalation.attemptTimeoutMs = 1234) });

      await service.route({ prompt: 'hi' });

      expect(backends.gemma.calls[0]?.timeoutMs).toBe(1234);
    });
  });

  // ---------------------------------------------------------------------------
  // Escalation determinism
  // ---------------------------------------------------------------------------
  describe('escalation', () => {
    it('walks gemma -> phi3 -> qwen for scores 0.3, 0.5, 0.9 and accepts qwen', async () => {
      const { service, backends } = harness({
        confidence: [confidenceReply(0.3), confidenceReply(0.5), confidenceReply(0.9)],
        config: lowCritical,
      });

      const result = await service.route({ prompt: 'Describe photosynthesis', requestId: 'req_ladder' });

      expect(result.attemptHistory.map((r) => r.attempt.providerId)).toEqual(['gemma', 'phi3', 'qwen']);
      expect(result.attemptHistory.map((r) => r.attempt.sequence)).toEqual([0, 1, 2]);
      expect(result.attemptHistory.map((r) => r.decision.kind)).toEqual(['escalate', 'escalate', 'accept']);
      expect(result.terminalState).toBe('accepted');
      expect(result.finalAnswer).toBe('qwen answer');
      expect(result.finalProvider).toBe('qwen');
      expect(result.originalProvider).toBe('gemma');
      expect(result.escalated).toBe(true);
      expect(backends.mistral.calls).toHaveLength(0);
    });

    it('rejects a 0.3 score under the default critical threshold', async () => {
      const { service, backends } = harness({ confidence: [confidenceReply(0.3)] });

      const result = await service.route({ prompt: 'Describe photosynthesis', requestId: 'req_low' });

      expect(result.terminalState).toBe('rejected');
      expect(result.finalAnswer).toBeNull();
      expect(result.rejection).toEqual({
        reason: 'low_confidence',
        providerId: 'gemma',
        message: 'The answer was rated too unreliable to return',
      });
      expect(answerCalls(backends)).toBe(1);
    });

    it('escalates past a backend that failed outright', async () => {
      const { service, backends } = harness({
        answers: { gemma: [{ error: new TransportError('connection refused') }] },
      });

      const result = await service.route({ prompt: 'hi' });

      expect(result.terminalState).toBe('accepted');
      expect(result.finalProvider).toBe('phi3');
      expect(result.attemptHistory[0]).toMatchObject({
        verification: null,
        confidence: null,
        decision: { kind: 'failed', outcome: 'transport_error' },
        judgeAttempts: [],
      });
      expect(backends.safety.calls).toHaveLength(1);
    });

    it('starts at an explicitly requested provider', async () => {
      const { service, backends } = harness();

      const result = await service.route({ prompt: 'hi', constraints: { providerId: 'qwen' } });

      expect(result.finalProvider).toBe('qwen');
      expect(backends.gemma.calls).toHaveLength(0);
    });
  });

  // ---------------------------------------------------------------------------
  // Exhaustion
  // ---------------------------------------------------------------------------
  describe('exhaustion', () => {
    it('stops after max escalations and returns the latest of equally scored answers', async () => {
      const { service, backends } = harness({ confidence: [confidenceReply(0.5)] });

      const result = await service.route({ prompt: 'Describe photosynthesis' });

      expect(result.terminalState).toBe('exhausted');
      expect(result.exhaustion).toBe('max_escalations');
      expect(result.attemptHistory.map((r) => r.attempt.providerId)).toEqual(['gemma', 'phi3', 'qwen']);
      expect(result.finalAnswer).toBe('qwen answer');
      expect(result.finalProvider).toBe('qwen');
      expect(result.bestEffort).toBe(true);
      expect(result.confidence?.confidenceScore).toBe(0.5);
      expect(backends.mistral.calls).toHaveLength(0);
    });

    it('returns the highest-confidence attempt', async () => {
      const { service } = harness({
        confidence: [confidenceReply(0.6), confidenceReply(0.45), confidenceReply(0.5)],
      });

      const result = await service.route({ prompt: 'Describe photosynthesis' });

      expect(result.terminalState).toBe('exhausted');
      expect(result.finalAnswer).toBe('gemma answer');
      expect(result.confidence?.confidenceScore).toBe(0.6);
    });

    it('bounds answer calls by maxEscalations + 1', async () => {
      for (const maxEscalations of [0, 1, 2, 3]) {
        const { service, backends } = harness({
          confidence: [confidenceReply(0.5)],
          config: (c) => (c.escalation.maxEscalations = maxEscalations),
        });

        const result = await service.route({ prompt: 'Describe photosynthesis' });

        expect(answerCalls(backends)).toBe(Math.min(maxEscalations + 1, 4));
        expect(result.attemptHistory).toHaveLength(Math.min(maxEscalations + 1, 4));
      }
    });

    it('ends at the top of the ladder', async () => {
      const { service } = harness({
        confidence: [confidenceReply(0.5)],
        config: (c) => (c.escalation.maxEscalations = 5),
      });

      const result = await service.route({ prompt: 'hi', constraints: { providerId: 'qwen' } });

      expect(result.exhaustion).toBe('top_of_ladder');
      expect(result.attemptHistory.map((r) => r.attempt.providerId)).toEqual(['qwen', 'mistral']);
    });

    it('ends instead of skipping an open rung', async () => {
      const { service, backends } = harness({
        answers: { phi3: [{ error: new TransportError('down') }] },
        confidence: [confidenceReply(0.5)],
      });
      for (let i = 0; i < 3; i++) await service.prober.probeOnce('phi3');

      const result = await service.route({ prompt: 'hi' });

      expect(result.terminalState).toBe('exhausted');
      expect(result.exhaustion).toBe('circuit_open');
      expect(result.finalAnswer).toBe('gemma answer');
      expect(backends.phi3.calls).toHaveLength(3);
      expect(backends.qwen.calls).toHaveLength(0);
    });

    it('returns no answer when every attempt failed', async () => {
      const down: Step[] = [{ error: new TransportError('down') }];
      const { service } = harness({ answers: { gemma: down, phi3: down, qwen: down } });

      const result = await service.route({ prompt: 'hi' });

      expect(result.terminalState).toBe('exhausted');
      expect(result.finalAnswer).toBeNull();
      expect(result.finalProvider).toBeNull();
      expect(result.verification).toBeNull();
      expect(unwrapAnswer(result)).toBeNull();
    });
  });

  // ---------------------------------------------------------------------------
  // Safety
  // ---------------------------------------------------------------------------
  describe('safety', () => {
    it('rejects an unsafe answer even at confidence 0.95', async () => {
      const { service, backends } = harness({
        safety: [safetyReply(false, 0.9, ['harmful_content'])],
        confidence: [confidenceReply(0.95)],
      });

      const result = await service.route({ prompt: 'hi', requestId: 'req_unsafe' });

      expect(result.terminalState).toBe('rejected');
      expect(result.rejection?.reason).toBe('unsafe');
      expect(result.finalAnswer).toBeNull();
      expect(result.confidence?.confidenceScore).toBe(0.95);
      expect(answerCalls(backends)).toBe(1);
      expect(() => unwrapAnswer(result)).toThrow(VerificationRejectedError);
    });

    it('rejects an answer the safety judge tags as a hallucination', async () => {
      const { service } = harness({
        answers: { gemma: [{ text: 'The moon is made of cheese.' }] },
        safety: [safetyReply(true, 0.9, ['hallucination'])],
        confidence: [confidenceReply(0.9)],
      });

      const result = await service.route({ prompt: 'What is the moon made of?' });

      expect(result.terminalState).toBe('rejected');
      expect(result.rejection?.reason).toBe('unsafe');
      expect(result.finalAnswer).toBeNull();
    });

    it('fails closed when the safety judge times out', async () => {
      const { service, backends } = harness({
        safety: [{ hang: true }],
        config: (c) => (c.judges.safety.timeoutMs = 30),
      });

      const result = await service.route({ prompt: 'hi' });

      expect(result.terminalState).toBe('rejected');
      expect(result.rejection?.reason).toBe('judge_failure');
      expect(result.verification?.issues).toEqual(['verification_error']);
      expect(backends.confidence.calls).toHaveLength(0);
    });

    it('surfaces the rejection reason through unwrapAnswer', async () => {
      const { service } = harness({ safety: [safetyReply(false, 0.1)] });

      const result = await service.route({ prompt: 'hi', requestId: 'req_unwrap' });
      const error = (() => {
        try {
          unwrapAnswer(result);
          return null;
        } catch (err) {
          return err;
        }
      })();

      expect(error).toBeInstanceOf(VerificationRejectedError);
      expect(error).toHaveProperty('reason', 'unsafe');
      expect(error).toHaveProperty('requestId', 'req_unwrap');
      expect(error).toHaveProperty('message', 'The answer failed safety verification');
    });
  });

  // ---------------------------------------------------------------------------
  // Request-level failures
  // ---------------------------------------------------------------------------
  describe('request failures', () => {
    it('fails before any backend call when every circuit is open', async () => {
      const down: Step[] = [{ error: new TransportError('down') }];
      const { service, backends } = harness({ answers: { gemma: down, phi3: down, qwen: down, mistral: down } });
      for (const id of ['gemma', 'phi3', 'qwen', 'mistral']) {
        for (let i = 0; i < 3; i++) await service.prober.probeOnce(id);
      }
      const before = answerCalls(backends);
      const summaries: RequestSummary[] = [];
      service.metrics.on('request', (summary: RequestSummary) => summaries.push(summary));

      await expect(service.route({ prompt: 'hi', requestId: 'req_none' })).rejects.toBeInstanceOf(NoProviderAvailableError);

      expect(answerCalls(backends)).toBe(before);
      expect(backends.safety.calls).toHaveLength(0);
      expect(summaries.map((s) => [s.requestId, s.terminalState])).toEqual([['req_none', 'failed']]);
    });

    it('rejects an empty prompt', async () => {
      const { service } = harness();

      const error = await service.route({ prompt: '   ' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RelaygateError);
      expect(error).toHaveProperty('code', 'INVALID_REQUEST');
    });

    it('cancels a request in flight', async () => {
      const { service, backends } = harness({ answers: { gemma: [{ hang: true }] } });
      const controller = new AbortController();

      const pending = service.route({ prompt: 'hi', requestId: 'req_cancel', signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(RequestCancelledError);
      expect(backends.safety.calls).toHaveLength(0);
      expect(backends.phi3.calls).toHaveLength(0);
    });

    it('does not start a request whose signal is already aborted', async () => {
      const { service, backends } = harness();
      const controller = new AbortController();
      controller.abort();

      await expect(service.route({ prompt: 'hi', signal: controller.signal })).rejects.toBeInstanceOf(
        RequestCancelledError,
      );
      expect(answerCalls(backends)).toBe(0);
    });
  });
});

describe('RequestLifecycle', () => {
  it('moves to exactly one terminal state', () => {
    const lifecycle = new RequestLifecycle('req_1');
    expect(lifecycle.state).toBe('running');

    lifecycle.finish('accepted');

    expect(lifecycle.terminal).toBe(true);
    expect(() => lifecycle.finish('exhausted')).toThrow('Request "req_1" is already accepted');
    expect(lifecycle.state).toBe('accepted');
  });
});
