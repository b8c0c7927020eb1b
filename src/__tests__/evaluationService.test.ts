import { describe, it, expect } from 'vitest';
import { EvaluationService } from '../services/evaluation/evaluationService';
import { CollaboratorError } from '../utils/errors';
import { ScriptedLlm } from './fakes';

const request = {
  question: 'How would you design an idempotent payments endpoint?',
  answer: 'Clients send an idempotency key that we store with the result.',
  stage: 'technical' as const,
};

describe('EvaluationService', () => {
  describe('scoreAnswer()', () => {
    it('parses a fenced judgment and normalizes its fields', async () => {
      const llm = new ScriptedLlm([
        '```json\n{"score": "7/10", "strengths": ["Clear", "Correct"], "weaknesses": "No failure cases", "tip": " Mention retries ", "sentiment": "Confident"}\n```',
      ]);
      const service = new EvaluationService(llm);

      await expect(service.scoreAnswer(request)).resolves.toEqual({
        score: 7,
        strengths: 'Clear; Correct',
        weaknesses: 'No failure cases',
        tip: 'Mention retries',
        sentiment: 'confident',
      });
      expect(llm.calls[0].options).toEqual({ temperature: 0.2, maxTokens: 600, json: true });
    });

    it('defaults missing text fields and sentiment', async () => {
      const service = new EvaluationService(new ScriptedLlm(['{"score": 3}']));

      await expect(service.scoreAnswer(request)).resolves.toEqual({
        score: 3,
        strengths: '',
        weaknesses: '',
        tip: '',
        sentiment: 'neutral',
      });
    });

    it('includes the non-verbal signal in the prompt when given', async () => {
      const llm = new ScriptedLlm(['{"score": 6}']);
      await new EvaluationService(llm).scoreAnswer({ ...request, nonVerbalSignal: 'long pauses' });

      expect(llm.calls[0].messages[1].content).toContain('**Non-verbal Observations:**\nlong pauses');
    });

    it('rejects a score outside 0-10', async () => {
      const service = new EvaluationService(new ScriptedLlm(['{"score": 14}']));

      const error = await service.scoreAnswer(request).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(CollaboratorError);
      if (error instanceof CollaboratorError) {
        expect(error.collaborator).toBe('scoring');
        expect(error.message).toContain('Scoring response did not match the judgment schema: score');
      }
    });

    it('rejects a response with no JSON object', async () => {
      const service = new EvaluationService(new ScriptedLlm(['I would give this a seven.']));
      await expect(service.scoreAnswer(request)).rejects.toBeInstanceOf(CollaboratorError);
    });

    it('wraps a failed call', async () => {
      const service = new EvaluationService(new ScriptedLlm([new Error('503 Service Unavailable')]));
      await expect(service.scoreAnswer(request)).rejects.toThrow('Scoring call failed: 503 Service Unavailable');
    });
  });

  describe('generateReport()', () => {
    const reportRequest = {
      candidateName: 'Test Candidate',
      company: 'Acme Corp',
      role: 'Backend Engineer',
      turns: [],
      profile: null,
      overallScore: 6.5,
      terminationReason: null,
    };

    it('returns verdict and roadmap, joining a list roadmap', async () => {
      const service = new EvaluationService(
        new ScriptedLlm(['{"verdict": " Solid mid-level candidate. ", "roadmap": ["1. Practice system design", "2. Quantify impact"]}'])
      );

      await expect(service.generateReport(reportRequest)).resolves.toEqual({
        verdict: 'Solid mid-level candidate.',
        roadmap: '1. Practice system design; 2. Quantify impact',
      });
    });

    it('rejects a report without a verdict', async () => {
      const service = new EvaluationService(new ScriptedLlm(['{"roadmap": "1. Practice"}']));
      await expect(service.generateReport(reportRequest)).rejects.toThrow(
        'Report response was not valid JSON with verdict and roadmap'
      );
    });
  });
});
