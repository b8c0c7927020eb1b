import { describe, it, expect } from 'vitest';
import { Turn } from '../models/types';
import {
  appendTurn,
  createSessionState,
  mean,
  overallScore,
  recentScores,
  transcript,
} from '../services/interview-orchestrator/sessionState';
import { SETUP } from './fakes';

function turn(questionNumber: number, score: number): Turn {
  return {
    questionNumber,
    topic: questionNumber,
    stage: 'technical',
    question: `Q${questionNumber}`,
    answer: `A${questionNumber}`,
    answerLength: 2,
    score,
    strengths: '',
    weaknesses: '',
    tip: '',
    sentiment: 'neutral',
    timestamp: '2026-01-05T10:00:00.000Z',
    skipped: false,
    evaluationDegraded: false,
    decision: null,
    topicFailed: false,
    persisted: false,
  };
}

describe('createSessionState()', () => {
  it('trims the setup and starts in INIT', () => {
    const state = createSessionState(
      { ...SETUP, candidateName: '  Test Candidate  ', role: '  ' },
      new Date('2026-01-05T10:00:00.000Z')
    );

    expect(state.candidateName).toBe('Test Candidate');
    expect(state.role).toBe('Engineering Role');
    expect(state.company).toBe('Acme Corp');
    expect(state.resumeLength).toBe(SETUP.resumeText.length);
    expect(state.startTime).toBe('2026-01-05T10:00:00.000Z');
    expect(state.phase).toBe('INIT');
    expect(state.stage).toBe('intro');
    expect(state.persona).toBe('neutral');
    expect(state.sessionId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('keeps a given role', () => {
    expect(createSessionState({ ...SETUP, role: 'Staff Engineer' }).role).toBe('Staff Engineer');
  });
});

describe('appendTurn()', () => {
  it('rejects a question number that does not increase', () => {
    const state = createSessionState(SETUP);
    appendTurn(state, turn(1, 5));
    expect(() => appendTurn(state, turn(1, 6))).toThrow('Question numbers must increase: got 1 after 1');
  });
});

describe('score helpers', () => {
  it('averages every score and windows the most recent three', () => {
    const state = createSessionState(SETUP);
    [9, 9, 9, 2, 2, 2].forEach((score, index) => appendTurn(state, turn(index + 1, score)));

    expect(recentScores(state)).toEqual([2, 2, 2]);
    expect(overallScore(state)).toBe(5.5);
  });

  it('returns 0 for an empty mean', () => {
    expect(mean([])).toBe(0);
  });

  it('keeps the overall score unrounded', () => {
    const state = createSessionState(SETUP);
    [7, 8, 8].forEach((score, index) => appendTurn(state, turn(index + 1, score)));
    expect(overallScore(state)).toBe(23 / 3);
  });

  it('builds a transcript from the turns', () => {
    const state = createSessionState(SETUP);
    appendTurn(state, turn(1, 4));
    expect(transcript(state)).toEqual([{ questionNumber: 1, question: 'Q1', answer: 'A1', score: 4 }]);
  });
});
