import { describe, it, expect } from 'vitest';
import { QuestionRequest } from '../models/types';
import { InterviewerAgent } from '../services/ai/interviewerAgent';
import { ProfilerAgent } from '../services/ai/profilerAgent';
import { ResearchAgent, personaFromStrategy } from '../services/ai/researchAgent';
import { CollaboratorError } from '../utils/errors';
import { PROFILE, ScriptedLlm } from './fakes';

const questionRequest: QuestionRequest = {
  stage: 'technical',
  persona: 'challenging',
  topic: 2,
  intensify: false,
  company: 'Acme Corp',
  role: 'Backend Engineer',
  profile: PROFILE,
  companyIntel: 'Acme Corp values ownership.',
  strategy: 'Probe database design.',
  history: [{ questionNumber: 1, question: 'Tell me about the ledger.', answer: 'I built it.', score: 4 }],
  previous: { question: 'Tell me about the ledger.', answer: 'I built it.', score: 4, weaknesses: 'Vague', tip: 'Add numbers' },
};

describe('InterviewerAgent', () => {
  it('strips a label and quotes from the generated question', async () => {
    const agent = new InterviewerAgent(new ScriptedLlm(['Question: "How would you index the ledger table?"']));
    await expect(agent.generateQuestion(questionRequest)).resolves.toBe('How would you index the ledger table?');
  });

  it('asks for a new topic after a normal answer', async () => {
    const llm = new ScriptedLlm(['Next question?']);
    await new InterviewerAgent(llm).generateQuestion(questionRequest);

    const prompt = llm.calls[0].messages[1].content;
    expect(prompt).toContain('**Stage:** TECHNICAL (topic 2)');
    expect(prompt).toContain('Previous answer scored 4/10. Coaching note: Add numbers. Move to a NEW topic.');
    expect(prompt).not.toContain('Pushback Required');
  });

  it('asks to rephrase the same question when intensifying', async () => {
    const llm = new ScriptedLlm(['Be specific: which index?']);
    await new InterviewerAgent(llm).generateQuestion({ ...questionRequest, intensify: true });

    const prompt = llm.calls[0].messages[1].content;
    expect(prompt).toContain('**Pushback Required:**');
    expect(prompt).toContain('That answer scored 4/10. Weaknesses: Vague.');
  });

  it('wraps failures as question collaborator errors', async () => {
    const agent = new InterviewerAgent(new ScriptedLlm([new Error('rate limited')]));
    const error = await agent.generateQuestion(questionRequest).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CollaboratorError);
    if (error instanceof CollaboratorError) {
      expect(error.collaborator).toBe('question');
      expect(error.message).toBe('Question generation failed: rate limited');
    }
  });
});

describe('ProfilerAgent', () => {
  const input = { resumeText: 'Go and TypeScript engineer.', jobDescription: 'Node.js backend role.' };

  it('maps the analysis to camelCase and cleans the lists', async () => {
    const agent = new ProfilerAgent(
      new ScriptedLlm([
        '{"matched_skills": ["TypeScript", " TypeScript ", 3], "missing_skills": ["Kafka"], "strengths": ["APIs"], "weaknesses": [], "experience_level": "Senior"}',
      ])
    );

    await expect(agent.analyzeProfile(input)).resolves.toEqual({
      matchedSkills: ['TypeScript'],
      missingSkills: ['Kafka'],
      strengths: ['APIs'],
      weaknesses: [],
      experienceLevel: 'senior',
      redFlags: [],
    });
  });

  it('falls back to unknown for an unrecognised experience level', async () => {
    const agent = new ProfilerAgent(new ScriptedLlm(['{"experience_level": "principal"}']));
    const profile = await agent.analyzeProfile(input);
    expect(profile.experienceLevel).toBe('unknown');
  });

  it('rejects output that is not a JSON object', async () => {
    const agent = new ProfilerAgent(new ScriptedLlm(['Sorry, I cannot help with that.']));
    await expect(agent.analyzeProfile(input)).rejects.toThrow('Profile analysis returned malformed JSON');
  });
});

describe('ResearchAgent', () => {
  it('reads the persona from the strategy text', () => {
    expect(personaFromStrategy('Be SUPPORTIVE early, then challenging.')).toBe('supportive');
    expect(personaFromStrategy('Adopt a challenging tone.')).toBe('challenging');
    expect(personaFromStrategy('Keep it professional.')).toBe('neutral');
  });

  it('returns trimmed intel and a strategy with its persona', async () => {
    const agent = new ResearchAgent(
      new ScriptedLlm(['  Acme Corp favours pragmatic engineers.  ', 'Use a challenging persona and start with APIs.'])
    );

    await expect(agent.researchCompany('Acme Corp')).resolves.toBe('Acme Corp favours pragmatic engineers.');
    await expect(
      agent.planStrategy({ company: 'Acme Corp', profile: PROFILE, companyIntel: 'Acme Corp favours pragmatic engineers.' })
    ).resolves.toEqual({
      strategy: 'Use a challenging persona and start with APIs.',
      persona: 'challenging',
    });
  });

  it('names the failing step', async () => {
    const agent = new ResearchAgent(new ScriptedLlm([new Error('offline'), new Error('offline')]));
    await expect(agent.researchCompany('Acme Corp')).rejects.toThrow('Company research failed: offline');
    await expect(
      agent.planStrategy({ company: 'Acme Corp', profile: null, companyIntel: '' })
    ).rejects.toThrow('Strategy planning failed: offline');
  });
});
