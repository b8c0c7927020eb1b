import { InterviewStage, Persona, QuestionRequest, QuestionSource } from '../../models/types';
import { CollaboratorError, describeError } from '../../utils/errors';
import { LlmClient, groqLlmClient } from './llmClient';

const STAGE_INSTRUCTIONS: Record<InterviewStage, string> = {
  intro:
    'Open with a targeted question about their hands-on experience with one key skill from the job description. Avoid "tell me about yourself".',
  technical:
    'Ask one demanding technical question aimed at an area to dig into. Ask for design reasoning, trade-offs or complexity, specific to the role.',
  behavioral:
    'Ask one behavioral question about a real situation (a failure, a conflict, a missed deadline). Expect names, numbers and outcomes.',
  closing:
    'Ask how they would close one of their skill gaps for this role, or what they would do in their first 90 days. Be direct.',
  complete: 'Thank the candidate and close the interview.',
};

const PERSONA_TONES: Record<Persona, string> = {
  supportive:
    'Professional and encouraging. If they struggle, guide them with a leading question, but never give the answer away.',
  neutral: 'A standard interviewer: professional, probing for depth, no small talk.',
  challenging:
    'A tough senior interviewer. Blunt about vague answers and insistent on technical precision.',
};

export class InterviewerAgent implements QuestionSource {
  constructor(private readonly llm: LlmClient = groqLlmClient) {}

  async generateQuestion(request: QuestionRequest): Promise<string> {
    try {
      const response = await this.llm.complete(
        [
          { role: 'system', content: this.buildSystemPrompt(request) },
          { role: 'user', content: this.buildQuestionPrompt(request) },
        ],
        { temperature: 0.7, maxTokens: 400 }
      );

      return this.cleanQuestion(response);
    } catch (error) {
      throw new CollaboratorError('question', `Question generation failed: ${describeError(error)}`, error);
    }
  }

  private buildSystemPrompt(request: QuestionRequest): string {
    return `
You are interviewing a candidate for the ${request.role} position at ${request.company}.

[Company Context]
${request.companyIntel || 'No company research available.'}

[Interview Strategy]
${request.strategy || 'Cover intro, technical, behavioral and closing topics in order.'}

[Persona]
${PERSONA_TONES[request.persona]}

[Interviewer Behavior]
- Ask exactly one question at a time
- Never answer your own question
- Return ONLY the question or statement, no preamble
    `.trim();
  }

  private buildQuestionPrompt(request: QuestionRequest): string {
    const profile = request.profile;
    const profileText = profile
      ? `Strengths: ${profile.strengths.join(', ') || 'n/a'}
Areas to dig into: ${profile.weaknesses.join(', ') || 'n/a'}
Missing skills: ${profile.missingSkills.join(', ') || 'n/a'}`
      : 'No profile analysis available.';

    const historyText = request.history
      .slice(-4)
      .map((entry) => `Q${entry.questionNumber}: ${entry.question}\nA: ${entry.answer || '(no answer)'}`)
      .join('\n\n');

    const sections = [
      `**Stage:** ${request.stage.toUpperCase()} (topic ${request.topic})`,
      `**Instruction:** ${STAGE_INSTRUCTIONS[request.stage]}`,
      `**Candidate Profile:**\n${profileText}`,
    ];

    if (historyText) {
      sections.push(`**Recent Transcript:**\n${historyText}`);
    }

    if (request.intensify && request.previous) {
      sections.push(
        `
**Pushback Required:**
You asked: "${request.previous.question}"
The candidate answered: "${request.previous.answer || '(no answer)'}"
That answer scored ${request.previous.score}/10. Weaknesses: ${request.previous.weaknesses || 'too vague'}.

Do NOT move to a new topic. Rephrase the SAME question and demand specifics:
what they personally did, the concrete implementation, and measurable outcomes.
        `.trim()
      );
    } else if (request.previous) {
      sections.push(
        `Previous answer scored ${request.previous.score}/10. Coaching note: ${request.previous.tip || 'none'}. Move to a NEW topic.`
      );
    }

    return sections.join('\n\n');
  }

  private cleanQuestion(response: string): string {
    return response
      .trim()
      .replace(/^(question|interviewer)\s*:\s*/i, '')
      .replace(/^["“](.*)["”]$/s, '$1')
      .trim();
  }
}

export const interviewerAgent = new InterviewerAgent();
