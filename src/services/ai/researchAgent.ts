import { Persona, ProfileAnalysis, ResearchSource, StrategyPlan } from '../../models/types';
import { CollaboratorError, describeError } from '../../utils/errors';
import { LlmClient, groqLlmClient } from './llmClient';

/**
 * Reads the interviewer persona out of a free-text strategy. The first
 * persona word found wins, in the order supportive, challenging.
 */
export function personaFromStrategy(strategy: string): Persona {
  const lower = strategy.toLowerCase();
  if (lower.includes('supportive')) return 'supportive';
  if (lower.includes('challenging')) return 'challenging';
  return 'neutral';
}

export class ResearchAgent implements ResearchSource {
  constructor(private readonly llm: LlmClient = groqLlmClient) {}

  async researchCompany(company: string): Promise<string> {
    try {
      const response = await this.llm.complete(
        [
          { role: 'system', content: 'You brief interviewers on the companies they hire for.' },
          {
            role: 'user',
            content: `
Summarize what a candidate interviewing at ${company} should know, in 3-4 sentences:
- Culture and values
- Interview style (technical vs behavioral focus)
- What they look for in candidates

Be specific. If you do not know the company, say what is typical for its industry.
            `.trim(),
          },
        ],
        { temperature: 0.3, maxTokens: 400 }
      );
      return response.trim();
    } catch (error) {
      throw new CollaboratorError('research', `Company research failed: ${describeError(error)}`, error);
    }
  }

  async planStrategy(input: {
    company: string;
    profile: ProfileAnalysis | null;
    companyIntel: string;
  }): Promise<StrategyPlan> {
    const profile = input.profile;
    try {
      const response = await this.llm.complete(
        [
          { role: 'system', content: 'You design realistic interview plans.' },
          {
            role: 'user',
            content: `
**Candidate Profile:**
- Matched skills: ${profile?.matchedSkills.join(', ') || 'unknown'}
- Missing skills: ${profile?.missingSkills.join(', ') || 'unknown'}
- Experience level: ${profile?.experienceLevel ?? 'unknown'}
- Areas to dig into: ${profile?.weaknesses.join(', ') || 'unknown'}

**Company Context (${input.company}):**
${input.companyIntel}

Write a concise interview strategy (3-4 sentences) that states:
1. Which persona the interviewer should adopt: supportive, neutral or challenging
2. The order of topics
3. Which weaknesses to dig into
            `.trim(),
          },
        ],
        { temperature: 0.4, maxTokens: 400 }
      );

      const strategy = response.trim();
      return { strategy, persona: personaFromStrategy(strategy) };
    } catch (error) {
      throw new CollaboratorError('strategy', `Strategy planning failed: ${describeError(error)}`, error);
    }
  }
}

export const researchAgent = new ResearchAgent();
