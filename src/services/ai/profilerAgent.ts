import { ProfileAnalysis, ProfileSource } from '../../models/types';
import { profileAnalysisSchema } from '../../schemas/profile.schema';
import { CollaboratorError, describeError } from '../../utils/errors';
import { extractJsonObject } from '../../utils/jsonExtract';
import { LlmClient, groqLlmClient } from './llmClient';

export class ProfilerAgent implements ProfileSource {
  constructor(private readonly llm: LlmClient = groqLlmClient) {}

  async analyzeProfile(input: { resumeText: string; jobDescription: string }): Promise<ProfileAnalysis> {
    let response: string;
    try {
      response = await this.llm.complete(
        [
          {
            role: 'system',
            content: 'You are an expert talent analyst comparing a resume against a job description.',
          },
          { role: 'user', content: this.buildProfilePrompt(input.resumeText, input.jobDescription) },
        ],
        { temperature: 0.2, maxTokens: 1200, json: true }
      );
    } catch (error) {
      throw new CollaboratorError('profile', `Profile analysis failed: ${describeError(error)}`, error);
    }

    const parsed = profileAnalysisSchema.safeParse(extractJsonObject(response));
    if (!parsed.success) {
      throw new CollaboratorError('profile', 'Profile analysis returned malformed JSON');
    }

    return {
      matchedSkills: parsed.data.matched_skills,
      missingSkills: parsed.data.missing_skills,
      strengths: parsed.data.strengths,
      weaknesses: parsed.data.weaknesses,
      experienceLevel: parsed.data.experience_level,
      redFlags: parsed.data.red_flags,
    };
  }

  private buildProfilePrompt(resumeText: string, jobDescription: string): string {
    return `
**Resume:**
${resumeText}

**Job Description:**
${jobDescription}

**Return JSON ONLY with these keys:**

{
  "matched_skills": ["skills the candidate has that the job asks for"],
  "missing_skills": ["skills the job asks for that the resume does not show"],
  "strengths": ["top 3 strong points"],
  "weaknesses": ["top 3 areas to dig into"],
  "experience_level": "junior | mid | senior",
  "red_flags": ["concerns such as unexplained gaps"]
}
    `.trim();
  }
}

export const profilerAgent = new ProfilerAgent();
