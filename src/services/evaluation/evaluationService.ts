import {
  AnswerJudgment,
  ReportContent,
  ReportRequest,
  ReportSource,
  ScoringRequest,
  ScoringSource,
} from '../../models/types';
import { answerJudgmentSchema, reportSchema } from '../../schemas/evaluation.schema';
import { CollaboratorError, describeError } from '../../utils/errors';
import { extractJsonObject } from '../../utils/jsonExtract';
import { LlmClient, groqLlmClient } from '../ai/llmClient';

export class EvaluationService implements ScoringSource, ReportSource {
  constructor(private readonly llm: LlmClient = groqLlmClient) {}

  async scoreAnswer(request: ScoringRequest): Promise<AnswerJudgment> {
    let response: string;
    try {
      response = await this.llm.complete(
        [
          {
            role: 'system',
            content: 'You are a silent interview coach. Score answers honestly; do not be kind to weak answers.',
          },
          { role: 'user', content: this.buildScoringPrompt(request) },
        ],
        { temperature: 0.2, maxTokens: 600, json: true }
      );
    } catch (error) {
      throw new CollaboratorError('scoring', `Scoring call failed: ${describeError(error)}`, error);
    }

    const parsed = answerJudgmentSchema.safeParse(extractJsonObject(response));
    if (!parsed.success) {
      throw new CollaboratorError(
        'scoring',
        `Scoring response did not match the judgment schema: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'root'} ${issue.message}`)
          .join(', ')}`
      );
    }

    return parsed.data;
  }

  async generateReport(request: ReportRequest): Promise<ReportContent> {
    let response: string;
    try {
      response = await this.llm.complete(
        [
          {
            role: 'system',
            content: 'You are an expert interviewer writing constructive, honest feedback after a mock interview.',
          },
          { role: 'user', content: this.buildReportPrompt(request) },
        ],
        { temperature: 0.3, maxTokens: 2000, json: true }
      );
    } catch (error) {
      throw new CollaboratorError('report', `Report generation failed: ${describeError(error)}`, error);
    }

    const parsed = reportSchema.safeParse(extractJsonObject(response));
    if (!parsed.success) {
      throw new CollaboratorError('report', 'Report response was not valid JSON with verdict and roadmap');
    }

    return parsed.data;
  }

  private buildScoringPrompt(request: ScoringRequest): string {
    const nonVerbal = request.nonVerbalSignal?.trim()
      ? `\n**Non-verbal Observations:**\n${request.nonVerbalSignal.trim()}\n`
      : '';

    return `
**Interview Stage:** ${request.stage}

**Question:**
${request.question}

**Answer:**
${request.answer}
${nonVerbal}
Evaluate with the STAR method for behavioral answers and clear reasoning for technical ones:
1. Did they answer the question that was asked?
2. Was it structured, specific and backed by concrete detail?
3. Was it too brief or rambling? Any red flags?

A weak or off-topic answer scores 1-3. An excellent answer scores 9-10.

**Respond in JSON format ONLY:**

{"score": 7, "strengths": "Clear structure", "weaknesses": "Missing specific examples", "tip": "Use concrete metrics", "sentiment": "confident"}
    `.trim();
  }

  private buildReportPrompt(request: ReportRequest): string {
    const answers = request.turns
      .map((turn) => {
        const flags = [
          turn.skipped ? 'skipped' : null,
          turn.evaluationDegraded ? 'evaluation degraded' : null,
        ].filter(Boolean);
        return `Q${turn.questionNumber} [${turn.stage}] score ${turn.score}/10${
          flags.length ? ` (${flags.join(', ')})` : ''
        }
Question: ${turn.question}
Answer: ${turn.answer || '(no answer)'}
Strengths: ${turn.strengths || 'n/a'} | Weaknesses: ${turn.weaknesses || 'n/a'}`;
      })
      .join('\n\n');

    return `
Candidate ${request.candidateName} interviewed for ${request.role} at ${request.company}.

**Overall Score:** ${request.overallScore.toFixed(1)}/10
${request.terminationReason ? `**Interview ended early:** ${request.terminationReason}\n` : ''}
**Profile Strengths:** ${request.profile?.strengths.join(', ') || 'n/a'}
**Profile Gaps:** ${request.profile?.missingSkills.join(', ') || 'n/a'}

**Answer-by-answer:**
${answers || 'No answers were given.'}

**Provide the report in JSON format ONLY:**

{
  "verdict": "One paragraph overall assessment ending with a hire / no-hire style recommendation",
  "roadmap": "Numbered list of specific things to practice before the next interview"
}
    `.trim();
  }
}

// Export singleton instance
export const evaluationService = new EvaluationService();
