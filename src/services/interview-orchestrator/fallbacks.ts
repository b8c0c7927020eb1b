import { InterviewStage, ProfileAnalysis, ReportContent, Turn } from '../../models/types';

export const FALLBACK_QUESTIONS: Record<InterviewStage, string> = {
  intro: 'Walk me through the most relevant project on your resume for this role. What was your part in it?',
  technical:
    'Describe a technical problem you solved recently. What options did you consider, and why did you pick the one you shipped?',
  behavioral:
    'Tell me about a time a project did not go as planned. What happened, what did you do, and what was the result?',
  closing: 'Which skill for this role are you least experienced in, and how would you get up to speed?',
  complete: 'Thank you for your time today. That concludes the interview.',
};

export const PUSHBACK_FALLBACK =
  "I need more than that. Take the same question again and give me one concrete example: what you personally did, how you did it, and what the measurable result was.";

export function emptyProfile(): ProfileAnalysis {
  return {
    matchedSkills: [],
    missingSkills: [],
    strengths: [],
    weaknesses: [],
    experienceLevel: 'unknown',
    redFlags: [],
  };
}

export function fallbackCompanyIntel(company: string): string {
  return `${company} values innovation and technical excellence.`;
}

export function fallbackVerdict(overallScore: number): string {
  const score = overallScore.toFixed(1);
  if (overallScore >= 8) {
    return `Strong performance (${score}/10). Answers were specific and well structured. Recommended to move forward.`;
  }
  if (overallScore >= 6) {
    return `Solid performance (${score}/10) with some gaps in depth. Borderline; another round would settle it.`;
  }
  if (overallScore >= 4) {
    return `Below the bar (${score}/10). Several answers lacked concrete detail. Not recommended yet.`;
  }
  return `Not ready (${score}/10). Most answers did not address the question with substance.`;
}

export function fallbackRoadmap(turns: Turn[]): string {
  const tips = [...turns]
    .sort((a, b) => a.score - b.score)
    .map((turn) => turn.tip.trim())
    .filter((tip) => tip.length > 0);
  const unique = Array.from(new Set(tips)).slice(0, 5);

  if (unique.length === 0) {
    return '1. Practice answering with the STAR method: situation, task, action, result, with numbers.';
  }
  return unique.map((tip, index) => `${index + 1}. ${tip}`).join('\n');
}

export function fallbackReport(overallScore: number, turns: Turn[]): ReportContent {
  return {
    verdict: fallbackVerdict(overallScore),
    roadmap: fallbackRoadmap(turns),
  };
}
