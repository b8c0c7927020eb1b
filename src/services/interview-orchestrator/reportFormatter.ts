import { ReportContent, SessionState, Turn } from '../../models/types';

function turnFlags(turn: Turn): string {
  const flags: string[] = [];
  if (turn.skipped) flags.push('no answer');
  if (turn.evaluationDegraded) flags.push('evaluation degraded');
  if (turn.decision === 'PUSHBACK') flags.push('pushback');
  if (turn.topicFailed) flags.push('topic failed');
  return flags.length > 0 ? ` _(${flags.join(', ')})_` : '';
}

export function buildReportMarkdown(state: SessionState, content: ReportContent, overallScore: number): string {
  const lines: string[] = [
    `# Interview Performance Report`,
    '',
    `**Candidate:** ${state.candidateName}  `,
    `**Position:** ${state.role} at ${state.company}  `,
    `**Score:** ${overallScore.toFixed(1)}/10`,
  ];

  if (state.terminationReason) {
    lines.push('', `> Interview ended early: ${state.terminationReason}`);
  }

  const degraded = state.turns.filter((turn) => turn.evaluationDegraded).length;
  if (degraded > 0) {
    lines.push(
      '',
      `> ${degraded} of ${state.turns.length} answers could not be fully evaluated and were given a neutral score.`
    );
  }

  lines.push('', '## Verdict', '', content.verdict, '', '## Improvement Roadmap', '', content.roadmap);

  if (state.failedTopics.length > 0) {
    lines.push('', '## Topics Not Recovered', '');
    for (const topic of state.failedTopics) {
      lines.push(`- ${topic}`);
    }
  }

  lines.push('', '## Question Breakdown');
  for (const turn of state.turns) {
    lines.push(
      '',
      `### Question ${turn.questionNumber} (${turn.stage}) - Score: ${turn.score}/10${turnFlags(turn)}`,
      `**Q:** ${turn.question}`,
      `**Strengths:** ${turn.strengths || 'N/A'}`,
      `**Weaknesses:** ${turn.weaknesses || 'N/A'}`,
      `**Coaching Tip:** ${turn.tip || 'N/A'}`
    );
  }

  return lines.join('\n');
}
