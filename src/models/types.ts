export type InterviewStage = 'intro' | 'technical' | 'behavioral' | 'closing' | 'complete';

export type Persona = 'supportive' | 'neutral' | 'challenging';

export type PolicyDecision = 'PUSHBACK' | 'ADVANCE' | 'EARLY_TERMINATE' | 'REPORT';

export type OrchestratorPhase =
  | 'INIT'
  | 'PREPARING'
  | 'AWAITING_ANSWER'
  | 'SCORING'
  | 'DECIDING'
  | 'PUSHBACK_LOOP'
  | 'ADVANCING'
  | 'TERMINATING'
  | 'REPORTING'
  | 'DONE';

// What the caller sees after each submitted answer
export type DecisionState = 'continuing' | 'pushback' | 'terminated' | 'reporting';

export type ExperienceLevel = 'junior' | 'mid' | 'senior' | 'unknown';

export interface ProfileAnalysis {
  matchedSkills: string[];
  missingSkills: string[];
  strengths: string[];
  weaknesses: string[];
  experienceLevel: ExperienceLevel;
  redFlags: string[];
}

export interface AnswerJudgment {
  score: number;
  strengths: string;
  weaknesses: string;
  tip: string;
  sentiment: string;
}

export interface Turn {
  questionNumber: number;
  topic: number;
  stage: InterviewStage;
  question: string;
  answer: string;
  answerLength: number;
  score: number;
  strengths: string;
  weaknesses: string;
  tip: string;
  sentiment: string;
  timestamp: string;
  skipped: boolean;
  evaluationDegraded: boolean;
  decision: PolicyDecision | null;
  topicFailed: boolean;
  persisted: boolean;
}

export interface CurrentQuestion {
  number: number;
  topic: number;
  stage: InterviewStage;
  text: string;
  intensified: boolean;
}

export interface InterviewReport {
  verdict: string;
  roadmap: string;
  overallScore: number;
  terminationReason: string | null;
  degradedTurns: number;
  skippedTurns: number;
  failedTopics: string[];
  markdown: string;
  generatedAt: string;
}

/**
 * Everything one interview knows about itself. Owned by exactly one
 * InterviewOrchestrator while a call is in flight; serialized to the state
 * store between calls, so every field must survive JSON.
 */
export interface SessionState {
  sessionId: string;
  candidateName: string;
  company: string;
  role: string;
  resumeText: string;
  jobDescription: string;
  resumeLength: number;
  startTime: string;
  endTime: string | null;

  phase: OrchestratorPhase;
  stage: InterviewStage;
  persona: Persona;
  profile: ProfileAnalysis | null;
  profilePersisted: boolean;
  companyIntel: string;
  strategy: string;

  currentQuestion: CurrentQuestion | null;
  pushbackCount: number;
  topicCount: number;
  topicsInStage: number;
  failedTopics: string[];
  turns: Turn[];

  lastDecision: PolicyDecision | null;
  decisionState: DecisionState | null;
  terminationReason: string | null;
  overallScore: number | null;
  finalVerdict: string | null;
  report: InterviewReport | null;
  warnings: string[];
}

export interface InterviewSetupInput {
  candidateName: string;
  resumeText: string;
  jobDescription: string;
  companyName: string;
  role?: string;
}

// --- Collaborator contracts ---

export interface TranscriptEntry {
  questionNumber: number;
  question: string;
  answer: string;
  score: number;
}

export interface QuestionRequest {
  stage: InterviewStage;
  persona: Persona;
  topic: number;
  intensify: boolean;
  company: string;
  role: string;
  profile: ProfileAnalysis | null;
  companyIntel: string;
  strategy: string;
  history: TranscriptEntry[];
  previous: {
    question: string;
    answer: string;
    score: number;
    weaknesses: string;
    tip: string;
  } | null;
}

export interface ScoringRequest {
  question: string;
  answer: string;
  stage: InterviewStage;
  nonVerbalSignal?: string;
}

export interface ReportRequest {
  candidateName: string;
  company: string;
  role: string;
  turns: Turn[];
  profile: ProfileAnalysis | null;
  overallScore: number;
  terminationReason: string | null;
}

export interface ReportContent {
  verdict: string;
  roadmap: string;
}

export interface StrategyPlan {
  strategy: string;
  persona: Persona;
}

export interface QuestionSource {
  generateQuestion(request: QuestionRequest): Promise<string>;
}

export interface ScoringSource {
  scoreAnswer(request: ScoringRequest): Promise<AnswerJudgment>;
}

export interface ReportSource {
  generateReport(request: ReportRequest): Promise<ReportContent>;
}

export interface ProfileSource {
  analyzeProfile(input: { resumeText: string; jobDescription: string }): Promise<ProfileAnalysis>;
}

export interface ResearchSource {
  researchCompany(company: string): Promise<string>;
  planStrategy(input: { company: string; profile: ProfileAnalysis | null; companyIntel: string }): Promise<StrategyPlan>;
}

// --- Persistence contract ---

export interface NewSessionRecord {
  sessionId: string;
  candidateName: string;
  company: string;
  role: string;
  startTime: string;
  resumeLength: number;
}

export interface SessionSummary {
  endTime: string;
  overallScore: number;
  finalVerdict: string;
  totalQuestions: number;
  earlyTermination: string | null;
}

export interface PersistenceAdapter {
  createSession(record: NewSessionRecord): Promise<void>;
  recordTurn(sessionId: string, turn: Turn): Promise<void>;
  saveProfile(sessionId: string, profile: ProfileAnalysis): Promise<void>;
  finishSession(sessionId: string, summary: SessionSummary): Promise<void>;
}

export interface InterviewStateStore {
  load(sessionId: string): Promise<SessionState | null>;
  save(state: SessionState): Promise<void>;
}
