import { Request, Response, NextFunction } from 'express';
import { sessionRepository, SessionRepository } from '../repositories/sessionRepository';
import { interviewService, InterviewService } from '../services/interview-orchestrator/interviewService';
import {
  answerBodySchema,
  endSessionBodySchema,
  recentLimitSchema,
  startSessionBodySchema,
} from '../schemas/session.schema';
import { ApiError } from '../middlewares/errorHandler';
import { SessionNotFoundError } from '../utils/errors';

type SessionReader = Pick<SessionRepository, 'getSessionStats' | 'getRecentSessions'>;

export class SessionController {
  constructor(
    private readonly interviews: Pick<
      InterviewService,
      'startInterview' | 'submitAnswer' | 'endInterview' | 'getReport'
    > = interviewService,
    private readonly sessions: SessionReader = sessionRepository
  ) {}

  startSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = startSessionBodySchema.safeParse(req.body);
      if (!body.success) {
        throw new ApiError(400, 'Request body must be a JSON object');
      }

      const result = await this.interviews.startInterview(body.data);

      console.log(`✅ Interview ${result.sessionId} started, persona ${result.persona}`);
      if (result.warnings.length > 0) {
        console.warn(`⚠️ Started with ${result.warnings.length} warning(s)`);
      }

      res.status(201).json({
        success: true,
        data: {
          sessionId: result.sessionId,
          question: {
            number: result.question.number,
            text: result.question.text,
            stage: result.question.stage,
            persona: result.persona,
          },
          profile: result.profile,
          warnings: result.warnings,
        },
      });
    } catch (error) {
      next(error);
    }
  };

  submitAnswer = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = req.params;
      const body = answerBodySchema.safeParse(req.body);
      if (!body.success) {
        throw new ApiError(400, 'Request body must be a JSON object');
      }

      const result = await this.interviews.submitAnswer(sessionId, body.data.answer, body.data.nonVerbalSignal);

      res.json({
        success: true,
        data: {
          decisionState: result.decisionState,
          decision: result.decision,
          nextQuestion: result.nextQuestion
            ? {
                number: result.nextQuestion.number,
                text: result.nextQuestion.text,
                stage: result.nextQuestion.stage,
                intensified: result.nextQuestion.intensified,
              }
            : null,
          feedback: result.feedback,
          stage: result.stage,
          persona: result.persona,
          questionCount: result.questionCount,
          terminationReason: result.terminationReason,
          warnings: result.warnings,
        },
      });
    } catch (error) {
      next(error);
    }
  };

  endSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = req.params;
      const body = endSessionBodySchema.safeParse(req.body);
      const reason = body.success ? body.data.reason : undefined;

      const report = await this.interviews.endInterview(sessionId, reason);

      res.json({
        success: true,
        message: 'Interview ended successfully',
        data: report,
      });
    } catch (error) {
      next(error);
    }
  };

  getReport = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = req.params;
      const view = await this.interviews.getReport(sessionId);

      res.json({
        success: true,
        data: view.status === 'complete' ? view.report : { status: view.status, phase: view.phase },
      });
    } catch (error) {
      next(error);
    }
  };

  getResults = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { sessionId } = req.params;
      const stats = await this.sessions.getSessionStats(sessionId);

      if (!stats) {
        throw new SessionNotFoundError(sessionId);
      }

      res.json({
        success: true,
        data: {
          session: stats.session,
          qaLogs: stats.qaLogs,
          profile: stats.profile,
        },
      });
    } catch (error) {
      next(error);
    }
  };

  listRecent = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = recentLimitSchema.parse(req.query.limit);
      const sessions = await this.sessions.getRecentSessions(limit);

      res.json({
        success: true,
        data: sessions,
      });
    } catch (error) {
      next(error);
    }
  };
}

export const sessionController = new SessionController();
