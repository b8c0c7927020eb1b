import mongoose from 'mongoose';
import Session, { ISession } from '../models/Session';
import QaLog, { IQaLog } from '../models/QaLog';
import ProfileAnalysisModel, { IProfileAnalysis } from '../models/ProfileAnalysis';
import {
  NewSessionRecord,
  PersistenceAdapter,
  ProfileAnalysis,
  SessionSummary,
  Turn,
} from '../models/types';
import { ApiError } from '../middlewares/errorHandler';
import { PersistenceError, describeError } from '../utils/errors';

export interface SessionStats {
  session: ISession;
  qaLogs: IQaLog[];
  profile: IProfileAnalysis | null;
}

export function toSessionRow(record: NewSessionRecord): ISession {
  return {
    _id: record.sessionId,
    candidate_name: record.candidateName,
    company: record.company,
    role: record.role,
    start_time: new Date(record.startTime),
    end_time: null,
    overall_score: null,
    final_verdict: null,
    resume_length: record.resumeLength,
    total_questions: 0,
    early_termination: null,
  };
}

export function toQaLogRow(sessionId: string, turn: Turn): IQaLog {
  return {
    session_id: sessionId,
    question_number: turn.questionNumber,
    stage: turn.stage,
    question: turn.question,
    answer: turn.answer,
    answer_length: turn.answerLength,
    critic_score: turn.score,
    critic_strengths: turn.strengths,
    critic_weaknesses: turn.weaknesses,
    critic_tip: turn.tip,
    sentiment: turn.sentiment,
    timestamp: new Date(turn.timestamp),
  };
}

export function toProfileRow(sessionId: string, profile: ProfileAnalysis): IProfileAnalysis {
  return {
    session_id: sessionId,
    matched_skills: profile.matchedSkills,
    missing_skills: profile.missingSkills,
    strengths: profile.strengths,
    weaknesses: profile.weaknesses,
    experience_level: profile.experienceLevel,
    red_flags: profile.redFlags,
  };
}

export function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof mongoose.mongo.MongoServerError && error.code === 11000;
}

export class SessionRepository implements PersistenceAdapter {
  async createSession(record: NewSessionRecord): Promise<void> {
    try {
      await Session.create(toSessionRow(record));
    } catch (error) {
      throw new PersistenceError(
        'createSession',
        `Failed to create session ${record.sessionId}: ${describeError(error)}`,
        error
      );
    }
  }

  async recordTurn(sessionId: string, turn: Turn): Promise<void> {
    try {
      await QaLog.create(toQaLogRow(sessionId, turn));
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        console.log(`[SessionRepository] Q${turn.questionNumber} already recorded for ${sessionId}`);
        return;
      }
      throw new PersistenceError(
        'recordTurn',
        `Failed to record Q${turn.questionNumber} for ${sessionId}: ${describeError(error)}`,
        error
      );
    }

    try {
      await Session.updateOne({ _id: sessionId }, { $max: { total_questions: turn.questionNumber } });
    } catch (error) {
      console.error('[SessionRepository] Error updating question count:', error);
    }
  }

  async saveProfile(sessionId: string, profile: ProfileAnalysis): Promise<void> {
    try {
      await ProfileAnalysisModel.findOneAndUpdate(
        { session_id: sessionId },
        { $set: toProfileRow(sessionId, profile) },
        { upsert: true }
      );
    } catch (error) {
      throw new PersistenceError(
        'saveProfile',
        `Failed to save profile for ${sessionId}: ${describeError(error)}`,
        error
      );
    }
  }

  async finishSession(sessionId: string, summary: SessionSummary): Promise<void> {
    let result: ISession | null;
    try {
      result = await Session.findOneAndUpdate(
        { _id: sessionId },
        {
          $set: {
            end_time: new Date(summary.endTime),
            overall_score: summary.overallScore,
            final_verdict: summary.finalVerdict,
            total_questions: summary.totalQuestions,
            early_termination: summary.earlyTermination,
          },
        },
        { new: true }
      ).lean<ISession>();
    } catch (error) {
      throw new PersistenceError(
        'finishSession',
        `Failed to finish session ${sessionId}: ${describeError(error)}`,
        error
      );
    }

    if (!result) {
      throw new PersistenceError('finishSession', `Session row not found: ${sessionId}`);
    }
  }

  async findBySessionId(sessionId: string): Promise<ISession | null> {
    try {
      return await Session.findById(sessionId).lean<ISession>();
    } catch (error) {
      console.error('[SessionRepository] Error fetching session:', error);
      throw new ApiError(500, 'Failed to fetch session');
    }
  }

  async getSessionStats(sessionId: string): Promise<SessionStats | null> {
    const session = await this.findBySessionId(sessionId);
    if (!session) return null;

    try {
      const [qaLogs, profile] = await Promise.all([
        QaLog.find({ session_id: sessionId }).sort({ question_number: 1 }).lean<IQaLog[]>(),
        ProfileAnalysisModel.findOne({ session_id: sessionId }).lean<IProfileAnalysis>(),
      ]);
      return { session, qaLogs, profile };
    } catch (error) {
      console.error('[SessionRepository] Error fetching session stats:', error);
      throw new ApiError(500, 'Failed to fetch session results');
    }
  }

  async getRecentSessions(limit: number): Promise<ISession[]> {
    try {
      return await Session.find().sort({ start_time: -1 }).limit(limit).lean<ISession[]>();
    } catch (error) {
      console.error('[SessionRepository] Error fetching recent sessions:', error);
      throw new ApiError(500, 'Failed to fetch sessions');
    }
  }
}

export const sessionRepository = new SessionRepository();
