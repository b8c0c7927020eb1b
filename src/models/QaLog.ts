import mongoose, { Schema } from 'mongoose';
import { InterviewStage } from './types';

/**
 * One row per answered (or skipped) question. Rows are only ever inserted.
 */
export interface IQaLog {
  session_id: string;
  question_number: number;
  stage: InterviewStage;
  question: string;
  answer: string;
  answer_length: number;
  critic_score: number;
  critic_strengths: string;
  critic_weaknesses: string;
  critic_tip: string;
  sentiment: string;
  timestamp: Date;
}

const QaLogSchema = new Schema<IQaLog>(
  {
    session_id: {
      type: String,
      required: true,
      index: true,
    },
    question_number: {
      type: Number,
      required: true,
    },
    stage: {
      type: String,
      enum: ['intro', 'technical', 'behavioral', 'closing', 'complete'],
      required: true,
    },
    question: {
      type: String,
      required: true,
    },
    answer: {
      type: String,
      default: '',
    },
    answer_length: {
      type: Number,
      default: 0,
    },
    critic_score: {
      type: Number,
      required: true,
    },
    critic_strengths: {
      type: String,
      default: '',
    },
    critic_weaknesses: {
      type: String,
      default: '',
    },
    critic_tip: {
      type: String,
      default: '',
    },
    sentiment: {
      type: String,
      default: 'neutral',
    },
    timestamp: {
      type: Date,
      default: Date.now,
    },
  },
  {
    collection: 'qa_logs',
    versionKey: false,
  }
);

QaLogSchema.index({ session_id: 1, question_number: 1 }, { unique: true });

export default mongoose.model<IQaLog>('QaLog', QaLogSchema);
