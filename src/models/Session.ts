import mongoose, { Schema } from 'mongoose';

export interface ISession {
  _id: string;
  candidate_name: string;
  company: string;
  role: string;
  start_time: Date;
  end_time: Date | null;
  overall_score: number | null;
  final_verdict: string | null;
  resume_length: number;
  total_questions: number;
  early_termination: string | null;
}

const SessionSchema = new Schema<ISession>(
  {
    _id: {
      type: String,
      required: true,
    },
    candidate_name: {
      type: String,
      required: true,
    },
    company: {
      type: String,
      required: true,
    },
    role: {
      type: String,
      required: true,
    },
    start_time: {
      type: Date,
      required: true,
      index: true,
    },
    end_time: {
      type: Date,
      default: null,
    },
    overall_score: {
      type: Number,
      default: null,
    },
    final_verdict: {
      type: String,
      default: null,
    },
    resume_length: {
      type: Number,
      default: 0,
    },
    total_questions: {
      type: Number,
      default: 0,
    },
    early_termination: {
      type: String,
      default: null,
    },
  },
  {
    collection: 'sessions',
    versionKey: false,
  }
);

export default mongoose.model<ISession>('Session', SessionSchema);
