import mongoose, { Schema } from 'mongoose';
import { ExperienceLevel } from './types';

export interface IProfileAnalysis {
  session_id: string;
  matched_skills: string[];
  missing_skills: string[];
  strengths: string[];
  weaknesses: string[];
  experience_level: ExperienceLevel;
  red_flags: string[];
}

const ProfileAnalysisSchema = new Schema<IProfileAnalysis>(
  {
    session_id: {
      type: String,
      required: true,
      unique: true,
    },
    matched_skills: [{ type: String }],
    missing_skills: [{ type: String }],
    strengths: [{ type: String }],
    weaknesses: [{ type: String }],
    experience_level: {
      type: String,
      enum: ['junior', 'mid', 'senior', 'unknown'],
      default: 'unknown',
    },
    red_flags: [{ type: String }],
  },
  {
    collection: 'profile_analysis',
    versionKey: false,
  }
);

export default mongoose.model<IProfileAnalysis>('ProfileAnalysis', ProfileAnalysisSchema);
