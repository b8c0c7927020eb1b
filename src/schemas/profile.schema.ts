import { z } from 'zod';

const skillList = z
  .array(z.unknown())
  .transform((items) => {
    const cleaned = items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
    return Array.from(new Set(cleaned));
  })
  .catch([]);

export const profileAnalysisSchema = z.object({
  matched_skills: skillList,
  missing_skills: skillList,
  strengths: skillList,
  weaknesses: skillList,
  experience_level: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(['junior', 'mid', 'senior', 'unknown']))
    .catch('unknown'),
  red_flags: skillList,
});

export type ProfileAnalysisPayload = z.infer<typeof profileAnalysisSchema>;
