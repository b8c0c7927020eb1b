import { z } from 'zod';

// Non-string values are treated as missing so the setup validator reports them by name
const looseText = z.unknown().transform((value) => (typeof value === 'string' ? value : ''));

const optionalText = z
  .unknown()
  .transform((value) => (typeof value === 'string' && value.trim() ? value : undefined));

export const startSessionBodySchema = z
  .object({
    candidateName: looseText,
    resumeText: looseText,
    jobDescription: looseText,
    companyName: looseText,
    role: optionalText,
  })
  .default({});

export const answerBodySchema = z
  .object({
    answer: looseText,
    nonVerbalSignal: optionalText,
  })
  .default({});

export const endSessionBodySchema = z
  .object({
    reason: optionalText,
  })
  .default({});

export const DEFAULT_RECENT_LIMIT = 10;
export const MAX_RECENT_LIMIT = 50;

export const recentLimitSchema = z.coerce
  .number()
  .int()
  .min(1)
  .catch(DEFAULT_RECENT_LIMIT)
  .transform((limit) => Math.min(limit, MAX_RECENT_LIMIT));

export type StartSessionBody = z.infer<typeof startSessionBodySchema>;
