import { z } from 'zod';

const numericString = /^\s*-?\d+(\.\d+)?\s*(\/\s*10)?\s*$/;

// "7", "7.5" and "7/10" are accepted; anything else is left for z.number() to reject
const scoreField = z.preprocess((value) => {
  if (typeof value === 'string' && numericString.test(value)) {
    return parseFloat(value);
  }
  return value;
}, z.number().min(0).max(10));

// Models sometimes answer a text field with a list of bullet points
const textField = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value.join('; ') : value).trim());

export const answerJudgmentSchema = z.object({
  score: scoreField,
  strengths: textField.default(''),
  weaknesses: textField.default(''),
  tip: textField.default(''),
  sentiment: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.string().min(1))
    .catch('neutral'),
});

export type AnswerJudgmentPayload = z.infer<typeof answerJudgmentSchema>;

export const reportSchema = z.object({
  verdict: z.string().trim().min(1),
  roadmap: textField.pipe(z.string().min(1)),
});

export type ReportPayload = z.infer<typeof reportSchema>;
