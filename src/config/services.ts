import dotenv from 'dotenv';
dotenv.config();

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid ${name} value: ${raw}`);
  }
  return value;
}

export const groqConfig = {
  apiKey: process.env.GROQ_API_KEY || '',
  model: process.env.GROQ_MODEL || 'llama-3.3-70b-versatile',
  timeoutMs: readNumber('LLM_TIMEOUT_MS', 30000),
  maxRetries: readNumber('LLM_MAX_RETRIES', 2),
};

export const interviewConfig = {
  stateTtlSeconds: readNumber('INTERVIEW_STATE_TTL_SEC', 3600),
};

// Validate configuration
if (!groqConfig.apiKey) {
  console.warn('⚠️  Groq API key is missing. Question generation and scoring will run on fallbacks.');
}
