/**
 * Runtime configuration, read from the environment (.env is loaded by the
 * entry points via dotenv). Everything is validated up front so a bad value
 * stops the process at startup rather than mid-request.
 */

import { z } from 'zod'
import type { AnalysisSettings } from './context/types.js'
import { ConfigError } from './errors.js'

const HOUR_MS = 60 * 60 * 1000

const optionalString = z
  .string()
  .trim()
  .transform(value => (value === '' ? undefined : value))
  .optional()

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: optionalString,
  LEXICON_PATH: optionalString,
  GROQ_API_KEY: optionalString,
  GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().default('gemini-2.0-flash'),
  HISTORY_LIMIT: z.coerce.number().int().min(0).max(100).default(10),

  SENTIMENT_WINDOW: z.coerce.number().int().min(2).default(10),
  MIN_TREND_SAMPLE: z.coerce.number().int().min(1).default(3),
  TREND_DELTA: z.coerce.number().min(0).max(1).default(0.2),
  NEGATIVE_TREND_RATIO: z.coerce.number().min(0).max(1).default(0.5),
  POSITIVE_TREND_RATIO: z.coerce.number().min(0).max(1).default(0.3),
  TOP_TOPICS: z.coerce.number().int().min(1).default(3),
  ENGAGEMENT_WINDOW_HOURS: z.coerce.number().positive().default(24),
  ENGAGEMENT_MIN_SAMPLE: z.coerce.number().int().min(1).default(3),
  ENGAGEMENT_MEDIUM_PER_HOUR: z.coerce.number().positive().default(0.5),
  ENGAGEMENT_HIGH_PER_HOUR: z.coerce.number().positive().default(2),
})

export interface AppConfig {
  env: 'development' | 'production' | 'test'
  port: number
  host: string
  logLevel: string
  databaseUrl?: string
  lexiconPath?: string
  historyLimit: number
  llm: {
    groqApiKey?: string
    groqModel: string
    geminiApiKey?: string
    geminiModel: string
  }
  analysis: AnalysisSettings
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env)
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`))
  }

  const e = result.data
  if (e.POSITIVE_TREND_RATIO > e.NEGATIVE_TREND_RATIO) {
    throw new ConfigError(['POSITIVE_TREND_RATIO: must not exceed NEGATIVE_TREND_RATIO'])
  }
  if (e.ENGAGEMENT_MEDIUM_PER_HOUR > e.ENGAGEMENT_HIGH_PER_HOUR) {
    throw new ConfigError(['ENGAGEMENT_MEDIUM_PER_HOUR: must not exceed ENGAGEMENT_HIGH_PER_HOUR'])
  }

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    databaseUrl: e.DATABASE_URL,
    lexiconPath: e.LEXICON_PATH,
    historyLimit: e.HISTORY_LIMIT,
    llm: {
      groqApiKey: e.GROQ_API_KEY,
      groqModel: e.GROQ_MODEL,
      geminiApiKey: e.GEMINI_API_KEY,
      geminiModel: e.GEMINI_MODEL,
    },
    analysis: {
      sentimentWindow: e.SENTIMENT_WINDOW,
      minTrendSample: e.MIN_TREND_SAMPLE,
      trendDelta: e.TREND_DELTA,
      negativeTrendRatio: e.NEGATIVE_TREND_RATIO,
      positiveTrendRatio: e.POSITIVE_TREND_RATIO,
      topTopics: e.TOP_TOPICS,
      engagementWindowMs: e.ENGAGEMENT_WINDOW_HOURS * HOUR_MS,
      minEngagementSpanMs: HOUR_MS,
      minEngagementSample: e.ENGAGEMENT_MIN_SAMPLE,
      engagementMediumPerHour: e.ENGAGEMENT_MEDIUM_PER_HOUR,
      engagementHighPerHour: e.ENGAGEMENT_HIGH_PER_HOUR,
    },
  }
}
