import { z } from 'zod'

export const AGENT_MODEL_KEYS = [
  'root',
  'therapeutic',
  'task',
  'goal',
  'search',
  'journal',
] as const

export type AgentModelKey = (typeof AGENT_MODEL_KEYS)[number]

export const LOG_LEVELS = ['debug', 'info', 'api', 'warn', 'error'] as const

export const DEFAULT_LITE_MODEL = 'gemini-2.5-flash-lite'
export const DEFAULT_GOAL_MODEL = 'gemini-2.0-flash'

export const ModelSelectionSchema = z.object({
  root: z.string().min(1).default(DEFAULT_LITE_MODEL),
  therapeutic: z.string().min(1).default(DEFAULT_LITE_MODEL),
  task: z.string().min(1).default(DEFAULT_LITE_MODEL),
  goal: z.string().min(1).default(DEFAULT_GOAL_MODEL),
  search: z.string().min(1).default(DEFAULT_LITE_MODEL),
  journal: z.string().min(1).default(DEFAULT_LITE_MODEL),
})

export const RetryOptionsSchema = z.object({
  attempts: z.number().int().min(1).max(20).default(5),
  expBase: z.number().min(1).default(2),
  initialDelayMs: z.number().int().min(0).default(1_000),
  maxDelayMs: z.number().int().min(0).default(12_000),
  jitterRatio: z.number().min(0).max(1).default(0.3),
  httpStatusCodes: z
    .array(z.number().int().min(100).max(599))
    .default([429, 500, 503, 504]),
})

export const GlobalConfigSchema = z.object({
  version: z.literal(1).default(1),
  userId: z.string().trim().min(1).default('local-user'),
  apiKey: z.string().optional(),
  models: ModelSelectionSchema.default({}),
  retry: RetryOptionsSchema.default({}),
  persistState: z.boolean().default(true),
  logLevel: z.enum(LOG_LEVELS).default('debug'),
})

export type ModelSelection = z.infer<typeof ModelSelectionSchema>
export type RetryOptions = z.infer<typeof RetryOptionsSchema>
export type GlobalConfig = z.infer<typeof GlobalConfigSchema>
