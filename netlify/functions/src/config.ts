import { z } from 'zod'
import { DEFAULT_PRIORITY_BRANCHES, parseBranchList } from './branch.js'

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const envSchema = z.object({
  DEFAULT_GROUPS: z.coerce.number().int().min(1).default(12),
  MAX_GROUPS: z.coerce.number().int().min(1).default(50),
  BRANCH_PRIORITY: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  NODE_ENV: z.string().optional(),
})

export interface AppConfig {
  defaultGroups: number
  maxGroups: number
  priority: readonly string[]
  logLevel: LogLevel
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid configuration: ${issues.join('; ')}`)
  }
  const vars = parsed.data
  if (vars.DEFAULT_GROUPS > vars.MAX_GROUPS) {
    throw new Error(`Invalid configuration: DEFAULT_GROUPS (${vars.DEFAULT_GROUPS}) exceeds MAX_GROUPS (${vars.MAX_GROUPS})`)
  }
  const priority = vars.BRANCH_PRIORITY ? parseBranchList(vars.BRANCH_PRIORITY) : []
  return {
    defaultGroups: vars.DEFAULT_GROUPS,
    maxGroups: vars.MAX_GROUPS,
    priority: priority.length ? priority : DEFAULT_PRIORITY_BRANCHES,
    logLevel: vars.LOG_LEVEL ?? ((vars.NODE_ENV ?? 'development') === 'development' ? 'debug' : 'info'),
  }
}

export interface GroupingParams {
  groups: number
}

export function paramsSchema(config: AppConfig) {
  return z.object({
    groups: z.coerce
      .number()
      .int('groups must be a whole number')
      .min(1, 'groups must be at least 1')
      .max(config.maxGroups, `groups must be at most ${config.maxGroups}`)
      .default(config.defaultGroups),
  })
}
