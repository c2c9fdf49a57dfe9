export interface TaskRecord {
  id: number
  user_id: string
  title: string
  due_date: string
  priority: string
  completed: boolean
  created_at: string
  completed_at?: string
}

export interface ReminderRecord {
  id: number
  user_id: string
  title: string
  date: string
  time: string
  created_at: string
}

export interface GoalRecord {
  id: number
  user_id: string
  title: string
  description: string
  routine: string
  frequency: string
  duration: string
  start_date: string
  status: string
  created_at: string
  approved: boolean
  approved_at?: string
  updated_at?: string
}

export interface PatternEntry {
  response: string
  timestamp: string
}

export interface TriggerHistory {
  helpful_responses: PatternEntry[]
  unhelpful_responses: PatternEntry[]
}

export interface TherapeuticPatterns {
  triggers: Record<string, TriggerHistory>
  preferred_styles: string[]
  avoided_styles: string[]
}

export interface UserMemory {
  personal_details: Record<string, string>
  preferences: Record<string, string>
  therapeutic_patterns: TherapeuticPatterns
  history: string[]
  interests: string[]
  [extra: string]: unknown
}

export type AssistantTurnProgress =
  | { kind: 'delegating'; agent: string }
  | { kind: 'tool'; name: string }
  | { kind: 'retry'; attempt: number; totalAttempts: number; delayMs: number }

export type AssistantTurnResult = {
  text: string
  respondingAgent: string
  agentsVisited: string[]
  toolCalls: string[]
  retriesUsed: number
  trace: AssistantTurnTrace
}

export type AssistantTurnTrace = {
  entries: Record<string, unknown>[]
  droppedCount: number
}
