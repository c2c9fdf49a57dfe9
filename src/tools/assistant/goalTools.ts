import { FunctionTool } from '@google/adk'
import { z } from 'zod'
import { debug as debugLogger } from '@utils/log/debugLogger'
import type { GoalRecord } from '@services/ai/types/assistant'
import {
  STATE_KEYS,
  findOwnedRecord,
  readRawList,
  readTypedList,
  replaceAt,
  resolveToolSession,
  systemClock,
  type Clock,
  type SessionStateAccess,
} from './sessionState'

const NO_GOALS_YET = "You don't have any goals yet. Let's create one!"

const GoalRecordSchema = z.object({
  id: z.number(),
  user_id: z.string(),
  title: z.string(),
  description: z.string().catch(''),
  routine: z.string().catch(''),
  frequency: z.string().catch(''),
  duration: z.string().catch(''),
  start_date: z.string().catch(''),
  status: z.string().catch('pending_approval'),
  created_at: z.string().catch(''),
  approved: z.boolean().catch(false),
  approved_at: z.string().optional(),
  updated_at: z.string().optional(),
})

export type CreateGoalInput = {
  title: string
  goal_description: string
  routine: string
  frequency: string
  duration: string
  start_date: string
}

export function formatGoalApprovalCard(goal: GoalRecord): string {
  return `
📋 Goal Created (ID: ${goal.id}) - Pending Your Approval

**${goal.title}**

🎯 Goal: ${goal.description}

📅 Routine:
${goal.routine}

⏰ Frequency: ${goal.frequency}
⏳ Duration: ${goal.duration}
🚀 Start Date: ${goal.start_date}

Type 'approve' to activate this goal, or tell me what you'd like to change.
`
}

export function formatGoalDetail(goal: GoalRecord): string {
  const statusEmoji = goal.approved ? '✅' : '⏳'
  const statusText = goal.approved ? 'Active' : 'Pending Approval'
  return `
${statusEmoji} Goal #${goal.id}: **${goal.title}** (${statusText})

🎯 Goal: ${goal.description}

📅 Routine:
${goal.routine}

⏰ Frequency: ${goal.frequency}
⏳ Duration: ${goal.duration}
🚀 Start Date: ${goal.start_date}
📆 Created: ${goal.created_at.slice(0, 10)}
`
}

export function createGoalWithRoutine(
  state: SessionStateAccess,
  userId: string,
  input: CreateGoalInput,
  clock: Clock = systemClock,
): string {
  const goals = readRawList(state, STATE_KEYS.goals)
  const goal: GoalRecord = {
    id: goals.length + 1,
    user_id: userId,
    title: input.title,
    description: input.goal_description,
    routine: input.routine,
    frequency: input.frequency,
    duration: input.duration,
    start_date: input.start_date,
    status: 'pending_approval',
    created_at: clock().toISOString(),
    approved: false,
  }

  state.set(STATE_KEYS.goals, [...goals, goal])
  debugLogger.info('GOAL_CREATED', { userId, id: goal.id, title: goal.title })
  return formatGoalApprovalCard(goal)
}

export function approveGoal(
  state: SessionStateAccess,
  userId: string,
  input: { goal_id: number },
  clock: Clock = systemClock,
): string {
  if (!Array.isArray(state.get(STATE_KEYS.goals))) {
    return '❌ No goals found to approve.'
  }

  const goals = readRawList(state, STATE_KEYS.goals)
  const match = findOwnedRecord(goals, GoalRecordSchema, input.goal_id, userId)
  if (!match) {
    return `❌ Goal ID ${input.goal_id} not found.`
  }

  state.set(
    STATE_KEYS.goals,
    replaceAt(goals, match.index, {
      ...match.raw,
      approved: true,
      status: 'active',
      approved_at: clock().toISOString(),
    }),
  )
  debugLogger.info('GOAL_APPROVED', { userId, id: input.goal_id })
  return `✅ Goal '${match.record.title}' is now active! Let's make it happen! 🎉`
}

export function getGoal(
  state: SessionStateAccess,
  userId: string,
  input: { goal_id: number },
): string {
  if (!Array.isArray(state.get(STATE_KEYS.goals))) {
    return '❌ No goals found.'
  }

  const match = findOwnedRecord(
    readRawList(state, STATE_KEYS.goals),
    GoalRecordSchema,
    input.goal_id,
    userId,
  )
  if (!match) {
    return `❌ Goal ID ${input.goal_id} not found.`
  }
  return formatGoalDetail(match.record)
}

export function listGoals(state: SessionStateAccess, userId: string): string {
  const userGoals = readTypedList(state, STATE_KEYS.goals, GoalRecordSchema).filter(
    goal => goal.user_id === userId,
  )
  if (userGoals.length === 0) {
    return NO_GOALS_YET
  }

  let result = `📋 Your Goals (${userGoals.length}):\n\n`
  for (const goal of userGoals) {
    const statusEmoji = goal.approved ? '✅' : '⏳'
    const statusText = goal.approved ? 'Active' : 'Pending'
    result += `${statusEmoji} #${goal.id}: **${goal.title}** - ${statusText}\n`
    result += `   ${goal.description}\n`
    result += `   ${goal.frequency} | Start: ${goal.start_date}\n\n`
  }
  result += "\nUse 'show goal #ID' to see full details of any goal."
  return result
}

export function updateGoalStatus(
  state: SessionStateAccess,
  userId: string,
  input: { goal_id: number; status: string },
  clock: Clock = systemClock,
): string {
  if (!Array.isArray(state.get(STATE_KEYS.goals))) {
    return '❌ No goals found.'
  }

  const goals = readRawList(state, STATE_KEYS.goals)
  const match = findOwnedRecord(goals, GoalRecordSchema, input.goal_id, userId)
  if (!match) {
    return `❌ Goal ID ${input.goal_id} not found.`
  }

  state.set(
    STATE_KEYS.goals,
    replaceAt(goals, match.index, {
      ...match.raw,
      status: input.status,
      updated_at: clock().toISOString(),
    }),
  )
  debugLogger.info('GOAL_STATUS_UPDATED', {
    userId,
    id: input.goal_id,
    status: input.status,
  })

  const title = match.record.title
  switch (input.status) {
    case 'completed':
      return `🎉 Congratulations! Goal '${title}' marked as completed!`
    case 'paused':
      return `⏸️ Goal '${title}' paused. You can resume it anytime.`
    case 'cancelled':
      return `🚫 Goal '${title}' cancelled.`
    case 'active':
      return `✅ Goal '${title}' is now active!`
    default:
      return `✓ Goal status updated to: ${input.status}`
  }
}

export const createGoalWithRoutineTool = new FunctionTool({
  name: 'create_goal_with_routine',
  description:
    'Create a goal with an associated routine. The goal stays pending until the user approves it.',
  parameters: z.object({
    title: z
      .string()
      .describe('Short title, e.g. "Morning Fitness" or "Better Sleep"'),
    goal_description: z.string().describe('What the user wants to achieve'),
    routine: z.string().describe('The specific steps to follow, as bullet points'),
    frequency: z.string().describe('How often, e.g. "3x per week" or "daily"'),
    duration: z.string().describe('How long to commit, e.g. "30 days"'),
    start_date: z.string().describe('When to start, in YYYY-MM-DD format'),
  }),
  execute: (input, toolContext) => {
    const { state, userId } = resolveToolSession(
      'create_goal_with_routine',
      toolContext,
    )
    return createGoalWithRoutine(state, userId, input)
  },
})

export const approveGoalTool = new FunctionTool({
  name: 'approve_goal',
  description: 'Approve and activate a pending goal.',
  parameters: z.object({
    goal_id: z.number().int().describe('The ID of the goal to approve'),
  }),
  execute: (input, toolContext) => {
    const { state, userId } = resolveToolSession('approve_goal', toolContext)
    return approveGoal(state, userId, input)
  },
})

export const getGoalTool = new FunctionTool({
  name: 'get_goal',
  description: 'Show the full details of one goal by ID.',
  parameters: z.object({
    goal_id: z.number().int().describe('The ID of the goal to show'),
  }),
  execute: (input, toolContext) => {
    const { state, userId } = resolveToolSession('get_goal', toolContext)
    return getGoal(state, userId, input)
  },
})

export const listGoalsTool = new FunctionTool({
  name: 'list_goals',
  description: 'List all goals for the current user.',
  parameters: z.object({}),
  execute: (_input, toolContext) => {
    const { state, userId } = resolveToolSession('list_goals', toolContext)
    return listGoals(state, userId)
  },
})

export const updateGoalStatusTool = new FunctionTool({
  name: 'update_goal_status',
  description: 'Update the status of a goal.',
  parameters: z.object({
    goal_id: z.number().int().describe('The ID of the goal'),
    status: z
      .string()
      .describe('New status: active, completed, paused, or cancelled'),
  }),
  execute: (input, toolContext) => {
    const { state, userId } = resolveToolSession(
      'update_goal_status',
      toolContext,
    )
    return updateGoalStatus(state, userId, input)
  },
})
