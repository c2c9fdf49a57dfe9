import type { Command } from '@commands'
import { getAssistantStateSnapshot } from '@services/ai/assistantRuntime'
import { getGoal, listGoals } from '@tools/assistant/goalTools'

export function parseGoalId(raw: string): number | null {
  const match = /^#?(\d+)$/.exec(raw.trim())
  if (!match) return null
  return Number.parseInt(match[1], 10)
}

const goals = {
  type: 'local',
  name: 'goals',
  description: 'List your goals, or show one goal in full',
  argumentHint: '[id]',
  isEnabled: true,
  isHidden: false,
  userFacingName() {
    return 'goals'
  },
  async call(args, context) {
    const state = await getAssistantStateSnapshot(context.session)
    if (!args.trim()) {
      return listGoals(state, context.session.userId)
    }

    const goalId = parseGoalId(args)
    if (goalId === null) {
      return 'Usage: /goals [id]'
    }
    return getGoal(state, context.session.userId, { goal_id: goalId }).trim()
  },
} satisfies Command

export default goals
