import type { Command } from '@commands'
import { getAssistantStateSnapshot } from '@services/ai/assistantRuntime'
import { getReminders } from '@tools/assistant/taskTools'

const reminders = {
  type: 'local',
  name: 'reminders',
  description: 'List your scheduled reminders',
  isEnabled: true,
  isHidden: false,
  userFacingName() {
    return 'reminders'
  },
  async call(_args, context) {
    const state = await getAssistantStateSnapshot(context.session)
    return getReminders(state, context.session.userId)
  },
} satisfies Command

export default reminders
