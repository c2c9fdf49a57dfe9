import type { Command } from '@commands'
import { getAssistantStateSnapshot } from '@services/ai/assistantRuntime'
import { getTasks } from '@tools/assistant/taskTools'

const tasks = {
  type: 'local',
  name: 'tasks',
  description: 'List your tasks',
  isEnabled: true,
  isHidden: false,
  userFacingName() {
    return 'tasks'
  },
  async call(_args, context) {
    const state = await getAssistantStateSnapshot(context.session)
    return getTasks(state, context.session.userId)
  },
} satisfies Command

export default tasks
