import type { Command } from '@commands'
import { resetAssistantSession } from '@services/ai/assistantRuntime'

const reset = {
  type: 'local',
  name: 'reset',
  description: 'Forget this conversation and everything saved for you',
  aliases: ['clear'],
  isEnabled: true,
  isHidden: false,
  userFacingName() {
    return 'reset'
  },
  async call(_args, context) {
    await resetAssistantSession(context.session)
    return `⎿  Conversation and saved state cleared for ${context.session.userId}.`
  },
} satisfies Command

export default reset
