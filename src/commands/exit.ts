import type { Command } from '@commands'

const exit = {
  type: 'local',
  name: 'exit',
  description: 'Leave Haven',
  aliases: ['quit'],
  isEnabled: true,
  isHidden: false,
  userFacingName() {
    return 'exit'
  },
  async call(_args, context) {
    context.exit()
    return '⎿  Take care!'
  },
} satisfies Command

export default exit
