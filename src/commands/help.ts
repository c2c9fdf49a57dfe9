import { getCommands, type Command } from '@commands'

const help = {
  type: 'local',
  name: 'help',
  description: 'Show the available commands',
  aliases: ['?'],
  isEnabled: true,
  isHidden: false,
  userFacingName() {
    return 'help'
  },
  async call(_args, _context) {
    const visible = getCommands().filter(command => !command.isHidden)
    const labels = visible.map(command =>
      command.argumentHint
        ? `/${command.userFacingName()} ${command.argumentHint}`
        : `/${command.userFacingName()}`,
    )
    const width = Math.max(...labels.map(label => label.length))
    const lines = visible.map(
      (command, index) => `⎿  ${labels[index].padEnd(width)}  ${command.description}`,
    )
    return [
      ...lines,
      '⎿  Anything else you type goes to the assistant.',
    ].join('\n')
  },
} satisfies Command

export default help
