import { LlmAgent, type Gemini } from '@google/adk'
import {
  TASK_AGENT_INSTRUCTION,
  TASK_AGENT_NAME,
} from '@services/ai/prompts/assistantPrompts'
import {
  completeTaskTool,
  createTaskTool,
  getAllItemsTool,
  getCurrentDatetimeTool,
  getRemindersTool,
  getTasksTool,
  scheduleReminderTool,
} from '@tools/assistant'

export function createTaskAgent(model: Gemini): LlmAgent {
  return new LlmAgent({
    name: TASK_AGENT_NAME,
    model,
    description:
      'Manages concrete tasks, reminders and scheduling, with awareness of the current date and time.',
    instruction: TASK_AGENT_INSTRUCTION,
    tools: [
      getCurrentDatetimeTool,
      createTaskTool,
      getTasksTool,
      completeTaskTool,
      scheduleReminderTool,
      getRemindersTool,
      getAllItemsTool,
    ],
  })
}
