import { LlmAgent, type Gemini } from '@google/adk'
import {
  GOAL_AGENT_INSTRUCTION,
  GOAL_AGENT_NAME,
} from '@services/ai/prompts/assistantPrompts'
import {
  approveGoalTool,
  createGoalWithRoutineTool,
  getCurrentDatetimeTool,
  getGoalTool,
  listGoalsTool,
  updateGoalStatusTool,
} from '@tools/assistant'

export function createGoalRefinementAgent(model: Gemini): LlmAgent {
  return new LlmAgent({
    name: GOAL_AGENT_NAME,
    model,
    description:
      'Turns vague wishes into goals with routines, and shows and manages the user goals.',
    instruction: GOAL_AGENT_INSTRUCTION,
    tools: [
      getCurrentDatetimeTool,
      createGoalWithRoutineTool,
      approveGoalTool,
      getGoalTool,
      listGoalsTool,
      updateGoalStatusTool,
    ],
  })
}
