import { describe, expect, test } from 'vitest'

import { buildAssistantAgentTree } from '@services/ai/agents'
import { DEFAULT_GLOBAL_CONFIG } from '@core/config/defaults'
import {
  approveGoalTool,
  completeTaskTool,
  createGoalWithRoutineTool,
  getCurrentDatetimeTool,
  loadMemoryTool,
  saveTherapeuticPatternTool,
  saveToMemoryTool,
} from '@tools/assistant'

describe('assistant agent tree', () => {
  const tree = buildAssistantAgentTree({
    models: DEFAULT_GLOBAL_CONFIG.models,
    apiKey: 'test-key',
  })

  test('the root delegates to the five specialists', () => {
    expect(tree.root.name).toBe('personal_assistant')
    expect(tree.root.subAgents.map(agent => agent.name)).toEqual([
      'therapeutic_support',
      'task_manager',
      'goal_refinement',
      'search_specialist',
      'journal_analyzer',
    ])
  })

  test('the journal analyzer runs its three steps in order', () => {
    const journal = tree.root.subAgents.find(agent => agent.name === 'journal_analyzer')

    expect(journal?.subAgents.map(agent => agent.name)).toEqual([
      'emotion_extractor',
      'pattern_analyzer',
      'insight_generator',
    ])
  })

  test('reports the models it was built with', () => {
    expect(tree.models).toEqual(DEFAULT_GLOBAL_CONFIG.models)
  })

  test('tools carry the names the prompts refer to', () => {
    expect(
      [
        loadMemoryTool,
        saveToMemoryTool,
        saveTherapeuticPatternTool,
        completeTaskTool,
        createGoalWithRoutineTool,
        approveGoalTool,
        getCurrentDatetimeTool,
      ].map(tool => tool.name),
    ).toEqual([
      'load_memory',
      'save_to_memory',
      'save_therapeutic_pattern',
      'complete_task',
      'create_goal_with_routine',
      'approve_goal',
      'get_current_datetime',
    ])
  })
})
