import { LlmAgent, SequentialAgent, type Gemini } from '@google/adk'
import {
  EMOTION_DATA_STATE_KEY,
  EMOTION_EXTRACTOR_AGENT_NAME,
  EMOTION_EXTRACTOR_INSTRUCTION,
  FINAL_INSIGHT_STATE_KEY,
  INSIGHT_GENERATOR_AGENT_NAME,
  INSIGHT_GENERATOR_INSTRUCTION,
  JOURNAL_AGENT_NAME,
  PATTERN_ANALYZER_AGENT_NAME,
  PATTERN_ANALYZER_INSTRUCTION,
  PATTERNS_FOUND_STATE_KEY,
} from '@services/ai/prompts/assistantPrompts'
import { saveToMemoryTool } from '@tools/assistant'

/**
 * Three-step journal pipeline. The first two steps only write structured
 * notes into session state; the insight generator is the one that replies.
 */
export function createJournalAgent(model: Gemini): SequentialAgent {
  const emotionExtractor = new LlmAgent({
    name: EMOTION_EXTRACTOR_AGENT_NAME,
    model,
    description: 'Extracts the emotional content of a journal entry.',
    instruction: EMOTION_EXTRACTOR_INSTRUCTION,
    outputKey: EMOTION_DATA_STATE_KEY,
  })

  const patternAnalyzer = new LlmAgent({
    name: PATTERN_ANALYZER_AGENT_NAME,
    model,
    description: 'Identifies patterns in the extracted emotions.',
    instruction: PATTERN_ANALYZER_INSTRUCTION,
    outputKey: PATTERNS_FOUND_STATE_KEY,
  })

  const insightGenerator = new LlmAgent({
    name: INSIGHT_GENERATOR_AGENT_NAME,
    model,
    description:
      'Replies with a personal insight and stores the journal entry for later sessions.',
    instruction: INSIGHT_GENERATOR_INSTRUCTION,
    tools: [saveToMemoryTool],
    outputKey: FINAL_INSIGHT_STATE_KEY,
  })

  return new SequentialAgent({
    name: JOURNAL_AGENT_NAME,
    description:
      'Analyzes a journal entry: emotion extraction, then pattern analysis, then insight generation.',
    subAgents: [emotionExtractor, patternAnalyzer, insightGenerator],
  })
}
