export {
  loadMemoryTool,
  saveTherapeuticPatternTool,
  saveToMemoryTool,
} from './memoryTools'
export {
  completeTaskTool,
  createTaskTool,
  getAllItemsTool,
  getRemindersTool,
  getTasksTool,
  scheduleReminderTool,
} from './taskTools'
export { getCurrentDatetimeTool } from './datetimeTools'
export {
  approveGoalTool,
  createGoalWithRoutineTool,
  getGoalTool,
  listGoalsTool,
  updateGoalStatusTool,
} from './goalTools'
