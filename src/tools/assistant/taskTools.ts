import { FunctionTool } from '@google/adk'
import { z } from 'zod'
import { debug as debugLogger } from '@utils/log/debugLogger'
import type { ReminderRecord, TaskRecord } from '@services/ai/types/assistant'
import {
  STATE_KEYS,
  ensureList,
  findOwnedRecord,
  readRawList,
  readTypedList,
  replaceAt,
  resolveToolSession,
  systemClock,
  type Clock,
  type SessionStateAccess,
} from './sessionState'

const TaskRecordSchema = z.object({
  id: z.number(),
  user_id: z.string(),
  title: z.string(),
  due_date: z.string().catch(''),
  priority: z.string().catch('medium'),
  completed: z.boolean().catch(false),
  created_at: z.string().catch(''),
  completed_at: z.string().optional(),
})

const ReminderRecordSchema = z.object({
  id: z.number(),
  user_id: z.string(),
  title: z.string(),
  date: z.string(),
  time: z.string(),
  created_at: z.string().catch(''),
})

function getUserTasks(state: SessionStateAccess, userId: string): TaskRecord[] {
  return readTypedList(state, STATE_KEYS.tasks, TaskRecordSchema).filter(
    task => task.user_id === userId,
  )
}

function getUserReminders(
  state: SessionStateAccess,
  userId: string,
): ReminderRecord[] {
  return readTypedList(state, STATE_KEYS.reminders, ReminderRecordSchema).filter(
    reminder => reminder.user_id === userId,
  )
}

function formatTaskLine(task: TaskRecord): string {
  const dueInfo = task.due_date ? ` (due: ${task.due_date})` : ''
  const priority = task.priority || 'medium'
  const doneInfo = task.completed ? ' ✓ done' : ''
  return `\n• ${task.title} - Priority: ${priority}${dueInfo}${doneInfo}`
}

function formatReminderLine(reminder: ReminderRecord): string {
  return `\n• ${reminder.title} - ${reminder.date} at ${reminder.time}`
}

export function createTask(
  state: SessionStateAccess,
  userId: string,
  input: { title: string; due_date?: string; priority?: string },
  clock: Clock = systemClock,
): string {
  const tasks = readRawList(state, STATE_KEYS.tasks)
  const dueDate = input.due_date ?? ''
  const task: TaskRecord = {
    id: tasks.length + 1,
    user_id: userId,
    title: input.title,
    due_date: dueDate,
    priority: input.priority || 'medium',
    completed: false,
    created_at: clock().toISOString(),
  }

  state.set(STATE_KEYS.tasks, [...tasks, task])
  debugLogger.info('TASK_CREATED', { userId, id: task.id, title: task.title })
  debugLogger.debug('TASK_COUNT', { total: tasks.length + 1 })

  return `✓ Task created: ${input.title}` + (dueDate ? ` (due: ${dueDate})` : '')
}

export function getTasks(state: SessionStateAccess, userId: string): string {
  ensureList(state, STATE_KEYS.tasks)
  const userTasks = getUserTasks(state, userId)
  debugLogger.info('TASKS_LISTED', { userId, count: userTasks.length })

  if (userTasks.length === 0) {
    return 'You have no tasks.'
  }

  let result = `You have ${userTasks.length} task(s):\n`
  for (const task of userTasks) {
    result += formatTaskLine(task)
  }
  return result
}

export function completeTask(
  state: SessionStateAccess,
  userId: string,
  input: { task_id: number },
  clock: Clock = systemClock,
): string {
  const tasks = readRawList(state, STATE_KEYS.tasks)
  const match = findOwnedRecord(tasks, TaskRecordSchema, input.task_id, userId)
  if (!match) {
    return `❌ Task ID ${input.task_id} not found.`
  }

  state.set(
    STATE_KEYS.tasks,
    replaceAt(tasks, match.index, {
      ...match.raw,
      completed: true,
      completed_at: clock().toISOString(),
    }),
  )
  debugLogger.info('TASK_COMPLETED', { userId, id: input.task_id })
  return `✓ Task completed: ${match.record.title}`
}

export function scheduleReminder(
  state: SessionStateAccess,
  userId: string,
  input: { title: string; date: string; time: string },
  clock: Clock = systemClock,
): string {
  const reminders = readRawList(state, STATE_KEYS.reminders)
  const reminder: ReminderRecord = {
    id: reminders.length + 1,
    user_id: userId,
    title: input.title,
    date: input.date,
    time: input.time,
    created_at: clock().toISOString(),
  }

  state.set(STATE_KEYS.reminders, [...reminders, reminder])
  debugLogger.info('REMINDER_SCHEDULED', {
    userId,
    id: reminder.id,
    title: reminder.title,
    date: reminder.date,
    time: reminder.time,
  })

  return `✓ Reminder set: ${input.title} on ${input.date} at ${input.time}`
}

export function getReminders(state: SessionStateAccess, userId: string): string {
  ensureList(state, STATE_KEYS.reminders)
  const userReminders = getUserReminders(state, userId)
  debugLogger.info('REMINDERS_LISTED', { userId, count: userReminders.length })

  if (userReminders.length === 0) {
    return 'You have no reminders scheduled.'
  }

  let result = `You have ${userReminders.length} reminder(s):\n`
  for (const reminder of userReminders) {
    result += formatReminderLine(reminder)
  }
  return result
}

export function getAllItems(state: SessionStateAccess, userId: string): string {
  ensureList(state, STATE_KEYS.tasks)
  ensureList(state, STATE_KEYS.reminders)
  const userTasks = getUserTasks(state, userId)
  const userReminders = getUserReminders(state, userId)
  debugLogger.info('ALL_ITEMS_LISTED', {
    userId,
    tasks: userTasks.length,
    reminders: userReminders.length,
  })

  if (userTasks.length === 0 && userReminders.length === 0) {
    return 'You have no tasks or reminders.'
  }

  let result = ''
  if (userTasks.length > 0) {
    result += `\n📋 **Tasks** (${userTasks.length}):\n`
    for (const task of userTasks) {
      result += formatTaskLine(task)
    }
  }
  if (userReminders.length > 0) {
    result += `\n\n📅 **Reminders** (${userReminders.length}):\n`
    for (const reminder of userReminders) {
      result += formatReminderLine(reminder)
    }
  }
  return result.trim()
}

export const createTaskTool = new FunctionTool({
  name: 'create_task',
  description: 'Create a task or todo item without a specific time.',
  parameters: z.object({
    title: z.string().describe('Task description'),
    due_date: z
      .string()
      .optional()
      .describe('Optional due date in YYYY-MM-DD format'),
    priority: z
      .enum(['low', 'medium', 'high'])
      .optional()
      .describe('Priority: low, medium, or high (default medium)'),
  }),
  execute: (input, toolContext) => {
    const { state, userId } = resolveToolSession('create_task', toolContext)
    return createTask(state, userId, input)
  },
})

export const getTasksTool = new FunctionTool({
  name: 'get_tasks',
  description: 'List all tasks for the current user.',
  parameters: z.object({}),
  execute: (_input, toolContext) => {
    const { state, userId } = resolveToolSession('get_tasks', toolContext)
    return getTasks(state, userId)
  },
})

export const completeTaskTool = new FunctionTool({
  name: 'complete_task',
  description: 'Mark one of the current user tasks as completed.',
  parameters: z.object({
    task_id: z.number().int().describe('The ID of the task to complete'),
  }),
  execute: (input, toolContext) => {
    const { state, userId } = resolveToolSession('complete_task', toolContext)
    return completeTask(state, userId, input)
  },
})

export const scheduleReminderTool = new FunctionTool({
  name: 'schedule_reminder',
  description: 'Schedule a reminder or calendar event at a specific date and time.',
  parameters: z.object({
    title: z.string().describe('Event or reminder title'),
    date: z.string().describe('Date in YYYY-MM-DD format'),
    time: z.string().describe('Time in 24-hour HH:MM format'),
  }),
  execute: (input, toolContext) => {
    const { state, userId } = resolveToolSession(
      'schedule_reminder',
      toolContext,
    )
    return scheduleReminder(state, userId, input)
  },
})

export const getRemindersTool = new FunctionTool({
  name: 'get_reminders',
  description: 'List all reminders for the current user.',
  parameters: z.object({}),
  execute: (_input, toolContext) => {
    const { state, userId } = resolveToolSession('get_reminders', toolContext)
    return getReminders(state, userId)
  },
})

export const getAllItemsTool = new FunctionTool({
  name: 'get_all_items',
  description: 'List all tasks and reminders for the current user.',
  parameters: z.object({}),
  execute: (_input, toolContext) => {
    const { state, userId } = resolveToolSession('get_all_items', toolContext)
    return getAllItems(state, userId)
  },
})
