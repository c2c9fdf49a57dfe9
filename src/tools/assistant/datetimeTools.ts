import { FunctionTool } from '@google/adk'
import { z } from 'zod'
import { systemClock, type Clock } from './sessionState'

const WEEKDAYS = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
]

function pad2(value: number): string {
  return String(value).padStart(2, '0')
}

export function formatLocalDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`
}

export function getCurrentDatetime(clock: Clock = systemClock): string {
  const now = clock()
  const time = `${pad2(now.getHours())}:${pad2(now.getMinutes())}`
  return `Date: ${formatLocalDate(now)} (${WEEKDAYS[now.getDay()]}), Time: ${time}`
}

export const getCurrentDatetimeTool = new FunctionTool({
  name: 'get_current_datetime',
  description:
    "Get the current local date (YYYY-MM-DD, weekday) and time (HH:MM). Use it to calculate relative dates like 'tomorrow' or 'next Friday'.",
  parameters: z.object({}),
  execute: () => getCurrentDatetime(),
})
