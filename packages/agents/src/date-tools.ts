import { z } from 'zod';
import type { Tool } from '@switchboard/shared';

const MS_PER_DAY = 86_400_000;

const addDaysInput = z.object({
  days: z.number({ required_error: '"days" is required', invalid_type_error: '"days" must be a number' }).int('"days" must be an integer'),
});

const isoDate = (field: string) =>
  z
    .string({ required_error: `"${field}" is required`, invalid_type_error: `"${field}" must be a string` })
    .refine((value) => !Number.isNaN(Date.parse(value)), `"${field}" is not a valid date`);

const subtractDatesInput = z.object({
  startDate: isoDate('startDate'),
  endDate: isoDate('endDate'),
});

function parseInput<T>(schema: z.ZodType<T>, input: Record<string, unknown>): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new Error(result.error.issues[0]?.message ?? 'invalid input');
  }
  return result.data;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** ISO 8601 in local time with the UTC offset, e.g. 2026-03-01T09:30:00+01:00 */
export function formatLocal(date: Date): string {
  const offset = -date.getTimezoneOffset();
  const sign = offset >= 0 ? '+' : '-';
  const abs = Math.abs(offset);
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  );
}

/**
 * Date and time functions the router model may call. `now` is injectable
 * so callers can pin the clock.
 */
export function createDateTools(now: () => Date = () => new Date()): Tool[] {
  return [
    {
      name: 'get_date_time',
      description: 'Returns the current local date and time as an ISO 8601 timestamp with UTC offset.',
      input_schema: { type: 'object', properties: {} },
      handler: () => formatLocal(now()),
    },
    {
      name: 'get_date_time_utc',
      description: 'Returns the current UTC date and time as an ISO 8601 timestamp.',
      input_schema: { type: 'object', properties: {} },
      handler: () => now().toISOString(),
    },
    {
      name: 'add_days',
      description: 'Adds a number of days (negative to go back) to the current date and time and returns the UTC ISO 8601 timestamp.',
      input_schema: {
        type: 'object',
        properties: { days: { type: 'integer', description: 'Days to add' } },
        required: ['days'],
      },
      handler: (input) => {
        const { days } = parseInput(addDaysInput, input);
        return new Date(now().getTime() + days * MS_PER_DAY).toISOString();
      },
    },
    {
      name: 'subtract_dates',
      description: 'Returns the interval between two ISO 8601 dates as JSON with days, hours, minutes, seconds and totalSeconds. The start must not be after the end.',
      input_schema: {
        type: 'object',
        properties: {
          startDate: { type: 'string', description: 'ISO 8601 start' },
          endDate: { type: 'string', description: 'ISO 8601 end' },
        },
        required: ['startDate', 'endDate'],
      },
      handler: (input) => {
        const { startDate, endDate } = parseInput(subtractDatesInput, input);
        const ms = Date.parse(endDate) - Date.parse(startDate);
        if (ms < 0) {
          throw new Error('startDate must be earlier than endDate');
        }
        const totalSeconds = Math.floor(ms / 1000);
        return JSON.stringify({
          days: Math.floor(totalSeconds / 86_400),
          hours: Math.floor((totalSeconds % 86_400) / 3600),
          minutes: Math.floor((totalSeconds % 3600) / 60),
          seconds: totalSeconds % 60,
          totalSeconds,
        });
      },
    },
  ];
}

export const DATE_TOOLS: Tool[] = createDateTools();
