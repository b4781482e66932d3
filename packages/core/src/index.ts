/**
 * seatbook core
 *
 * Shared time primitives and logging for seatbook packages.
 * Times of day are "HH:MM" strings, dates are "YYYY-MM-DD" strings and
 * availability is reported on a 30-minute grid.
 */

export {
	MINUTES_PER_DAY,
	SLOT_GRID_MINUTES,
	addCalendarDays,
	addMinutesToLocalTime,
	calendarDateOf,
	calendarDaysBetween,
	formatLocalTime,
	hoursToMinutes,
	isCalendarDate,
	isOnSlotGrid,
	minutesBetween,
	parseLocalTime,
	tryParseLocalTime,
} from './time.js';
export type { CalendarDate, Hours, LocalTime } from './time.js';

export { LOG_LEVELS, createConsoleLogger, silentLogger } from './logger.js';
export type {
	ConsoleLoggerOptions,
	ConsoleSink,
	LogContext,
	LogLevel,
	Logger,
} from './logger.js';
