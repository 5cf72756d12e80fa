export { now, nowMs, formatStorageTimestamp, formatDisplayTimestamp, sleep } from './time';
export { parseCalendarDate, formatCalendarDate, addDays, startOfDayTimestamp } from './helpers';
