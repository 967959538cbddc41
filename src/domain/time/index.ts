export {
  systemClock,
  fixedClock,
  MS_PER_HOUR,
  MS_PER_DAY,
  wholeDaysBetween,
  hoursBetween,
  isSameUtcDay,
  addDays,
  addHours,
} from './clock';

export type { Clock } from './clock';
