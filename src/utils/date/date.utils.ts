import { TZDateMini } from '@date-fns/tz';
import type { CalendarDate, EpochTimeStamp } from '@models/utility.types';
import { differenceInCalendarDays, startOfDay } from 'date-fns';
import { isNil } from 'lodash-es';

const inUTC = (date: EpochTimeStamp) => new TZDateMini(date, 'UTC');

export const toISOString = (timestamp?: EpochTimeStamp): string =>
  !isNil(timestamp) ? new Date(timestamp).toISOString() : 'Unknown Date';

/** Formats a timestamp as the UTC calendar day it falls on (`yyyy-MM-dd`). */
export const toCalendarDate = (timestamp: EpochTimeStamp): CalendarDate => toISOString(timestamp).slice(0, 10);

/** Truncates a timestamp to 00:00 UTC of its day. */
export const startOfUTCDay = (timestamp: EpochTimeStamp): EpochTimeStamp => startOfDay(inUTC(timestamp)).getTime();

/** Whole calendar days from `earlier` to `later`, both read in UTC. */
export const daysBetween = (earlier: EpochTimeStamp, later: EpochTimeStamp): number =>
  differenceInCalendarDays(inUTC(later), inUTC(earlier));
