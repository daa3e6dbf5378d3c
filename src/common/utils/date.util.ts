import { differenceInCalendarDays, format, parseISO } from 'date-fns';

export const ISO_DATE = 'yyyy-MM-dd';

export const todayIso = (): string => format(new Date(), ISO_DATE);

export const toIsoDate = (value: Date | string): string =>
  typeof value === 'string' ? value.slice(0, 10) : format(value, ISO_DATE);

/** Whole calendar days from `dueDate` to `today`; negative when not yet due. */
export const calendarDaysBetween = (dueDate: string, today: string): number =>
  differenceInCalendarDays(parseISO(today), parseISO(dueDate));

export const monthStart = (isoDate: string): string => `${isoDate.slice(0, 7)}-01`;
