export type Nullable<T> = T | null;
/** Milliseconds since the unix epoch, UTC. */
export type EpochTimeStamp = number;
/** Calendar date formatted as `yyyy-MM-dd`. */
export type CalendarDate = string;
