const COMMIT_HOUR = 20;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function formatDay(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function formatMinute(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * Returns the 20:00 local time anchor of the calendar day `offsetDays`
 * away from `date`. Day arithmetic is done on the wall clock, so the
 * anchor stays at 20:00 across DST transitions.
 */
export function eveningAnchor(date: Date, offsetDays = 0): Date {
  return new Date(
    date.getFullYear(),
    date.getMonth(),
    date.getDate() + offsetDays,
    COMMIT_HOUR,
    0,
    0,
    0
  );
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(
    date.getFullYear(),
    date.getMonth(),
    date.getDate(),
    date.getHours(),
    date.getMinutes() + minutes,
    0,
    0
  );
}

/** Weekday index with Monday = 0 and Sunday = 6. */
export function weekdayIndex(date: Date): number {
  return (date.getDay() + 6) % 7;
}

export function isWeekend(date: Date): boolean {
  return weekdayIndex(date) >= 5;
}

/** `Contribution: YYYY-MM-DD HH:MM`, used for both the README line and the commit message. */
export function contributionLabel(date: Date): string {
  return `Contribution: ${formatDay(date)} ${formatMinute(date)}`;
}

/** The `--date` argument for git commit, wrapped in literal double quotes. */
export function gitDateArgument(date: Date): string {
  return `"${formatDay(date)} ${formatMinute(date)}:${pad(date.getSeconds())}"`;
}

export function directoryTimestamp(date: Date): string {
  return [
    date.getFullYear(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join("-");
}
