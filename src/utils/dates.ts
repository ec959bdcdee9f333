/** Midnight UTC at the start of a "YYYY-MM-DD" day. */
export function startOfUtcDay(day: string): Date {
  return new Date(`${day}T00:00:00.000Z`);
}

/** Midnight UTC after a "YYYY-MM-DD" day, used as an exclusive upper bound. */
export function endOfUtcDay(day: string): Date {
  const end = startOfUtcDay(day);
  end.setUTCDate(end.getUTCDate() + 1);
  return end;
}

export function isCalendarDay(day: string): boolean {
  const start = startOfUtcDay(day);
  return !Number.isNaN(start.getTime()) && start.toISOString().startsWith(day);
}
