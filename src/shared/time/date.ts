const partsOf = (date: Date, timeZone: string, withTime: boolean) => {
  // `formatToParts()` keeps us independent of locale-specific separators and ordering.
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    ...(withTime
      ? {
          hour: "2-digit",
          minute: "2-digit",
          second: "2-digit",
          hourCycle: "h23",
        }
      : {}),
  }).formatToParts(date);

  return (type: Intl.DateTimeFormatPartTypes): string => {
    const value = parts.find((p) => p.type === type)?.value;
    if (!value) {
      throw new Error(`Failed to format date (tz=${timeZone})`);
    }
    return value;
  };
};

export function formatDateYYYYMMDD(date: Date, timeZone: string): string {
  const part = partsOf(date, timeZone, false);
  return `${part("year")}-${part("month")}-${part("day")}`;
}

export function formatDateTime(date: Date, timeZone: string): string {
  const part = partsOf(date, timeZone, true);
  return `${part("year")}-${part("month")}-${part("day")} ${part("hour")}:${part("minute")}:${part("second")}`;
}

export function assertYYYYMMDD(date: string): void {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
    throw new Error(`Expected YYYY-MM-DD, got: ${date}`);
  }
}

export function assertTimeZone(timeZone: string): void {
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone });
  } catch {
    throw new Error(`Unknown time zone: ${timeZone}`);
  }
}
