function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** Local time as YYYYMMDDHHMMSSmmm */
export function compactDateTime(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}` +
    pad(date.getMilliseconds(), 3)
  );
}

/** Local time as YYYYMMDD-HHMMSS-mmm, for log file names */
export function logStamp(date: Date): string {
  const compact = compactDateTime(date);
  return `${compact.slice(0, 8)}-${compact.slice(8, 14)}-${compact.slice(14)}`;
}
