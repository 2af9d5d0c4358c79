const pad = (value: number): string => String(value).padStart(2, '0');

/** `YYYYMMDD_HHMMSS` in local time, used in report file names. */
export const formatFileTimestamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export const formatDisplayTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
