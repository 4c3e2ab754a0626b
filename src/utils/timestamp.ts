const pad = (n: number): string => String(n).padStart(2, "0");

/** Local time as YYYYMMDD_HHMMSS, the suffix of every output file. */
export function formatCaptureTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}
