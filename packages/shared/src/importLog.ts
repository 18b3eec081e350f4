function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local wall-clock `YYYY-MM-DD HH:MM:SS`. */
export function formatLogTimestamp(now: Date): string {
  const date = `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}:${pad2(now.getMinutes())}:${pad2(now.getSeconds())}`;
  return `${date} ${time}`;
}

export function formatImportLogLine(message: string, now: Date = new Date()): string {
  return `${formatLogTimestamp(now)}: ${message}\n`;
}

export function cleanedLogLine(batchId: string, now: Date = new Date()): string {
  return formatImportLogLine(`Cleaned after batch ${batchId}`, now);
}
