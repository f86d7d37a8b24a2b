export async function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

const pad = (n: number) => String(n).padStart(2, "0");

// 2025-05-27 14:03:09, local time
export function displayTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(
    date.getMinutes()
  )}:${pad(date.getSeconds())}`;
}

// 20250527_140309, local time
export function fileStamp(date: Date): string {
  return displayTime(date).replace(/-|:/g, "").replace(" ", "_");
}
