import type { DaytimeWindow } from "../config/types.js";

function hourIn(timezone: string, at: Date): number {
  try {
    const fmt = new Intl.DateTimeFormat("en-US", { timeZone: timezone, hour: "numeric", hourCycle: "h23" });
    const hour = fmt.formatToParts(at).find((p) => p.type === "hour")?.value;
    return hour === undefined ? at.getUTCHours() : parseInt(hour, 10);
  } catch {
    return at.getUTCHours();
  }
}

/** Whether `at` falls in [start, end) hours of the window's timezone; overnight windows wrap. */
export function isDaytime(window: DaytimeWindow, at: Date = new Date()): boolean {
  const hour = hourIn(window.timezone, at);
  if (window.start <= window.end) return hour >= window.start && hour < window.end;
  return hour >= window.start || hour < window.end;
}

/** "HH:MM <zone>" in the given timezone, or UTC when the timezone is unknown. */
export function localTime(timezone: string | null, at: Date = new Date()): string {
  const zone = timezone ?? "UTC";
  try {
    return new Intl.DateTimeFormat("en-GB", {
      timeZone: zone,
      hour: "2-digit",
      minute: "2-digit",
      hourCycle: "h23",
      timeZoneName: "short",
    }).format(at);
  } catch {
    const utc = at.toISOString().slice(11, 16);
    return `${utc} UTC (unknown timezone)`;
  }
}
