/**
 * Logging for entry and name-index events
 *
 * Each event has a fixed payload; lines read
 * `[timestamp] [LEVEL] [event] #<id> ...`.
 * Debug lines are printed only when DATAMAP_DEBUG is set.
 */

export interface DataMapLogEvents {
  "datamap.entry.add": { id: number; languages: string[] };
  "datamap.entry.remove": { id: number };
  "datamap.name.overwrite": { id: number; language: string; name: string; previousId: number };
}

export type DataMapLogEvent = keyof DataMapLogEvents;

export type LogLevel = "debug" | "warn";

function describeEvent<E extends DataMapLogEvent>(event: E, data: DataMapLogEvents[E]): string;
function describeEvent(event: DataMapLogEvent, data: DataMapLogEvents[DataMapLogEvent]): string {
  const parts = [`#${data.id}`];

  if ("languages" in data) {
    parts.push(`languages=${data.languages.join(",")}`);
  }

  if ("previousId" in data) {
    parts.push(`(${data.language}) "${data.name}" reassigned from entry ${data.previousId}`);
  }

  return parts.join(" ");
}

/**
 * Render one log line
 */
export function formatLogLine<E extends DataMapLogEvent>(
  level: LogLevel,
  event: E,
  data: DataMapLogEvents[E],
  now: Date = new Date()
): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}] [${event}] ${describeEvent(event, data)}`;
}

class Logger {
  #enabled = true;

  debug<E extends DataMapLogEvent>(event: E, data: DataMapLogEvents[E]): void {
    if (!this.#enabled || !process.env.DATAMAP_DEBUG) return;
    console.debug(formatLogLine("debug", event, data));
  }

  warn<E extends DataMapLogEvent>(event: E, data: DataMapLogEvents[E]): void {
    if (!this.#enabled) return;
    console.warn(formatLogLine("warn", event, data));
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

export const logger = new Logger();
