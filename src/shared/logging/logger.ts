export type LogLevel = "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | null | undefined | string[]>;

/**
 * Structured single-line JSON events. Callers pass an event name plus flat fields;
 * undefined fields are dropped by JSON.stringify.
 */
export const logEvent = (level: LogLevel, event: string, fields: LogFields = {}): void => {
  const line = JSON.stringify({ event, ...fields });
  /* eslint-disable no-console */
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
  /* eslint-enable no-console */
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
