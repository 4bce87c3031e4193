export type LogLevel = "debug" | "info" | "warn" | "error";

export type LoggingConfig = {
  /** Minimum level written to the console. */
  level?: LogLevel;
};
