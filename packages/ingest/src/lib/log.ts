export type LogLevel = "INFO" | "SUCCESS" | "WARN" | "ERROR" | "FATAL";

export type Logger = {
  info: (message: string, ...details: unknown[]) => void;
  success: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
  fatal: (message: string, ...details: unknown[]) => void;
};

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

const write = (level: LogLevel, scope: string, message: string, details: unknown[]) => {
  const line = `[${level}] [${scope}] ${message}`;
  if (level === "WARN") {
    console.warn(line, ...details);
    return;
  }
  if (level === "ERROR" || level === "FATAL") {
    console.error(line, ...details);
    return;
  }
  console.log(line, ...details);
};

export const createLogger = (scope: string): Logger => ({
  info: (message, ...details) => write("INFO", scope, message, details),
  success: (message, ...details) => write("SUCCESS", scope, message, details),
  warn: (message, ...details) => write("WARN", scope, message, details),
  error: (message, ...details) => write("ERROR", scope, message, details),
  fatal: (message, ...details) => write("FATAL", scope, message, details),
});
