import winston from "winston";

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, component, ...metadata }) => {
    let line = `${String(timestamp)} [${level}] ${String(component)}: ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      line += ` ${JSON.stringify(metadata)}`;
    }
    return line;
  }),
);

/**
 * Creates a component-scoped logger. `LOG_LEVEL` picks the threshold;
 * `LOG_LEVEL=silent` mutes every transport.
 */
export function createLogger(component: string): winston.Logger {
  const level = process.env.LOG_LEVEL ?? "info";

  return winston.createLogger({
    level: level === "silent" ? "error" : level,
    silent: level === "silent",
    defaultMeta: { component },
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
        stderrLevels: ["error", "warn", "info", "debug"],
      }),
    ],
  });
}
