import winston from "winston";

const LOG_LEVEL_ENV = "MARKDOWN_EVENTS_LOG_LEVEL";

function resolveLevel(): string {
  const requested = process.env[LOG_LEVEL_ENV]?.toLowerCase();
  if (requested && requested in winston.config.npm.levels) {
    return requested;
  }
  return "warn";
}

export const logger = winston.createLogger({
  level: resolveLevel(),
  format: winston.format.combine(
    winston.format.label({ label: "markdown-events" }),
    winston.format.timestamp(),
    winston.format.printf(({ level, message, label, timestamp }) => `${timestamp} [${label}] ${level}: ${message}`),
  ),
  transports: [new winston.transports.Console({ stderrLevels: ["error", "warn"] })],
});
