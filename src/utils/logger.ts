import winston from 'winston'

const { combine, timestamp, colorize, printf, errors } = winston.format

// ─────────────────────────────────────────────────────────────────────────────
// Logger: one winston logger per module, shared through winston.loggers
// ─────────────────────────────────────────────────────────────────────────────

function createLogger(moduleName: string): winston.Logger {
  return winston.loggers.add(moduleName, {
    level: process.env.LOG_LEVEL || 'info',
    format: combine(errors({ stack: true }), timestamp()),
    transports: [
      new winston.transports.Console({
        format: combine(
          colorize(),
          printf(
            (info) =>
              `[${String(info.timestamp)}] ${info.level}  [${moduleName}]: ${String(info.message)}${
                info.stack ? `\n${String(info.stack)}` : ''
              }`
          )
        ),
        // Diagnostics go to stderr so stdout only carries results
        stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
      }),
    ],
  })
}

/**
 * Get the logger for a module, creating it on first use.
 * The level comes from LOG_LEVEL (default "info").
 */
export function getLogger(moduleName: string): winston.Logger {
  if (winston.loggers.has(moduleName)) {
    return winston.loggers.get(moduleName)
  }
  return createLogger(moduleName)
}
