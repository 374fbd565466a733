import winston from "winston";

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(
  ({ level, message, timestamp: ts, module: mod, ...meta }) => {
    const moduleTag = typeof mod === "string" ? `[${mod}]` : "";
    const metaStr =
      Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${String(ts)} ${level} ${moduleTag} ${String(message)}${metaStr}`;
  },
);

const transports: (
  | winston.transports.ConsoleTransportInstance
  | winston.transports.FileTransportInstance
)[] = [
  new winston.transports.Console({
    format: combine(colorize(), timestamp({ format: "HH:mm:ss.SSS" }), logFormat),
  }),
];

const logFile = process.env.RESEARCH_LOG_FILE;
if (logFile) {
  transports.push(
    new winston.transports.File({
      filename: logFile,
      maxsize: 10_000_000,
      maxFiles: 3,
    }),
  );
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: combine(timestamp({ format: "HH:mm:ss.SSS" }), logFormat),
  transports,
});

export const createModuleLogger = (moduleName: string): winston.Logger =>
  logger.child({ module: moduleName });
