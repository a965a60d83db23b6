import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';

const resolveLevel = (): string => {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return nodeEnv === 'test' ? 'error' : 'info';
};

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
    const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    const trace = typeof stack === 'string' ? `\n${stack}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${rest}${trace}`;
  })
);

const logger = winston.createLogger({
  level: resolveLevel(),
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    nodeEnv === 'production' ? winston.format.json() : consoleFormat
  ),
  transports: [new winston.transports.Console()],
});

export default logger;
