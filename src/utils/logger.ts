import winston from 'winston';
import path from 'path';

// 日志级别配置
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4
};

export type LogLevel = keyof typeof levels;

// 日志颜色配置
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white'
};

winston.addColors(colors);

const RESERVED_KEYS = ['timestamp', 'level', 'message'];

const formatMeta = (info: winston.Logform.TransformableInfo): string => {
  const meta = Object.entries(info).filter(([key]) => !RESERVED_KEYS.includes(key));
  return meta.length > 0 ? ` ${JSON.stringify(Object.fromEntries(meta))}` : '';
};

// 控制台格式
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ level: true }),
  winston.format.printf((info) => `${info.timestamp} ${info.level}: ${info.message}${formatMeta(info)}`)
);

const transports: winston.transport[] = [
  new winston.transports.Console({ format: consoleFormat })
];

// 文件传输（仅在设置 LOG_DIR 时启用）
const logDir = process.env.LOG_DIR;
if (logDir) {
  transports.push(
    new winston.transports.File({
      filename: path.join(logDir, 'app.log'),
      format: winston.format.combine(winston.format.timestamp(), winston.format.json())
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      format: winston.format.combine(winston.format.timestamp(), winston.format.json())
    })
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  levels,
  transports,
  exitOnError: false
});

export default logger;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levels, value);
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

type LogMeta = Record<string, unknown>;

// 便捷方法
export const log = {
  error: (message: string, meta?: LogMeta) => logger.error(message, meta),
  warn: (message: string, meta?: LogMeta) => logger.warn(message, meta),
  info: (message: string, meta?: LogMeta) => logger.info(message, meta),
  http: (message: string, meta?: LogMeta) => logger.http(message, meta),
  debug: (message: string, meta?: LogMeta) => logger.debug(message, meta),
};
