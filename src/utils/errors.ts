import { log } from './logger';

// 自定义错误类
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number = 500, isOperational: boolean = true, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

// 配置错误类
export class ConfigError extends AppError {
  public readonly key: string;

  constructor(message: string, key: string) {
    super(message, 500, false);
    this.key = key;
    this.name = 'ConfigError';
  }
}

// 应用加载错误类
export class LoadError extends AppError {
  public readonly target: string;

  constructor(message: string, target: string, cause?: unknown) {
    super(message, 500, false, cause);
    this.target = target;
    this.name = 'LoadError';
  }
}

// 端口绑定错误类
export class BindError extends AppError {
  public readonly host: string;
  public readonly port: number;
  public readonly code: string | undefined;

  constructor(host: string, port: number, cause: NodeJS.ErrnoException) {
    super(describeBindFailure(host, port, cause), 500, false, cause);
    this.host = host;
    this.port = port;
    this.code = cause.code;
    this.name = 'BindError';
  }
}

// 单个请求的错误，只影响当前连接
export class RequestError extends AppError {
  constructor(message: string, statusCode: number = 500, cause?: unknown) {
    super(message, statusCode, true, cause);
    this.name = 'RequestError';
  }
}

function describeBindFailure(host: string, port: number, cause: NodeJS.ErrnoException): string {
  switch (cause.code) {
    case 'EADDRINUSE':
      return `Address ${host}:${port} is already in use`;
    case 'EACCES':
      return `Permission denied binding ${host}:${port}`;
    default:
      return `Failed to bind ${host}:${port}: ${cause.message}`;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// 错误处理
export function handleError(error: Error, context?: string): void {
  const errorContext = context ? `[${context}] ` : '';

  if (error instanceof AppError && error.isOperational) {
    log.warn(`${errorContext}${error.message}`, {
      statusCode: error.statusCode,
      cause: error.cause instanceof Error ? error.cause.message : undefined
    });
  } else {
    log.error(`${errorContext}${error.message}`, {
      stack: error.stack,
      name: error.name,
      cause: error.cause instanceof Error ? error.cause.message : undefined
    });
  }
}

// 全局未捕获异常处理
export function setupGlobalErrorHandling(): void {
  process.on('uncaughtException', (error: Error) => {
    log.error('Uncaught exception', { error: error.message, stack: error.stack });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    log.error('Unhandled promise rejection', { reason: toError(reason).message });
  });
}
