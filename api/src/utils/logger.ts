/**
 * 日志工具
 * 为所有日志添加时间戳、级别、模块名和当前请求的 TraceID，并按 LOG_LEVEL 过滤
 */

import TraceContext from './trace-context';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogExtra = Record<string, unknown>;

export interface Logger {
  debug(message: string, extra?: LogExtra): void;
  info(message: string, extra?: LogExtra): void;
  warn(message: string, extra?: LogExtra): void;
  error(message: string, extra?: LogExtra): void;
  child(module: string): Logger;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_WEIGHT, value);
}

function resolveInitialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  // 测试环境默认只输出 warn 以上，避免刷屏
  return process.env.NODE_ENV === 'test' ? 'warn' : 'info';
}

let currentLevel: LogLevel = resolveInitialLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function formatTimestamp(now: Date = new Date()): string {
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  const milliseconds = String(now.getMilliseconds()).padStart(3, '0');

  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}.${milliseconds}`;
}

/**
 * 拼出一行日志：[时间] [级别] [模块] [trace:xxx] 消息
 */
export function formatLine(level: LogLevel, module: string, message: string, traceId?: string): string {
  const trace = traceId ? ` [trace:${traceId}]` : '';
  return `[${formatTimestamp()}] [${level.toUpperCase()}] [${module}]${trace} ${message}`;
}

const CONSOLE_METHOD: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

function createLogger(module: string): Logger {
  const write = (level: LogLevel, message: string, extra?: LogExtra): void => {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[currentLevel]) {
      return;
    }
    const line = formatLine(level, module, message, TraceContext.getTraceId());
    if (extra && Object.keys(extra).length > 0) {
      CONSOLE_METHOD[level](line, extra);
    } else {
      CONSOLE_METHOD[level](line);
    }
  };

  return {
    debug: (message, extra) => write('debug', message, extra),
    info: (message, extra) => write('info', message, extra),
    warn: (message, extra) => write('warn', message, extra),
    error: (message, extra) => write('error', message, extra),
    child: (childModule) => createLogger(`${module}.${childModule}`),
  };
}

export const logger = createLogger('App');
