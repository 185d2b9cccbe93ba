/**
 * 应用配置
 * 从环境变量读取（server.ts 启动时先用 dotenv 加载 .env），非法值回退到默认值并告警
 */

import path from 'path';
import { isLogLevel, logger, LogLevel } from '../utils/logger';

const log = logger.child('Config');

export interface RateLimitConfig {
  windowMs: number;
  /** 每个 IP 在窗口内允许的请求数，0 表示关闭限流 */
  max: number;
}

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: LogLevel;
  activitiesFile: string;
  staticDir: string;
  rateLimit: RateLimitConfig;
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_ACTIVITIES_FILE = 'api/data/activities.json';
export const DEFAULT_STATIC_DIR = 'api/static';
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 15 * 60 * 1000; // 15分钟

function readInteger(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER
): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (Number.isNaN(value) || value < min || value > max) {
    log.warn(`${key}=${raw} 无效，使用默认值 ${fallback}`);
    return fallback;
  }
  return value;
}

function readLogLevel(env: NodeJS.ProcessEnv, nodeEnv: string): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  if (raw) {
    log.warn(`LOG_LEVEL=${raw} 无效，使用默认级别`);
  }
  return nodeEnv === 'test' ? 'warn' : 'info';
}

/**
 * 读取配置；相对路径按当前工作目录解析
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV?.trim() || 'development';

  return {
    port: readInteger(env, 'PORT', DEFAULT_PORT, 0, 65535),
    host: env.HOST?.trim() || DEFAULT_HOST,
    nodeEnv,
    logLevel: readLogLevel(env, nodeEnv),
    activitiesFile: path.resolve(env.ACTIVITIES_FILE?.trim() || DEFAULT_ACTIVITIES_FILE),
    staticDir: path.resolve(env.STATIC_DIR?.trim() || DEFAULT_STATIC_DIR),
    rateLimit: {
      windowMs: readInteger(env, 'RATE_LIMIT_WINDOW_MS', DEFAULT_RATE_LIMIT_WINDOW_MS, 1),
      max: readInteger(env, 'RATE_LIMIT_MAX', 0, 0),
    },
  };
}
