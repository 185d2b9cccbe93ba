import rateLimit from 'express-rate-limit';
import type { RequestHandler } from 'express';
import type { RateLimitConfig } from '../config/app-config';
import { ErrorFactory } from '../utils/errors';

/**
 * API请求限流中间件
 * 超限后交给统一错误处理，返回 429 { detail }
 */
export function createRateLimiter(config: RateLimitConfig): RequestHandler {
  return rateLimit({
    windowMs: config.windowMs,
    limit: config.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, _res, next) => next(ErrorFactory.rateLimit()),
  });
}
