import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { ErrorFactory, normalizeError, ErrorSeverity } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.child('HTTP.Error');

export interface ErrorHandlerOptions {
  /** 生产环境隐藏非预期错误的原始信息 */
  production: boolean;
}

/**
 * 统一错误处理中间件
 * 响应体固定为 { detail }，错误码放在 X-Error-Code 响应头
 */
export function createErrorHandler(options: ErrorHandlerOptions): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const appError = normalizeError(err);
    const context = {
      path: req.path,
      method: req.method,
      details: appError.details,
    };

    // 根据错误严重程度记录日志
    switch (appError.severity) {
      case ErrorSeverity.CRITICAL:
        log.error(`[CRITICAL] ${appError.code}: ${appError.message}`, { ...context, stack: appError.stack });
        break;
      case ErrorSeverity.HIGH:
        log.error(`[HIGH] ${appError.code}: ${appError.message}`, context);
        break;
      case ErrorSeverity.MEDIUM:
        log.warn(`[MEDIUM] ${appError.code}: ${appError.message}`, context);
        break;
      case ErrorSeverity.LOW:
        log.debug(`[LOW] ${appError.code}: ${appError.message}`, { path: req.path, method: req.method });
        break;
    }

    const detail = options.production && !appError.isOperational
      ? 'Internal Server Error'
      : appError.message;

    res
      .status(appError.statusCode)
      .set('X-Error-Code', appError.code)
      .json({ detail });
  };
}

/**
 * 未匹配任何路由
 */
export const notFoundHandler: RequestHandler = (_req, _res, next) => {
  next(ErrorFactory.notFound());
};
