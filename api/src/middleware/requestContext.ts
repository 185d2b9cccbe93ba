import { Request, Response, NextFunction } from 'express';
import TraceContext from '../utils/trace-context';
import { logger } from '../utils/logger';

const log = logger.child('HTTP');

const MAX_TRACE_ID_LENGTH = 128;

/**
 * 为每个请求建立 TraceID 上下文，并在响应结束时记录访问日志
 * 上游传入的 X-Trace-Id 会被沿用
 */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const inbound = req.header('x-trace-id')?.trim();
  const traceId = inbound && inbound.length <= MAX_TRACE_ID_LENGTH
    ? inbound
    : TraceContext.generateTraceId();
  const startedAt = Date.now();

  res.setHeader('X-Trace-Id', traceId);
  res.on('finish', () => {
    TraceContext.run(traceId, () => {
      log.info(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms`);
    });
  });

  TraceContext.run(traceId, () => next());
}
