import express, { Express } from 'express';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { AppConfig } from './config/app-config';
import { swaggerSpec } from './config/swagger';
import { RosterService } from './services/roster.service';
import { createActivitiesRouter } from './routes/activities';
import { createHealthRouter } from './routes/health';
import { rootRouter } from './routes/root';
import { requestContext } from './middleware/requestContext';
import { createRateLimiter } from './middleware/rateLimiter';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler';

export interface AppDependencies {
  config: AppConfig;
  rosterService: RosterService;
}

/**
 * 组装 Express 应用，不监听端口（由 server.ts 或测试负责）
 */
export function createApp({ config, rosterService }: AppDependencies): Express {
  const app = express();

  // 中间件
  app.use(requestContext);
  app.use(cors());
  if (config.rateLimit.max > 0) {
    app.use(createRateLimiter(config.rateLimit));
  }

  // 路由
  app.use('/docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));
  app.use('/static', express.static(config.staticDir));
  app.use('/', rootRouter);
  app.use('/activities', createActivitiesRouter(rosterService));
  app.use('/health', createHealthRouter(rosterService));

  // 错误处理中间件
  app.use(notFoundHandler);
  app.use(createErrorHandler({ production: config.nodeEnv === 'production' }));

  return app;
}
