import path from 'path';
import dotenv from 'dotenv';
import { loadConfig } from './config/app-config';
import { loadRosterSeed } from './config/roster-seed';
import { RosterService } from './services/roster.service';
import { createApp } from './app';
import { logger, setLogLevel } from './utils/logger';

const log = logger.child('Server');

// 加载环境变量（.env 可选）
const envPath = path.resolve(process.cwd(), '.env');
const result = dotenv.config({ path: envPath });
if (result.error) {
  log.info(`未找到 .env 文件 (${envPath})，使用系统环境变量`);
}

const config = loadConfig();
setLogLevel(config.logLevel);

function createRosterService(filePath: string): RosterService {
  try {
    return new RosterService(loadRosterSeed(filePath));
  } catch (error) {
    log.error('加载活动名单失败', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
}

const rosterService = createRosterService(config.activitiesFile);

const app = createApp({ config, rosterService });

// 启动服务器
const server = app.listen(config.port, config.host, () => {
  log.info(`API Server running on ${config.host}:${config.port}`, {
    activities: rosterService.size,
    env: config.nodeEnv,
  });
});

// 优雅关闭处理
const gracefulShutdown = (signal: string, exitCode: number) => {
  log.info(`收到 ${signal} 信号，开始优雅关闭...`);

  server.close((error) => {
    if (error) {
      log.error('关闭HTTP服务器失败', { error: error.message });
      process.exit(1);
    }
    log.info('HTTP服务器已关闭');
    process.exit(exitCode);
  });
  server.closeIdleConnections();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM', 0));
process.on('SIGINT', () => gracefulShutdown('SIGINT', 0));

process.on('uncaughtException', (error) => {
  log.error('未捕获的异常', { error: error.message, stack: error.stack });
  gracefulShutdown('uncaughtException', 1);
});

process.on('unhandledRejection', (reason) => {
  log.error('未处理的Promise拒绝', { reason: reason instanceof Error ? reason.message : String(reason) });
  gracefulShutdown('unhandledRejection', 1);
});

export default app;
