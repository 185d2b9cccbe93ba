/**
 * TraceID上下文管理
 * 使用AsyncLocalStorage在异步上下文中传递TraceID
 * 便于把同一请求的日志串起来
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

class TraceContext {
  private static asyncLocalStorage = new AsyncLocalStorage<string>();

  /**
   * 在指定TraceID的上下文中运行回调函数（未提供时自动生成）
   */
  static run<T>(traceId: string | undefined, callback: () => T): T {
    const finalTraceId = traceId || this.generateTraceId();
    return this.asyncLocalStorage.run(finalTraceId, callback);
  }

  /**
   * 获取当前上下文的TraceID
   */
  static getTraceId(): string | undefined {
    return this.asyncLocalStorage.getStore();
  }

  static generateTraceId(): string {
    return randomUUID();
  }
}

export default TraceContext;
