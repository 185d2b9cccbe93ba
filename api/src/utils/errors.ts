/**
 * 统一错误处理工具
 * 定义错误分类、错误码体系和错误类
 */

/**
 * 错误码枚举
 */
export enum ErrorCode {
  // 通用错误
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  INVALID_REQUEST = 'INVALID_REQUEST',
  MISSING_PARAMETER = 'MISSING_PARAMETER',
  CONFIG_ERROR = 'CONFIG_ERROR',

  // 资源错误
  NOT_FOUND = 'NOT_FOUND',

  // 报名业务错误
  ALREADY_SIGNED_UP = 'ALREADY_SIGNED_UP',
  NOT_REGISTERED = 'NOT_REGISTERED',

  // 限流
  RATE_LIMIT = 'RATE_LIMIT',
}

/**
 * 错误严重程度
 */
export enum ErrorSeverity {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  CRITICAL = 'CRITICAL',
}

/**
 * 错误分类
 */
export enum ErrorCategory {
  CLIENT_ERROR = 'CLIENT_ERROR',      // 客户端错误（4xx）
  SERVER_ERROR = 'SERVER_ERROR',       // 服务器错误（5xx）
  BUSINESS_ERROR = 'BUSINESS_ERROR',   // 报名规则校验失败
}

export type ErrorDetails = Record<string, unknown>;

/**
 * 应用错误类
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly severity: ErrorSeverity;
  public readonly category: ErrorCategory;
  public readonly details?: ErrorDetails;
  public readonly isOperational: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: number = 500,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    category: ErrorCategory = ErrorCategory.SERVER_ERROR,
    details?: ErrorDetails,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.severity = severity;
    this.category = category;
    this.details = details;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

const ERROR_CODE_TO_STATUS: Record<ErrorCode, number> = {
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.INVALID_REQUEST]: 400,
  [ErrorCode.MISSING_PARAMETER]: 400,
  [ErrorCode.CONFIG_ERROR]: 500,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.ALREADY_SIGNED_UP]: 400,
  [ErrorCode.NOT_REGISTERED]: 400,
  [ErrorCode.RATE_LIMIT]: 429,
};

const ERROR_CODE_TO_SEVERITY: Record<ErrorCode, ErrorSeverity> = {
  [ErrorCode.INTERNAL_ERROR]: ErrorSeverity.HIGH,
  [ErrorCode.INVALID_REQUEST]: ErrorSeverity.LOW,
  [ErrorCode.MISSING_PARAMETER]: ErrorSeverity.LOW,
  [ErrorCode.CONFIG_ERROR]: ErrorSeverity.CRITICAL,
  [ErrorCode.NOT_FOUND]: ErrorSeverity.LOW,
  [ErrorCode.ALREADY_SIGNED_UP]: ErrorSeverity.LOW,
  [ErrorCode.NOT_REGISTERED]: ErrorSeverity.LOW,
  [ErrorCode.RATE_LIMIT]: ErrorSeverity.MEDIUM,
};

const ERROR_CODE_TO_CATEGORY: Record<ErrorCode, ErrorCategory> = {
  [ErrorCode.INTERNAL_ERROR]: ErrorCategory.SERVER_ERROR,
  [ErrorCode.INVALID_REQUEST]: ErrorCategory.CLIENT_ERROR,
  [ErrorCode.MISSING_PARAMETER]: ErrorCategory.CLIENT_ERROR,
  [ErrorCode.CONFIG_ERROR]: ErrorCategory.SERVER_ERROR,
  [ErrorCode.NOT_FOUND]: ErrorCategory.CLIENT_ERROR,
  [ErrorCode.ALREADY_SIGNED_UP]: ErrorCategory.BUSINESS_ERROR,
  [ErrorCode.NOT_REGISTERED]: ErrorCategory.BUSINESS_ERROR,
  [ErrorCode.RATE_LIMIT]: ErrorCategory.CLIENT_ERROR,
};

/**
 * 创建应用错误
 */
export function createError(
  code: ErrorCode,
  message: string,
  details?: ErrorDetails
): AppError {
  return new AppError(
    code,
    message,
    ERROR_CODE_TO_STATUS[code],
    ERROR_CODE_TO_SEVERITY[code],
    ERROR_CODE_TO_CATEGORY[code],
    details
  );
}

/**
 * 错误工厂函数
 * 对外的 message 即响应体中的 detail，保持英文
 */
export const ErrorFactory = {
  invalidRequest: (message: string = 'Invalid request', details?: ErrorDetails) =>
    createError(ErrorCode.INVALID_REQUEST, message, details),

  missingParameter: (paramName: string) =>
    createError(ErrorCode.MISSING_PARAMETER, `Missing required parameter: ${paramName}`, { parameter: paramName }),

  configError: (message: string, details?: ErrorDetails) =>
    createError(ErrorCode.CONFIG_ERROR, message, details),

  notFound: (message: string = 'Not Found', details?: ErrorDetails) =>
    createError(ErrorCode.NOT_FOUND, message, details),

  rateLimit: (message: string = 'Too many requests, please try again later') =>
    createError(ErrorCode.RATE_LIMIT, message),
};

/**
 * 判断错误是否为应用错误
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Express 自身抛出的 4xx 错误带有 status 字段（如路径参数无法解码）
 */
function hasClientStatus(error: unknown): error is { status: number; message?: unknown } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

/**
 * 将未知错误转换为应用错误
 */
export function normalizeError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (hasClientStatus(error)) {
    const message = typeof error.message === 'string' && error.message ? error.message : 'Invalid request';
    return ErrorFactory.invalidRequest(message, { status: error.status });
  }

  const message = error instanceof Error ? error.message : String(error);

  // 未知错误不是可预期的业务错误，生产环境不暴露原始信息
  return new AppError(
    ErrorCode.INTERNAL_ERROR,
    message || 'Internal Server Error',
    ERROR_CODE_TO_STATUS[ErrorCode.INTERNAL_ERROR],
    ERROR_CODE_TO_SEVERITY[ErrorCode.INTERNAL_ERROR],
    ERROR_CODE_TO_CATEGORY[ErrorCode.INTERNAL_ERROR],
    { originalError: error instanceof Error ? error.name : typeof error },
    false
  );
}
