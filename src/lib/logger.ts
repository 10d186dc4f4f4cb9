/**
 * Structured Logger - 結構化日誌系統
 * JSON 格式日誌，一律輸出到 stderr，避免污染 stdout 上的指令結果
 * 特性：
 *   - 日誌級別控制（--verbose 切換為 debug）
 *   - requestId 追蹤
 *   - 執行時間 (duration)
 *   - 錯誤堆棧記錄
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** 請求唯一識別碼，用於追蹤一個請求的完整生命週期 */
  requestId?: string;
  /** HTTP 方法 */
  method?: string;
  /** 請求 URL 或端點 */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 返回狀態碼 */
  statusCode?: number;
  /** 自定義數據 */
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'warn') */
  minLevel?: LogLevel;
  /** 自定義格式化函數 */
  formatter?: (entry: LogEntry) => string;
  /** 自定義輸出（預設寫入 stderr） */
  write?: (line: string, level: LogLevel) => void;
  /** 是否包含堆棧追蹤 (default: false) */
  includeStack?: boolean;
}

/** 日誌級別優先級 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const defaultFormatter = (entry: LogEntry): string => JSON.stringify(entry);

const defaultWrite = (line: string, level: LogLevel): void => {
  if (level === 'error') {
    console.error(line);
  } else {
    console.warn(line);
  }
};

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * 結構化日誌記錄器
 */
export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;
  private requestIdStack: string[] = [];

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel ?? 'warn',
      formatter: config.formatter ?? defaultFormatter,
      write: config.write ?? defaultWrite,
      includeStack: config.includeStack ?? false,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    this.config.write(this.config.formatter(entry), entry.level);
  }

  debug(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    this.log('debug', message, context, metadata);
  }

  info(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    this.log('info', message, context, metadata);
  }

  warn(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    this.log('warn', message, context, metadata);
  }

  /**
   * 記錄 ERROR 級別日誌
   */
  error(
    message: string,
    error?: Error | null,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context: this.enrichContext(context),
      metadata,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    if (!this.shouldLog(level)) return;

    this.output({
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context: this.enrichContext(context),
      metadata,
    });
  }

  /**
   * 自動補上目前的 requestId（若呼叫端未提供）
   */
  private enrichContext(context?: LogContext): LogContext | undefined {
    const current = this.getCurrentRequestId();
    if (!context) {
      return current ? { requestId: current } : undefined;
    }
    if (!context.requestId && current) {
      return { ...context, requestId: current };
    }
    return context;
  }

  /**
   * 推入新的 requestId（支持嵌套請求）
   */
  pushRequestId(requestId?: string): string {
    const id = requestId ?? randomUUID();
    this.requestIdStack.push(id);
    return id;
  }

  popRequestId(): string | undefined {
    return this.requestIdStack.pop();
  }

  getCurrentRequestId(): string | undefined {
    return this.requestIdStack[this.requestIdStack.length - 1];
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  /**
   * 執行帶日誌的非同步操作，附上 duration
   * 失敗只記錄 debug：錯誤本身會拋給呼叫端顯示
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();
    const requestId = this.pushRequestId();

    try {
      const result = await fn();
      this.debug(`${operation} completed`, {
        ...context,
        requestId,
        duration: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      this.debug(`${operation} failed`, {
        ...context,
        requestId,
        duration: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      this.popRequestId();
    }
  }
}

/**
 * 預設的日誌記錄器實例
 * 按組件分類，便於按服務過濾日誌
 */
export const loggers = {
  api: new StructuredLogger('API'),
  auth: new StructuredLogger('Auth'),
  resolver: new StructuredLogger('Resolver'),
  config: new StructuredLogger('Config'),
};

/**
 * 一次設定所有組件的最小級別
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}
