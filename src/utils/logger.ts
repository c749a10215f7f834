import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getConfigManager, LogLevel } from '../core/config';

// 테스트 실행 중에는 출력하지 않음
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

// 파일 로그 포맷
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let line = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0) {
      line += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
      line += `\n${stack}`;
    }
    return line;
  })
);

// stderr용 컬러 포맷 (stdout은 리포트와 --json 출력 전용)
const stderrFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ level, message }) => `${level}: ${message}`)
);

function rotatingFile(dirname: string, filename: string, level?: LogLevel): DailyRotateFile {
  return new DailyRotateFile({
    dirname,
    filename,
    datePattern: 'YYYY-MM-DD',
    maxSize: '20m',
    maxFiles: '30d',
    level,
    format: fileFormat,
  });
}

/**
 * 미러 실행 로그
 * initialize() 전에는 경고 이상만 stderr로, 이후에는 설정 디렉토리의 logs/에 기록합니다.
 */
class Logger {
  private logger: winston.Logger;
  private logsDir: string | null = null;

  constructor() {
    this.logger = winston.createLogger({
      level: 'warn',
      silent: isTest,
      transports: [new winston.transports.Console({ format: stderrFormat, stderrLevels: ['error', 'warn'] })],
    });
  }

  async initialize(level: LogLevel = 'info'): Promise<void> {
    if (this.logsDir) return;

    const configManager = getConfigManager();
    await configManager.ensureDirectories();
    const logsDir = configManager.getLogsDir();

    this.logger = winston.createLogger({
      level,
      silent: isTest,
      transports: [rotatingFile(logsDir, 'mirror-%DATE%.log'), rotatingFile(logsDir, 'error-%DATE%.log', 'error')],
    });
    this.logsDir = logsDir;
    this.debug('로거 초기화 완료', { logsDir, level });
  }

  /** 초기화된 경우 로그 디렉토리 */
  getLogsDir(): string | null {
    return this.logsDir;
  }

  getLevel(): string {
    return this.logger.level;
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * 에러 객체를 스택과 함께 기록
   */
  logError(error: Error, context?: string): void {
    this.error(context ? `${context}: ${error.message}` : error.message, {
      stack: error.stack,
      name: error.name,
    });
  }
}

// 싱글톤 인스턴스
const logger = new Logger();

export { logger, Logger };
export default logger;
