import PQueue from 'p-queue';
import { EventEmitter } from 'eventemitter3';
import * as fs from 'fs-extra';
import * as path from 'path';
import type { FetchProgressEvent, MirrorEntry, MirrorEntryState } from '../../types';
import {
  FilesystemError,
  HashMismatchError,
  MirrorError,
  NetworkError,
  getErrorCode,
  isMirrorError,
  toErrorMessage,
} from '../errors';
import { DEFAULT_CONFIG } from '../config';
import { ArtifactFetcher } from './artifactFetcher';
import { PlannedRecord, resolveChannelPath, resolveStagingPath } from './channelLayout';
import { verifyFile } from './integrityVerifier';
import logger from '../../utils/logger';

// 코디네이터 옵션
export interface CoordinatorOptions {
  /** 미러 루트 디렉토리 */
  root: string;
  concurrency?: number;
  /** 레코드별 최대 시도 횟수 (첫 시도 포함) */
  maxRetries?: number;
  /** 재시도 간격. n번째 재시도 전에 retryDelayMs * n 만큼 대기 */
  retryDelayMs?: number;
  /** 기존 파일 검증 없이 항상 다시 받기 */
  force?: boolean;
}

// 이벤트 타입
export interface DownloadCoordinatorEvents {
  itemStart: (entry: MirrorEntry) => void;
  itemSkipped: (entry: MirrorEntry) => void;
  itemRetry: (entry: MirrorEntry, error: MirrorError) => void;
  itemComplete: (entry: MirrorEntry) => void;
  itemFailed: (entry: MirrorEntry, error: MirrorError) => void;
  progress: (entry: MirrorEntry, overall: OverallProgress) => void;
  allComplete: (entries: MirrorEntry[]) => void;
  cancelled: () => void;
}

// 전체 진행률
export interface OverallProgress {
  totalItems: number;
  finishedItems: number;
  failedItems: number;
  skippedItems: number;
  downloadedBytes: number;
}

type ResolvedOptions = Required<CoordinatorOptions>;

// ID 생성
const generateId = (): string => {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 11)}`;
};

const FINISHED = new Set(['complete', 'skipped', 'failed', 'cancelled']);

/**
 * 중단 가능한 대기
 */
function delay(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0 || signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

function toMirrorError(error: unknown): MirrorError {
  if (isMirrorError(error)) return error;
  const code = getErrorCode(error);
  if (code) {
    return new FilesystemError(toErrorMessage(error), code);
  }
  return new NetworkError(toErrorMessage(error), true);
}

function isRetryable(error: MirrorError): boolean {
  if (error instanceof NetworkError) return error.retryable;
  return error instanceof HashMismatchError;
}

/**
 * 다운로드 코디네이터
 * 레코드별 상태: pending → skipped | fetching → verifying → complete | retrying | failed
 * 한 레코드의 실패가 전체 실행을 중단시키지 않으며, 실패는 엔트리에 기록됩니다.
 */
export class DownloadCoordinator extends EventEmitter<DownloadCoordinatorEvents> {
  private queue: PQueue = new PQueue({ concurrency: DEFAULT_CONFIG.concurrentDownloads });
  private abortController = new AbortController();
  private entries: MirrorEntry[] = [];
  private options: ResolvedOptions = {
    root: '',
    concurrency: DEFAULT_CONFIG.concurrentDownloads,
    maxRetries: DEFAULT_CONFIG.maxRetries,
    retryDelayMs: DEFAULT_CONFIG.retryDelayMs,
    force: false,
  };
  private isRunning = false;
  private isCancelled = false;

  constructor(private readonly fetcher: ArtifactFetcher) {
    super();
  }

  /**
   * 계획된 레코드 전체를 처리합니다. 레코드별 실패는 throw하지 않고 결과에 담습니다.
   */
  async run(plan: readonly PlannedRecord[], options: CoordinatorOptions): Promise<MirrorEntry[]> {
    if (this.isRunning) {
      throw new Error('다운로드가 이미 진행 중입니다');
    }

    this.options = { ...this.options, ...definedOptions(options) };
    if (!Number.isInteger(this.options.concurrency) || this.options.concurrency < 1) {
      throw new Error(`동시 다운로드 수는 1 이상의 정수여야 합니다: ${this.options.concurrency}`);
    }
    if (!Number.isInteger(this.options.maxRetries) || this.options.maxRetries < 1) {
      throw new Error(`최대 시도 횟수는 1 이상의 정수여야 합니다: ${this.options.maxRetries}`);
    }

    this.queue = new PQueue({ concurrency: this.options.concurrency });
    this.abortController = new AbortController();
    this.isRunning = true;
    this.isCancelled = false;
    this.entries = plan.map(({ record, channelPath }) => ({
      id: generateId(),
      record,
      channelPath,
      state: 'missing',
      status: 'pending',
      attempts: 0,
      bytes: 0,
    }));

    logger.info('미러 다운로드 시작', {
      itemCount: this.entries.length,
      root: this.options.root,
      concurrency: this.options.concurrency,
      maxRetries: this.options.maxRetries,
    });

    for (const entry of this.entries) {
      this.queue
        .add(() => this.processEntry(entry))
        .catch((error: unknown) => {
          // processEntry는 실패를 엔트리에 기록하므로 여기 도달하면 내부 오류
          this.fail(entry, toMirrorError(error));
        });
    }

    await this.queue.onIdle();

    // 취소로 큐에서 제거된 항목 정리
    for (const entry of this.entries) {
      if (entry.status === 'pending') {
        this.markCancelled(entry);
      }
    }

    this.isRunning = false;
    const entries = [...this.entries];

    if (this.isCancelled) {
      this.emit('cancelled');
    } else {
      this.emit('allComplete', entries);
    }

    logger.info('미러 다운로드 종료', {
      cancelled: this.isCancelled,
      ...this.getOverallProgress(),
    });

    return entries;
  }

  /**
   * 실행 중단. 대기 중인 항목은 시작하지 않고, 진행 중인 요청은 abort합니다.
   * 임시 파일은 최종 경로 밖에 있으므로 남아도 다음 실행에서 정리됩니다.
   */
  cancel(): void {
    if (!this.isRunning || this.isCancelled) return;
    this.isCancelled = true;
    this.queue.clear();
    this.abortController.abort();
    logger.warn('미러 다운로드 취소 요청');
  }

  get running(): boolean {
    return this.isRunning;
  }

  getEntries(): MirrorEntry[] {
    return [...this.entries];
  }

  /**
   * 전체 진행률 계산
   */
  getOverallProgress(): OverallProgress {
    let finishedItems = 0;
    let failedItems = 0;
    let skippedItems = 0;
    let downloadedBytes = 0;

    for (const entry of this.entries) {
      downloadedBytes += entry.bytes;
      if (FINISHED.has(entry.status)) finishedItems++;
      if (entry.status === 'failed') failedItems++;
      if (entry.status === 'skipped') skippedItems++;
    }

    return {
      totalItems: this.entries.length,
      finishedItems,
      failedItems,
      skippedItems,
      downloadedBytes,
    };
  }

  /**
   * 단일 레코드 처리
   */
  private async processEntry(entry: MirrorEntry): Promise<void> {
    if (this.isCancelled) {
      this.markCancelled(entry);
      return;
    }

    const { record } = entry;
    const finalPath = resolveChannelPath(this.options.root, entry.channelPath);

    if (!this.options.force) {
      try {
        const existing = await verifyFile(finalPath, record.hash, { expectedSize: record.size });
        if (existing.result === 'match') {
          entry.state = 'verified';
          entry.status = 'skipped';
          entry.filePath = finalPath;
          logger.debug('기존 파일 검증 완료, 다운로드 건너뜀', { channelPath: entry.channelPath });
          this.emit('itemSkipped', entry);
          this.emitProgress(entry);
          return;
        }
        if (existing.result === 'mismatch') {
          entry.state = 'corrupt';
          logger.warn('기존 파일 해시 불일치, 다시 다운로드합니다', {
            channelPath: entry.channelPath,
            expected: record.hash.value,
            actual: existing.actual,
            size: existing.size,
          });
        }
      } catch (error) {
        this.fail(entry, toMirrorError(error));
        return;
      }
    }

    await this.fetchWithRetry(entry, finalPath);
  }

  /**
   * 제한된 횟수만큼 fetching → verifying을 반복
   */
  private async fetchWithRetry(entry: MirrorEntry, finalPath: string): Promise<void> {
    const onDisk: MirrorEntryState = entry.state;
    const { maxRetries, retryDelayMs } = this.options;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      if (this.isCancelled) {
        entry.state = onDisk;
        this.markCancelled(entry);
        return;
      }

      entry.attempts = attempt;
      const error = await this.attemptFetch(entry, finalPath);

      if (!error) {
        entry.state = 'verified';
        entry.status = 'complete';
        entry.filePath = finalPath;
        logger.info('패키지 다운로드 완료', {
          channelPath: entry.channelPath,
          bytes: entry.bytes,
          attempts: attempt,
        });
        this.emit('itemComplete', entry);
        this.emitProgress(entry);
        return;
      }

      entry.state = onDisk;
      if (this.isCancelled) {
        this.markCancelled(entry);
        return;
      }

      if (!isRetryable(error) || attempt === maxRetries) {
        this.fail(entry, error);
        return;
      }

      entry.status = 'retrying';
      logger.warn('패키지 다운로드 재시도', {
        channelPath: entry.channelPath,
        attempt,
        maxRetries,
        error: error.message,
      });
      this.emit('itemRetry', entry, error);
      await delay(retryDelayMs * attempt, this.abortController.signal);
    }
  }

  /**
   * 임시 파일로 받고 검증한 뒤 최종 경로로 rename. 실패 시 에러 반환
   */
  private async attemptFetch(entry: MirrorEntry, finalPath: string): Promise<MirrorError | null> {
    const { record } = entry;
    const tempPath = resolveStagingPath(this.options.root, entry.channelPath, `${entry.id}-${entry.attempts}`);

    entry.status = 'fetching';
    entry.state = 'downloading';
    entry.bytes = 0;
    this.emit('itemStart', entry);

    try {
      const { bytes } = await this.fetcher.fetch({
        url: record.url,
        destPath: tempPath,
        signal: this.abortController.signal,
        onProgress: (progress: FetchProgressEvent) => {
          entry.bytes = progress.downloadedBytes;
          this.emitProgress(entry);
        },
      });
      entry.bytes = bytes;

      entry.status = 'verifying';
      const outcome = await verifyFile(tempPath, record.hash, { expectedSize: record.size });
      if (outcome.result !== 'match') {
        throw new HashMismatchError(
          record.url,
          `${record.hash.algorithm}:${record.hash.value}`,
          outcome.actual ? `${record.hash.algorithm}:${outcome.actual}` : `size ${outcome.size ?? 0}`
        );
      }

      try {
        await fs.ensureDir(path.dirname(finalPath));
        await fs.rename(tempPath, finalPath);
      } catch (error) {
        throw new FilesystemError(`최종 경로로 이동 실패 (${finalPath}): ${toErrorMessage(error)}`, getErrorCode(error));
      }
      return null;
    } catch (error) {
      entry.bytes = 0;
      await this.discard(tempPath);
      return toMirrorError(error);
    }
  }

  private async discard(tempPath: string): Promise<void> {
    try {
      await fs.remove(tempPath);
    } catch (error) {
      logger.warn('임시 파일 삭제 실패', { tempPath, error: toErrorMessage(error) });
    }
  }

  private fail(entry: MirrorEntry, error: MirrorError): void {
    entry.status = 'failed';
    entry.failure = { kind: error.kind, message: error.message };
    logger.error('패키지 처리 실패', {
      channelPath: entry.channelPath,
      url: entry.record.url,
      kind: error.kind,
      attempts: entry.attempts,
      error: error.message,
    });
    this.emit('itemFailed', entry, error);
    this.emitProgress(entry);
  }

  private markCancelled(entry: MirrorEntry): void {
    entry.status = 'cancelled';
    entry.failure = { kind: 'cancelled', message: '실행이 취소되었습니다' };
  }

  private emitProgress(entry: MirrorEntry): void {
    this.emit('progress', entry, this.getOverallProgress());
  }
}

/**
 * undefined 값은 기본값을 덮어쓰지 않도록 제거
 */
function definedOptions(options: CoordinatorOptions): Partial<ResolvedOptions> {
  const result: Partial<ResolvedOptions> = { root: options.root };
  if (options.concurrency !== undefined) result.concurrency = options.concurrency;
  if (options.maxRetries !== undefined) result.maxRetries = options.maxRetries;
  if (options.retryDelayMs !== undefined) result.retryDelayMs = options.retryDelayMs;
  if (options.force !== undefined) result.force = options.force;
  return result;
}
