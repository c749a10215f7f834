/**
 * lock 파일 → 채널 미러 실행 흐름
 * 파싱/계획 단계의 구조 오류는 네트워크 접근이나 쓰기 전에 실행을 중단시킵니다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import type { MirrorEntry, MirrorEntryState, PackageRecord } from '../types';
import { FilesystemError, getErrorCode, toErrorMessage } from './errors';
import { loadLockfile, selectRecords, RecordSelection } from './lockfile/pixiLockParser';
import { planChannel, resolveChannelPath, STAGING_DIR_NAME } from './mirror/channelLayout';
import { verifyFile } from './mirror/integrityVerifier';
import { ArtifactFetcher, HttpArtifactFetcher } from './mirror/artifactFetcher';
import { DownloadCoordinator } from './mirror/downloadCoordinator';
import { buildMirrorReport, MirrorReport } from './mirror/mirrorReporter';
import type { Publisher } from './publisher';
import { DEFAULT_CONFIG } from './config';
import logger from '../utils/logger';

export interface MirrorChannelOptions extends RecordSelection {
  lockfile: string;
  root: string;
  concurrency?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  requestTimeoutMs?: number;
  userAgent?: string;
  force?: boolean;
  /** 미지정 시 axios 기반 HTTP fetcher */
  fetcher?: ArtifactFetcher;
  /** 성공한 실행 후 순서대로 호출 */
  publishers?: Publisher[];
  /** 코디네이터를 생성 직후 전달 (CLI에서 진행률 표시, SIGINT 취소용) */
  onCoordinator?: (coordinator: DownloadCoordinator) => void;
}

export interface MirrorChannelResult {
  report: MirrorReport;
  entries: MirrorEntry[];
  /** 시작 시 정리한 고아 임시 파일 수 */
  sweptTempFiles: number;
  /** 실행된 publisher 이름 */
  published: string[];
  /** 실패한 publisher (첫 실패 이후 publisher는 실행하지 않음) */
  publishFailures: PublishFailure[];
  /** 다운로드 결과와 publish 결과를 합친 종료 코드 */
  exitCode: number;
}

export interface PublishFailure {
  publisher: string;
  message: string;
}

/**
 * 미러 루트가 쓰기 가능한 디렉토리인지 확인하고 없으면 생성
 */
export async function ensureMirrorRoot(root: string): Promise<string> {
  const resolved = path.resolve(root);
  try {
    if (await fs.pathExists(resolved)) {
      const stat = await fs.stat(resolved);
      if (!stat.isDirectory()) {
        throw new FilesystemError(`출력 경로가 디렉토리가 아닙니다: ${resolved}`, 'ENOTDIR');
      }
    } else {
      await fs.ensureDir(resolved);
      logger.info('미러 루트 디렉토리 생성', { root: resolved });
    }
    await fs.access(resolved, fs.constants.W_OK);
  } catch (error) {
    if (error instanceof FilesystemError) throw error;
    throw new FilesystemError(`출력 디렉토리에 쓸 수 없습니다 (${resolved}): ${toErrorMessage(error)}`, getErrorCode(error));
  }
  return resolved;
}

/**
 * 이전 실행에서 남은 임시 파일 정리. 삭제한 파일 수 반환
 */
export async function sweepStaging(root: string): Promise<number> {
  const stagingDir = path.join(path.resolve(root), STAGING_DIR_NAME);
  if (!(await fs.pathExists(stagingDir))) {
    return 0;
  }

  const count = await countFiles(stagingDir);
  await fs.remove(stagingDir);
  if (count > 0) {
    logger.info('남은 임시 파일 정리', { stagingDir, count });
  }
  return count;
}

async function countFiles(dir: string): Promise<number> {
  let count = 0;
  for (const name of await fs.readdir(dir)) {
    const full = path.join(dir, name);
    if ((await fs.stat(full)).isDirectory()) {
      count += await countFiles(full);
    } else {
      count++;
    }
  }
  return count;
}

async function loadPlan(lockfile: string, selection: RecordSelection): Promise<{ records: PackageRecord[] }> {
  const parsed = await loadLockfile(lockfile);
  const records = selectRecords(parsed, selection);
  if (records.length === 0) {
    logger.warn('다운로드할 conda 패키지가 없습니다', { lockfile });
  }
  return { records };
}

/**
 * lock 파일의 패키지를 채널 미러로 받습니다.
 */
export async function mirrorChannel(options: MirrorChannelOptions): Promise<MirrorChannelResult> {
  const startTime = Date.now();

  // 1. 파싱 + 경로 계획 (실패 시 아무것도 쓰지 않음)
  const { records } = await loadPlan(options.lockfile, options);
  const plan = planChannel(records);

  // 2. 출력 디렉토리 확인, 이전 실행의 임시 파일 정리
  const root = await ensureMirrorRoot(options.root);
  const sweptTempFiles = await sweepStaging(root);

  // 3. 다운로드
  const fetcher =
    options.fetcher ??
    new HttpArtifactFetcher({
      timeoutMs: options.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs,
      userAgent: options.userAgent ?? DEFAULT_CONFIG.userAgent,
    });
  const coordinator = new DownloadCoordinator(fetcher);
  options.onCoordinator?.(coordinator);

  const entries = await coordinator.run(plan.entries, {
    root,
    concurrency: options.concurrency,
    maxRetries: options.maxRetries,
    retryDelayMs: options.retryDelayMs,
    force: options.force,
  });

  // 4. 리포트
  const report = buildMirrorReport(entries, Date.now() - startTime);

  // 5. 완전히 성공한 경우에만 외부 도구에 전달
  // publish 실패는 다운로드 결과를 버리지 않고 결과에 기록
  const published: string[] = [];
  const publishFailures: PublishFailure[] = [];
  if (report.success) {
    for (const publisher of options.publishers ?? []) {
      try {
        await publisher.publish(root, report);
        published.push(publisher.name);
      } catch (error) {
        const message = toErrorMessage(error);
        logger.error('publish 실패, 이후 publisher는 건너뜁니다', { publisher: publisher.name, error: message });
        publishFailures.push({ publisher: publisher.name, message });
        break;
      }
    }
  } else if (options.publishers?.length) {
    logger.warn('실패한 패키지가 있어 publish를 건너뜁니다', { failures: report.failures.length });
  }

  const exitCode = report.exitCode !== 0 ? report.exitCode : publishFailures.length > 0 ? 1 : 0;

  return { report, entries, sweptTempFiles, published, publishFailures, exitCode };
}

export interface VerifyChannelOptions extends RecordSelection {
  lockfile: string;
  root: string;
}

export interface VerifiedRecord {
  record: PackageRecord;
  channelPath: string;
  state: Exclude<MirrorEntryState, 'downloading'>;
}

export interface VerifyChannelResult {
  records: VerifiedRecord[];
  counts: Record<VerifiedRecord['state'], number>;
  exitCode: number;
}

/**
 * 네트워크 없이 미러 상태만 검사합니다.
 */
export async function verifyChannel(options: VerifyChannelOptions): Promise<VerifyChannelResult> {
  const { records } = await loadPlan(options.lockfile, options);
  const plan = planChannel(records);
  const root = path.resolve(options.root);

  const results: VerifiedRecord[] = [];
  const counts = { verified: 0, missing: 0, corrupt: 0 };

  for (const { record, channelPath } of plan.entries) {
    const outcome = await verifyFile(resolveChannelPath(root, channelPath), record.hash, {
      expectedSize: record.size,
    });
    const state = outcome.result === 'match' ? 'verified' : outcome.result === 'missing' ? 'missing' : 'corrupt';
    counts[state]++;
    results.push({ record, channelPath, state });
  }

  logger.info('미러 검증 완료', { root, ...counts });

  return {
    records: results,
    counts,
    exitCode: counts.missing === 0 && counts.corrupt === 0 ? 0 : 1,
  };
}
