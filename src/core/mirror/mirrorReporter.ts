/**
 * 미러 상태 리포트
 * 실행 결과를 상태별 집계와 실패 목록으로 요약합니다. CLI 출력과 후속 도구(sync, index)에서 사용합니다.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { DownloadStatus, MirrorEntry, MirrorErrorKind } from '../../types';

export interface MirrorFailureReport {
  channelPath: string;
  name: string;
  version: string;
  build: string;
  url: string;
  kind: MirrorErrorKind;
  reason: string;
  attempts: number;
}

export interface MirrorReport {
  total: number;
  counts: Record<DownloadStatus, number>;
  /** 이번 실행에서 새로 배치된 채널 경로 */
  added: string[];
  /** 이미 검증된 상태라 건너뛴 채널 경로 */
  skipped: string[];
  failures: MirrorFailureReport[];
  cancelled: string[];
  bytesDownloaded: number;
  durationMs: number;
  /** 미러 내용이 바뀌었는지 (재인덱싱 필요 여부) */
  changed: boolean;
  success: boolean;
  exitCode: number;
}

/** 취소로 종료된 경우의 종료 코드 (SIGINT 관례) */
export const EXIT_CANCELLED = 130;

/**
 * 엔트리 목록으로 리포트 생성
 */
export function buildMirrorReport(entries: readonly MirrorEntry[], durationMs = 0): MirrorReport {
  const counts: Record<DownloadStatus, number> = {
    pending: 0,
    fetching: 0,
    verifying: 0,
    retrying: 0,
    complete: 0,
    skipped: 0,
    failed: 0,
    cancelled: 0,
  };
  const added: string[] = [];
  const skipped: string[] = [];
  const failures: MirrorFailureReport[] = [];
  const cancelled: string[] = [];
  let bytesDownloaded = 0;

  for (const entry of entries) {
    counts[entry.status]++;

    switch (entry.status) {
      case 'complete':
        added.push(entry.channelPath);
        bytesDownloaded += entry.bytes;
        break;
      case 'skipped':
        skipped.push(entry.channelPath);
        break;
      case 'cancelled':
        cancelled.push(entry.channelPath);
        break;
      case 'failed':
        failures.push({
          channelPath: entry.channelPath,
          name: entry.record.name,
          version: entry.record.version,
          build: entry.record.build,
          url: entry.record.url,
          kind: entry.failure?.kind ?? 'network',
          reason: entry.failure?.message ?? '알 수 없는 오류',
          attempts: entry.attempts,
        });
        break;
      default:
        // 실행 종료 후 중간 상태가 남아 있으면 미완료로 취급
        cancelled.push(entry.channelPath);
        break;
    }
  }

  added.sort();
  skipped.sort();
  failures.sort((a, b) => a.channelPath.localeCompare(b.channelPath));
  cancelled.sort();

  const success = failures.length === 0 && cancelled.length === 0;
  const exitCode = success ? 0 : failures.length > 0 ? 1 : EXIT_CANCELLED;

  return {
    total: entries.length,
    counts,
    added,
    skipped,
    failures,
    cancelled,
    bytesDownloaded,
    durationMs,
    changed: added.length > 0,
    success,
    exitCode,
  };
}

/**
 * 바이트 포맷
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

/**
 * 시간 포맷
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}분 ${remainingSeconds}초`;
  }
  return `${seconds}초`;
}

/**
 * 터미널용 요약 텍스트
 */
export function formatMirrorReport(report: MirrorReport): string {
  const lines: string[] = [];

  const summary = new Table({
    head: [chalk.cyan('상태'), chalk.cyan('개수')],
  });
  summary.push(
    ['전체', String(report.total)],
    [chalk.green('추가됨'), String(report.counts.complete)],
    [chalk.gray('검증됨 (건너뜀)'), String(report.counts.skipped)],
    [chalk.red('실패'), String(report.failures.length)],
    [chalk.yellow('취소됨'), String(report.cancelled.length)]
  );
  lines.push(summary.toString());
  lines.push(chalk.gray(`  받은 크기: ${formatBytes(report.bytesDownloaded)}`));
  lines.push(chalk.gray(`  소요 시간: ${formatDuration(report.durationMs)}`));

  if (report.failures.length > 0) {
    lines.push('');
    lines.push(chalk.red(`실패한 패키지 (${report.failures.length}개):`));
    for (const failure of report.failures) {
      lines.push(
        chalk.red(
          `  - ${failure.name}=${failure.version}=${failure.build} (${failure.channelPath}) [${failure.kind}, ${failure.attempts}회 시도]: ${failure.reason}`
        )
      );
    }
  }

  if (report.cancelled.length > 0) {
    lines.push('');
    lines.push(chalk.yellow(`처리되지 않은 패키지 (${report.cancelled.length}개) - 다시 실행하면 이어서 받습니다`));
  }

  lines.push('');
  if (report.success) {
    lines.push(chalk.green(report.changed ? '✓ 미러 갱신 완료' : '✓ 미러가 이미 최신 상태입니다'));
  } else {
    lines.push(chalk.red(`✗ 미러 갱신 미완료 (종료 코드 ${report.exitCode})`));
  }

  return lines.join('\n');
}
