/**
 * 채널 디렉토리 레이아웃
 * PackageRecord를 `<subdir>/<filename>` 경로로 매핑하고, 다운로드 전에 경로 충돌을 검사합니다.
 */

import * as path from 'path';
import type { PackageRecord } from '../../types';
import { ParseError, PathCollisionError } from '../errors';
import logger from '../../utils/logger';

/** 다운로드 중인 임시 파일 디렉토리 (최종 경로 네임스페이스 밖) */
export const STAGING_DIR_NAME = '.channel-mirror-tmp';

export interface PlannedRecord {
  record: PackageRecord;
  channelPath: string;
}

export interface ChannelPlan {
  entries: PlannedRecord[];
  /** 같은 경로/같은 해시로 합쳐진 레코드 수 */
  duplicates: number;
}

function assertSegment(segment: string, what: string): void {
  if (!segment || segment === '.' || segment === '..' || /[\\/]/.test(segment)) {
    throw new ParseError(`채널 경로에 사용할 수 없는 ${what}: ${segment}`);
  }
}

/**
 * 레코드의 채널 내 상대 경로 (항상 '/' 구분자)
 */
export function toChannelPath(record: Pick<PackageRecord, 'subdir' | 'filename'>): string {
  assertSegment(record.subdir, 'subdir');
  assertSegment(record.filename, '파일명');
  if (record.subdir === STAGING_DIR_NAME) {
    throw new ParseError(`예약된 디렉토리명입니다: ${record.subdir}`);
  }
  return `${record.subdir}/${record.filename}`;
}

/**
 * 미러 루트 기준 절대 경로
 */
export function resolveChannelPath(root: string, channelPath: string): string {
  return path.join(path.resolve(root), ...channelPath.split('/'));
}

/**
 * 채널 경로에 대응하는 임시 파일 경로
 */
export function resolveStagingPath(root: string, channelPath: string, id: string): string {
  return `${path.join(path.resolve(root), STAGING_DIR_NAME, ...channelPath.split('/'))}.${id}.part`;
}

/**
 * 레코드 목록의 경로를 계산합니다.
 * 같은 경로에 같은 해시면 하나로 합치고, 해시가 다르면 PathCollisionError
 */
export function planChannel(records: readonly PackageRecord[]): ChannelPlan {
  const byPath = new Map<string, PlannedRecord>();
  let duplicates = 0;

  for (const record of records) {
    const channelPath = toChannelPath(record);
    const existing = byPath.get(channelPath);

    if (!existing) {
      byPath.set(channelPath, { record, channelPath });
      continue;
    }

    const a = existing.record.hash;
    const b = record.hash;
    if (a.algorithm === b.algorithm && a.value === b.value) {
      duplicates++;
      continue;
    }

    // 알고리즘이 달라도 md5가 양쪽에 있으면 md5로 비교
    if (a.algorithm !== b.algorithm && existing.record.md5 && record.md5 && existing.record.md5 === record.md5) {
      duplicates++;
      continue;
    }

    throw new PathCollisionError(
      channelPath,
      { url: existing.record.url, hash: `${a.algorithm}:${a.value}` },
      { url: record.url, hash: `${b.algorithm}:${b.value}` }
    );
  }

  if (duplicates > 0) {
    logger.debug('중복 레코드 병합', { duplicates });
  }

  return { entries: Array.from(byPath.values()), duplicates };
}
