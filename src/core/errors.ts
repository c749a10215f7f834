import type { MirrorErrorKind } from '../types';

/**
 * 미러 작업 에러의 공통 기반 클래스
 */
export class MirrorError extends Error {
  constructor(
    public readonly kind: MirrorErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'MirrorError';
  }
}

/**
 * lock 파일 구조 오류 (다운로드 전에 실행 중단)
 */
export class ParseError extends MirrorError {
  constructor(
    message: string,
    public readonly entry?: string
  ) {
    super('parse', entry ? `${message} (항목: ${entry})` : message);
    this.name = 'ParseError';
  }
}

interface CollidingRecord {
  url: string;
  hash: string;
}

/**
 * 같은 채널 경로에 해시가 다른 두 레코드가 매핑됨 (다운로드 전에 실행 중단)
 */
export class PathCollisionError extends MirrorError {
  constructor(
    public readonly channelPath: string,
    public readonly first: CollidingRecord,
    public readonly second: CollidingRecord
  ) {
    super(
      'path-collision',
      `경로 충돌: ${channelPath} ← ${first.url} (${first.hash}) / ${second.url} (${second.hash})`
    );
    this.name = 'PathCollisionError';
  }
}

/**
 * 네트워크 오류. retryable이면 백오프 후 재시도
 */
export class NetworkError extends MirrorError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly statusCode?: number
  ) {
    super('network', message);
    this.name = 'NetworkError';
  }
}

export class HashMismatchError extends MirrorError {
  constructor(
    public readonly source: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super('hash-mismatch', `해시 불일치 (${source}): 기대값 ${expected}, 실제값 ${actual}`);
    this.name = 'HashMismatchError';
  }
}

/**
 * 디스크 공간 부족, 권한 등 파일시스템 오류. 해당 레코드만 실패 처리
 */
export class FilesystemError extends MirrorError {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super('filesystem', code ? `${message} [${code}]` : message);
    this.name = 'FilesystemError';
  }
}

export function isMirrorError(error: unknown): error is MirrorError {
  return error instanceof MirrorError;
}

/**
 * Node.js 시스템 에러의 code 추출
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
