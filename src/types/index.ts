// ============================================
// 패키지 관련 타입
// ============================================

/** 지원하는 해시 알고리즘 */
export type HashAlgorithm = 'sha256' | 'md5';

/** 기대 해시값 */
export interface ExpectedHash {
  algorithm: HashAlgorithm;
  value: string;
}

/** lock 파일의 conda 패키지 한 건 */
export interface PackageRecord {
  readonly name: string;
  readonly version: string;
  readonly build: string;
  /** 플랫폼 서브디렉토리 (linux-64, noarch 등) */
  readonly subdir: string;
  readonly filename: string;
  readonly url: string;
  readonly hash: Readonly<ExpectedHash>;
  readonly md5?: string;
  readonly size?: number;
  /** subdir 앞부분의 채널 URL */
  readonly channel?: string;
}

/** lock 파일 파싱 결과 */
export interface ParsedLockfile {
  version: number | null;
  records: PackageRecord[];
  /** 환경 -> 플랫폼 -> conda URL 목록 */
  environments: Record<string, Record<string, string[]>>;
  /** 받지 않는 항목 (pypi, 로컬 소스 패키지 등) 수 */
  ignored: number;
}

// ============================================
// 미러 상태 타입
// ============================================

/** 디스크 상의 아티팩트 상태 */
export type MirrorEntryState = 'missing' | 'downloading' | 'verified' | 'corrupt';

/** 레코드별 다운로드 상태 */
export type DownloadStatus =
  | 'pending'
  | 'fetching'
  | 'verifying'
  | 'retrying'
  | 'complete'
  | 'skipped'
  | 'failed'
  | 'cancelled';

/** 실패 원인 분류 */
export type MirrorErrorKind =
  | 'parse'
  | 'path-collision'
  | 'network'
  | 'hash-mismatch'
  | 'filesystem'
  | 'cancelled';

export interface MirrorFailure {
  kind: MirrorErrorKind;
  message: string;
}

/** 미러 엔트리 (레코드 + 처리 상태) */
export interface MirrorEntry {
  id: string;
  record: PackageRecord;
  /** <subdir>/<filename> */
  channelPath: string;
  state: MirrorEntryState;
  status: DownloadStatus;
  attempts: number;
  bytes: number;
  filePath?: string;
  failure?: MirrorFailure;
}

/** 다운로드 진행 이벤트 */
export interface FetchProgressEvent {
  downloadedBytes: number;
  totalBytes: number;
}
