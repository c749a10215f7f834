/**
 * pixi.lock 파서
 * lock 파일의 conda 패키지 항목을 정규화된 PackageRecord 목록으로 변환합니다.
 * 필수 필드(URL, 해시, 플랫폼, 파일명)가 없으면 기본값을 채우지 않고 ParseError를 던집니다.
 */

import * as fs from 'fs-extra';
import * as yaml from 'js-yaml';
import type { ExpectedHash, PackageRecord, ParsedLockfile } from '../../types';
import { ParseError, getErrorCode, toErrorMessage } from '../errors';
import { STAGING_DIR_NAME } from '../mirror/channelLayout';
import logger from '../../utils/logger';

// 주로 대상으로 하는 pixi.lock 포맷 버전
export const SUPPORTED_LOCKFILE_VERSION = 6;

const CONDA_EXTENSIONS = ['.conda', '.tar.bz2'];
const SHA256_PATTERN = /^[0-9a-f]{64}$/;
const MD5_PATTERN = /^[0-9a-f]{32}$/;

type YamlMap = Record<string, unknown>;

function isMap(value: unknown): value is YamlMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(entry: YamlMap, key: string): string | undefined {
  const value = entry[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/**
 * lock 파일을 읽고 파싱합니다.
 */
export async function loadLockfile(lockfilePath: string): Promise<ParsedLockfile> {
  let content: string;
  try {
    const stat = await fs.stat(lockfilePath);
    if (!stat.isFile()) {
      throw new ParseError(`lock 파일 경로가 파일이 아닙니다: ${lockfilePath}`);
    }
    content = await fs.readFile(lockfilePath, 'utf-8');
  } catch (error) {
    if (error instanceof ParseError) throw error;
    if (getErrorCode(error) === 'ENOENT') {
      throw new ParseError(`lock 파일을 찾을 수 없습니다: ${lockfilePath}`);
    }
    throw new ParseError(`lock 파일 읽기 실패: ${toErrorMessage(error)}`);
  }

  return parseLockfile(content, lockfilePath);
}

/**
 * YAML 문자열을 파싱합니다.
 */
export function parseLockfile(content: string, source = '<lockfile>'): ParsedLockfile {
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error) {
    throw new ParseError(`YAML 파싱 실패 (${source}): ${toErrorMessage(error)}`);
  }

  if (!isMap(data)) {
    throw new ParseError(`lock 파일이 YAML 매핑이 아닙니다: ${source}`);
  }

  const version = typeof data.version === 'number' ? data.version : null;
  if (version !== SUPPORTED_LOCKFILE_VERSION) {
    logger.warn('지원 대상이 아닌 lock 파일 버전, 계속 진행합니다', {
      source,
      version,
      supported: SUPPORTED_LOCKFILE_VERSION,
    });
  }

  const environments = parseEnvironments(data.environments);
  const rawPackages = data.packages ?? [];
  if (!Array.isArray(rawPackages)) {
    throw new ParseError(`'packages'가 목록이 아닙니다: ${source}`);
  }

  const records: PackageRecord[] = [];
  const seen = new Set<string>();
  let ignored = 0;

  rawPackages.forEach((entry: unknown, index: number) => {
    if (!isMap(entry)) {
      throw new ParseError('패키지 항목이 매핑이 아닙니다', `#${index}`);
    }

    const url = condaUrlOf(entry);
    if (url === null) {
      ignored++;
      logger.debug('conda가 아닌 패키지 항목 건너뜀', { index });
      return;
    }

    // `conda: .` 같은 로컬 소스 패키지는 받을 수 없으므로 건너뜀
    if (url !== undefined && !isDownloadableUrl(url)) {
      ignored++;
      logger.warn('다운로드할 수 없는 conda 항목 건너뜀', {
        source,
        index,
        conda: url,
        name: optionalString(entry, 'name'),
      });
      return;
    }

    const record = toPackageRecord(entry, url, index);
    const key = `${record.url}#${record.hash.value}`;
    if (seen.has(key)) return;
    seen.add(key);
    records.push(record);
  });

  logger.info('lock 파일 파싱 완료', {
    source,
    version,
    records: records.length,
    ignored,
  });

  return { version, records, environments, ignored };
}

/**
 * 항목의 conda URL을 반환합니다. conda 항목이 아니면 null
 * v6: `conda: <url>`, v4/v5: `kind: conda` + `url: <url>`
 */
function condaUrlOf(entry: YamlMap): string | null | undefined {
  if ('conda' in entry) {
    return optionalString(entry, 'conda');
  }
  if (entry.kind === 'conda') {
    return optionalString(entry, 'url');
  }
  if ('pypi' in entry || entry.kind === 'pypi') {
    return null;
  }
  // kind도 URL 키도 없는 항목은 conda URL 누락으로 취급
  return undefined;
}

function toPackageRecord(entry: YamlMap, url: string | undefined, index: number): PackageRecord {
  const label = `#${index}${url ? ` ${url}` : ''}`;

  if (!url) {
    throw new ParseError('URL이 없습니다', label);
  }

  const parsedUrl = new URL(url);
  const segments = parsedUrl.pathname.split('/').filter(Boolean).map(decodeSegment);
  const filename = segments[segments.length - 1];
  if (!filename || !isSafeSegment(filename)) {
    throw new ParseError('URL에서 파일명을 결정할 수 없습니다', label);
  }

  const extension = CONDA_EXTENSIONS.find((ext) => filename.endsWith(ext));
  if (!extension) {
    throw new ParseError(`conda 아카이브 파일명이 아닙니다: ${filename}`, label);
  }

  // subdir 필드가 없으면 URL의 뒤에서 두 번째 경로 요소 사용
  // 예: /conda-forge/linux-64/pkg.conda -> linux-64
  const subdir = optionalString(entry, 'subdir') ?? (segments.length >= 2 ? segments[segments.length - 2] : undefined);
  if (!subdir || !isSafeSegment(subdir)) {
    throw new ParseError('플랫폼 서브디렉토리를 결정할 수 없습니다', label);
  }
  if (subdir === STAGING_DIR_NAME) {
    throw new ParseError(`예약된 디렉토리명은 subdir로 사용할 수 없습니다: ${subdir}`, label);
  }

  const hash = readHash(entry, label);
  const identity = parseCondaFilename(filename, extension);
  const name = optionalString(entry, 'name') ?? identity?.name;
  // 따옴표 없는 `version: 1.10`은 YAML이 숫자로 읽으므로 파일명 쪽을 우선
  const rawVersion = entry.version;
  const version =
    typeof rawVersion === 'number'
      ? identity?.version ?? String(rawVersion)
      : optionalString(entry, 'version') ?? identity?.version;
  const build = optionalString(entry, 'build') ?? identity?.build;
  if (!name || !version || !build) {
    throw new ParseError(`패키지 식별 정보(name, version, build)를 결정할 수 없습니다: ${filename}`, label);
  }

  const rawSize = entry.size;
  let size: number | undefined;
  if (rawSize !== undefined && rawSize !== null) {
    if (typeof rawSize !== 'number' || !Number.isInteger(rawSize) || rawSize < 0) {
      throw new ParseError(`잘못된 size 값: ${String(rawSize)}`, label);
    }
    size = rawSize;
  }

  const md5 = optionalString(entry, 'md5')?.toLowerCase();
  const subdirIndex = url.lastIndexOf(`/${subdir}/`);

  return Object.freeze({
    name,
    version,
    build,
    subdir,
    filename,
    url,
    hash: Object.freeze(hash),
    md5,
    size,
    channel: subdirIndex > 0 ? url.slice(0, subdirIndex) : undefined,
  });
}

/**
 * sha256 우선, 없으면 md5
 */
function readHash(entry: YamlMap, label: string): ExpectedHash {
  const sha256 = optionalString(entry, 'sha256')?.toLowerCase();
  if (sha256 !== undefined) {
    if (!SHA256_PATTERN.test(sha256)) {
      throw new ParseError(`잘못된 sha256 값: ${sha256}`, label);
    }
    return { algorithm: 'sha256', value: sha256 };
  }

  const md5 = optionalString(entry, 'md5')?.toLowerCase();
  if (md5 !== undefined) {
    if (!MD5_PATTERN.test(md5)) {
      throw new ParseError(`잘못된 md5 값: ${md5}`, label);
    }
    return { algorithm: 'md5', value: md5 };
  }

  throw new ParseError('해시(sha256 또는 md5)가 없습니다', label);
}

/**
 * conda 파일명을 name, version, build로 분리
 * 예: numpy-1.26.4-py312h8753938_0.conda
 */
export function parseCondaFilename(
  filename: string,
  extension = CONDA_EXTENSIONS.find((ext) => filename.endsWith(ext))
): { name: string; version: string; build: string } | null {
  if (!extension) return null;
  const stem = filename.slice(0, filename.length - extension.length);
  const buildSep = stem.lastIndexOf('-');
  if (buildSep <= 0) return null;
  const versionSep = stem.lastIndexOf('-', buildSep - 1);
  if (versionSep <= 0) return null;

  const name = stem.slice(0, versionSep);
  const version = stem.slice(versionSep + 1, buildSep);
  const build = stem.slice(buildSep + 1);
  if (!version || !build) return null;
  return { name, version, build };
}

function isDownloadableUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function isSafeSegment(segment: string): boolean {
  return segment !== '.' && segment !== '..' && !/[\\/]/.test(segment);
}

/**
 * environments 섹션을 환경 -> 플랫폼 -> URL 목록으로 변환
 */
function parseEnvironments(raw: unknown): Record<string, Record<string, string[]>> {
  const result: Record<string, Record<string, string[]>> = {};
  if (!isMap(raw)) return result;

  for (const [envName, envData] of Object.entries(raw)) {
    if (!isMap(envData) || !isMap(envData.packages)) continue;

    const platforms: Record<string, string[]> = {};
    for (const [platform, list] of Object.entries(envData.packages)) {
      if (!Array.isArray(list)) continue;
      platforms[platform] = list
        .filter(isMap)
        .map((ref) => optionalString(ref, 'conda'))
        .filter((url): url is string => url !== undefined);
    }
    result[envName] = platforms;
  }

  return result;
}

export interface RecordSelection {
  environments?: string[];
  platforms?: string[];
}

/**
 * 지정한 환경/플랫폼에서 참조하는 레코드만 선택합니다.
 * 플랫폼이 지정되면 해당 플랫폼 목록에 포함된 noarch 패키지도 함께 선택됩니다.
 */
export function selectRecords(lockfile: ParsedLockfile, selection: RecordSelection = {}): PackageRecord[] {
  const envFilter = selection.environments?.length ? selection.environments : undefined;
  const platformFilter = selection.platforms?.length ? selection.platforms : undefined;
  if (!envFilter && !platformFilter) {
    return lockfile.records;
  }

  const envNames = envFilter ?? Object.keys(lockfile.environments);
  for (const envName of envNames) {
    if (!lockfile.environments[envName]) {
      throw new ParseError(`lock 파일에 없는 환경입니다: ${envName}`);
    }
  }

  const urls = new Set<string>();
  for (const envName of envNames) {
    for (const [platform, refs] of Object.entries(lockfile.environments[envName])) {
      if (platformFilter && !platformFilter.includes(platform)) continue;
      refs.forEach((url) => urls.add(url));
    }
  }

  return lockfile.records.filter((record) => urls.has(record.url));
}
