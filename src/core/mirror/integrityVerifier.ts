import * as fs from 'fs-extra';
import * as crypto from 'crypto';
import type { ExpectedHash, HashAlgorithm } from '../../types';
import { FilesystemError, getErrorCode, toErrorMessage } from '../errors';

export type VerifyResult = 'match' | 'mismatch' | 'missing';

export interface VerifyOutcome {
  result: VerifyResult;
  /** 계산된 해시 (크기 검사로 건너뛴 경우 없음) */
  actual?: string;
  size?: number;
}

export interface VerifyOptions {
  /** 알고 있으면 해싱 전에 크기부터 비교 */
  expectedSize?: number;
}

/**
 * 파일을 스트리밍으로 해싱합니다. 파일 전체를 메모리에 올리지 않습니다.
 */
export async function computeFileHash(filePath: string, algorithm: HashAlgorithm): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash(algorithm);
    const stream = fs.createReadStream(filePath);

    stream.on('data', (data) => hash.update(data));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', reject);
  });
}

/**
 * 파일의 해시를 기대값과 비교합니다.
 * 불일치여도 파일을 수정하거나 삭제하지 않으며, 처리는 호출자에게 맡깁니다.
 */
export async function verifyFile(
  filePath: string,
  expected: ExpectedHash,
  options: VerifyOptions = {}
): Promise<VerifyOutcome> {
  let size: number;
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) {
      throw new FilesystemError(`일반 파일이 아닙니다: ${filePath}`);
    }
    size = stat.size;
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return { result: 'missing' };
    }
    throw wrapFsError(error, filePath);
  }

  if (options.expectedSize !== undefined && options.expectedSize !== size) {
    return { result: 'mismatch', size };
  }

  let actual: string;
  try {
    actual = await computeFileHash(filePath, expected.algorithm);
  } catch (error) {
    throw wrapFsError(error, filePath);
  }

  return {
    result: actual === expected.value.toLowerCase() ? 'match' : 'mismatch',
    actual,
    size,
  };
}

function wrapFsError(error: unknown, filePath: string): FilesystemError {
  if (error instanceof FilesystemError) return error;
  return new FilesystemError(`파일 확인 실패 (${filePath}): ${toErrorMessage(error)}`, getErrorCode(error));
}
