import axios, { AxiosInstance, AxiosResponse } from 'axios';
import * as fs from 'fs-extra';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import * as zlib from 'zlib';
import type { FetchProgressEvent } from '../../types';
import { FilesystemError, NetworkError, getErrorCode, toErrorMessage } from '../errors';

export interface FetchRequest {
  url: string;
  /** 임시 파일 경로. 최종 경로를 넘기지 않습니다 */
  destPath: string;
  signal?: AbortSignal;
  onProgress?: (progress: FetchProgressEvent) => void;
}

export interface FetchResult {
  bytes: number;
}

/**
 * 다운로드 단계 추상화 (테스트에서는 인메모리 구현 사용)
 */
export interface ArtifactFetcher {
  fetch(request: FetchRequest): Promise<FetchResult>;
}

export interface HttpFetcherOptions {
  timeoutMs: number;
  userAgent: string;
}

// 재시도하면 성공할 수 있는 HTTP 상태 코드
const RETRYABLE_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);

// 쓰기 측 실패로 판단하는 에러 코드
const FILESYSTEM_CODES = new Set(['ENOSPC', 'EACCES', 'EPERM', 'EROFS', 'EDQUOT', 'EMFILE', 'EISDIR', 'ENOTDIR']);

/**
 * axios 스트림 다운로드
 */
export class HttpArtifactFetcher implements ArtifactFetcher {
  private client: AxiosInstance;

  constructor(options: HttpFetcherOptions) {
    this.client = axios.create({
      timeout: options.timeoutMs,
      headers: {
        'User-Agent': options.userAgent,
        'Accept-Encoding': 'identity',
      },
      maxRedirects: 5,
      // Content-Length는 전송된 바이트 기준이므로 압축 해제는 직접 처리
      decompress: false,
    });
  }

  async fetch({ url, destPath, signal, onProgress }: FetchRequest): Promise<FetchResult> {
    try {
      await fs.ensureDir(path.dirname(destPath));
    } catch (error) {
      throw new FilesystemError(`임시 디렉토리 생성 실패: ${toErrorMessage(error)}`, getErrorCode(error));
    }

    let response: AxiosResponse<Readable>;
    try {
      response = await this.client.get<Readable>(url, {
        responseType: 'stream',
        signal,
      });
    } catch (error) {
      throw classifyRequestError(error, url);
    }

    const totalBytes = parseInt(String(response.headers['content-length'] ?? '0'), 10) || 0;
    let decoder: zlib.Gunzip | zlib.Inflate | zlib.BrotliDecompress | null;
    try {
      decoder = createDecoder(String(response.headers['content-encoding'] ?? ''), url);
    } catch (error) {
      response.data.destroy();
      throw error;
    }
    let downloadedBytes = 0;
    let writtenBytes = 0;

    response.data.on('data', (chunk: Buffer) => {
      downloadedBytes += chunk.length;
      onProgress?.({ downloadedBytes, totalBytes });
    });

    const writer = fs.createWriteStream(destPath);
    try {
      if (decoder) {
        decoder.on('data', (chunk: Buffer) => {
          writtenBytes += chunk.length;
        });
        await pipeline(response.data, decoder, writer);
      } else {
        await pipeline(response.data, writer);
        writtenBytes = downloadedBytes;
      }
    } catch (error) {
      const code = getErrorCode(error);
      if (code && FILESYSTEM_CODES.has(code)) {
        throw new FilesystemError(`파일 쓰기 실패 (${destPath}): ${toErrorMessage(error)}`, code);
      }
      throw new NetworkError(`전송 중단 (${url}): ${toErrorMessage(error)}`, true);
    }

    if (totalBytes > 0 && downloadedBytes !== totalBytes) {
      throw new NetworkError(`전송 크기 불일치 (${url}): ${downloadedBytes}/${totalBytes} bytes`, true);
    }

    return { bytes: writtenBytes };
  }
}

/**
 * Content-Encoding에 맞는 압축 해제 스트림. 인코딩이 없으면 null
 */
function createDecoder(encoding: string, url: string): zlib.Gunzip | zlib.Inflate | zlib.BrotliDecompress | null {
  switch (encoding.trim().toLowerCase()) {
    case '':
    case 'identity':
      return null;
    case 'gzip':
    case 'x-gzip':
      return zlib.createGunzip();
    case 'deflate':
      return zlib.createInflate();
    case 'br':
      return zlib.createBrotliDecompress();
    default:
      throw new NetworkError(`지원하지 않는 Content-Encoding: ${encoding} (${url})`, false);
  }
}

/**
 * axios 요청 에러를 NetworkError로 분류
 */
export function classifyRequestError(error: unknown, url: string): NetworkError {
  if (!axios.isAxiosError(error)) {
    return new NetworkError(`요청 실패 (${url}): ${toErrorMessage(error)}`, true);
  }

  if (error.response) {
    const data: unknown = error.response.data;
    if (data instanceof Readable) {
      data.destroy();
    }
    const status = error.response.status;
    return new NetworkError(`HTTP ${status} (${url})`, RETRYABLE_STATUS.has(status), status);
  }

  if (error.code === 'ERR_CANCELED') {
    return new NetworkError(`요청 취소 (${url})`, false);
  }

  // 타임아웃, 연결 거부/리셋, DNS 실패
  return new NetworkError(`${error.code ?? '네트워크 오류'} (${url}): ${error.message}`, true);
}
