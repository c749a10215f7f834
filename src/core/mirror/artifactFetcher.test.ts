import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as http from 'http';
import * as path from 'path';
import * as zlib from 'zlib';
import { HttpArtifactFetcher, classifyRequestError } from './artifactFetcher';
import { NetworkError } from '../errors';
import type { FetchProgressEvent } from '../../types';
import { makeTempDir } from '../../test-utils/mirrorFixtures';

const PROXY_VARS = ['http_proxy', 'HTTP_PROXY', 'https_proxy', 'HTTPS_PROXY'];

const PLAIN = Buffer.from('conda-archive-bytes '.repeat(250));
const GZIPPED = zlib.gzipSync(PLAIN);

describe('HttpArtifactFetcher', () => {
  let server: http.Server;
  let baseUrl: string;
  let tempDir: string;
  const userAgents: string[] = [];
  const acceptEncodings: string[] = [];
  const savedProxy: Record<string, string | undefined> = {};

  beforeAll(async () => {
    // 로컬 서버 요청이 프록시로 가지 않도록
    for (const name of PROXY_VARS) {
      savedProxy[name] = process.env[name];
      delete process.env[name];
    }

    server = http.createServer((req, res) => {
      userAgents.push(String(req.headers['user-agent']));
      acceptEncodings.push(String(req.headers['accept-encoding']));
      switch (req.url) {
        case '/conda-forge/linux-64/ok-1.0-0.conda':
          res.writeHead(200, { 'Content-Type': 'application/octet-stream', 'Content-Length': '7' });
          res.end('payload');
          break;
        case '/conda-forge/linux-64/gzipped-1.0-0.conda':
          // Accept-Encoding을 무시하고 압축해서 보내는 프록시
          res.writeHead(200, { 'Content-Encoding': 'gzip', 'Content-Length': String(GZIPPED.length) });
          res.end(GZIPPED);
          break;
        case '/conda-forge/linux-64/compress-1.0-0.conda':
          res.writeHead(200, { 'Content-Encoding': 'compress' });
          res.end('???');
          break;
        case '/conda-forge/linux-64/busy-1.0-0.conda':
          res.writeHead(503);
          res.end('busy');
          break;
        default:
          res.writeHead(404);
          res.end('not found');
      }
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('테스트 서버 주소를 확인할 수 없습니다');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    for (const name of PROXY_VARS) {
      const value = savedProxy[name];
      if (value !== undefined) process.env[name] = value;
    }
  });

  beforeEach(() => {
    tempDir = makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  const fetcher = () => new HttpArtifactFetcher({ timeoutMs: 5000, userAgent: 'channel-mirror-test' });

  it('응답을 임시 경로에 저장', async () => {
    const destPath = path.join(tempDir, 'staging', 'ok-1.0-0.conda.part');
    const progress: FetchProgressEvent[] = [];

    const result = await fetcher().fetch({
      url: `${baseUrl}/conda-forge/linux-64/ok-1.0-0.conda`,
      destPath,
      onProgress: (event) => progress.push(event),
    });

    expect(result).toEqual({ bytes: 7 });
    expect(await fs.readFile(destPath, 'utf-8')).toBe('payload');
    expect(progress[progress.length - 1]).toEqual({ downloadedBytes: 7, totalBytes: 7 });
    expect(userAgents[userAgents.length - 1]).toBe('channel-mirror-test');
    expect(acceptEncodings[acceptEncodings.length - 1]).toBe('identity');
  });

  it('gzip 응답은 압축을 풀어 저장하고 전송 크기는 압축된 길이와 비교', async () => {
    const destPath = path.join(tempDir, 'gzipped-1.0-0.conda.part');

    const result = await fetcher().fetch({
      url: `${baseUrl}/conda-forge/linux-64/gzipped-1.0-0.conda`,
      destPath,
    });

    expect(result).toEqual({ bytes: 5000 });
    expect(await fs.readFile(destPath)).toEqual(PLAIN);
  });

  it('지원하지 않는 Content-Encoding은 재시도하지 않는 NetworkError', async () => {
    const url = `${baseUrl}/conda-forge/linux-64/compress-1.0-0.conda`;

    const error = await fetcher()
      .fetch({ url, destPath: path.join(tempDir, 'compress.part') })
      .then(
        () => null,
        (err: unknown) => err
      );

    expect(error).toBeInstanceOf(NetworkError);
    if (error instanceof NetworkError) {
      expect(error.retryable).toBe(false);
      expect(error.message).toBe(`지원하지 않는 Content-Encoding: compress (${url})`);
    }
  });

  it('404는 재시도하지 않는 NetworkError', async () => {
    const url = `${baseUrl}/conda-forge/linux-64/missing-1.0-0.conda`;

    const error = await fetcher()
      .fetch({ url, destPath: path.join(tempDir, 'missing.part') })
      .then(
        () => null,
        (err: unknown) => err
      );

    expect(error).toBeInstanceOf(NetworkError);
    if (error instanceof NetworkError) {
      expect(error.retryable).toBe(false);
      expect(error.statusCode).toBe(404);
      expect(error.message).toBe(`HTTP 404 (${url})`);
    }
  });

  it('503은 재시도 가능한 NetworkError', async () => {
    const url = `${baseUrl}/conda-forge/linux-64/busy-1.0-0.conda`;

    const error = await fetcher()
      .fetch({ url, destPath: path.join(tempDir, 'busy.part') })
      .then(
        () => null,
        (err: unknown) => err
      );

    expect(error).toBeInstanceOf(NetworkError);
    if (error instanceof NetworkError) {
      expect(error.retryable).toBe(true);
      expect(error.statusCode).toBe(503);
    }
  });
});

describe('classifyRequestError', () => {
  it('axios 에러가 아니면 재시도 가능', () => {
    const error = classifyRequestError(new Error('boom'), 'https://conda.example.com/a.conda');

    expect(error.retryable).toBe(true);
    expect(error.message).toBe('요청 실패 (https://conda.example.com/a.conda): boom');
  });
});
