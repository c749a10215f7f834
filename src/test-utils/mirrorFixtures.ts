/**
 * 미러 테스트 유틸리티
 * 가짜 conda 아티팩트, pixi.lock 텍스트, 인메모리 fetcher를 제공합니다.
 */

import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import type { PackageRecord } from '../types';
import { MirrorError, NetworkError } from '../core/errors';
import type { ArtifactFetcher, FetchRequest, FetchResult } from '../core/mirror/artifactFetcher';

export const TEST_CHANNEL = 'https://conda.example.com/conda-forge';

export interface FixtureArtifact {
  record: PackageRecord;
  content: Buffer;
}

export interface ArtifactOptions {
  subdir?: string;
  content?: string;
  ext?: '.conda' | '.tar.bz2';
}

/**
 * 내용으로부터 해시와 크기를 계산한 가짜 아티팩트
 */
export function makeArtifact(name: string, version: string, build: string, options: ArtifactOptions = {}): FixtureArtifact {
  const subdir = options.subdir ?? 'linux-64';
  const filename = `${name}-${version}-${build}${options.ext ?? '.conda'}`;
  const content = Buffer.from(options.content ?? `${name}-${version}-${build} payload`);

  return {
    record: {
      name,
      version,
      build,
      subdir,
      filename,
      url: `${TEST_CHANNEL}/${subdir}/${filename}`,
      hash: { algorithm: 'sha256', value: sha256(content) },
      md5: md5(content),
      size: content.length,
      channel: TEST_CHANNEL,
    },
    content,
  };
}

export function sha256(content: Buffer | string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

export function md5(content: Buffer | string): string {
  return crypto.createHash('md5').update(content).digest('hex');
}

/**
 * v6 형식의 pixi.lock 텍스트 생성
 * environments 미지정 시 default 환경에 subdir별로 모두 등록
 */
export function lockfileYaml(
  artifacts: FixtureArtifact[],
  environments?: Record<string, Record<string, FixtureArtifact[]>>
): string {
  const envs = environments ?? { default: groupBySubdir(artifacts) };
  const lines: string[] = ['version: 6', 'environments:'];

  for (const [envName, platforms] of Object.entries(envs)) {
    lines.push(`  ${envName}:`, '    channels:', `    - url: ${TEST_CHANNEL}/`, '    packages:');
    for (const [platform, list] of Object.entries(platforms)) {
      lines.push(`      ${platform}:`);
      for (const artifact of list) {
        lines.push(`      - conda: ${artifact.record.url}`);
      }
    }
  }

  lines.push('packages:');
  for (const { record } of artifacts) {
    lines.push(`- conda: ${record.url}`);
    lines.push(`  sha256: "${record.hash.value}"`);
    if (record.md5) lines.push(`  md5: "${record.md5}"`);
    if (record.size !== undefined) lines.push(`  size: ${record.size}`);
  }

  return lines.join('\n') + '\n';
}

function groupBySubdir(artifacts: FixtureArtifact[]): Record<string, FixtureArtifact[]> {
  const result: Record<string, FixtureArtifact[]> = {};
  for (const artifact of artifacts) {
    (result[artifact.record.subdir] ??= []).push(artifact);
  }
  return result;
}

export type FetchBehavior = { body: Buffer | string } | { error: MirrorError };

export interface FakeFetcherOptions {
  /** 요청마다 응답 전 대기 시간 */
  delayMs?: number;
}

/**
 * 네트워크 대신 메모리의 내용을 임시 파일에 쓰는 fetcher
 * script()로 등록한 동작을 먼저 소비하고, 이후에는 등록된 아티팩트 내용을 반환합니다.
 */
export class FakeFetcher implements ArtifactFetcher {
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  private contents = new Map<string, Buffer>();
  private scripted = new Map<string, FetchBehavior[]>();

  constructor(
    artifacts: FixtureArtifact[] = [],
    private readonly options: FakeFetcherOptions = {}
  ) {
    for (const artifact of artifacts) {
      this.contents.set(artifact.record.url, artifact.content);
    }
  }

  script(url: string, behaviors: FetchBehavior[]): this {
    this.scripted.set(url, [...(this.scripted.get(url) ?? []), ...behaviors]);
    return this;
  }

  callsFor(url: string): number {
    return this.calls.filter((called) => called === url).length;
  }

  async fetch({ url, destPath, signal }: FetchRequest): Promise<FetchResult> {
    this.calls.push(url);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      await wait(this.options.delayMs ?? 0, signal);

      const behavior = this.scripted.get(url)?.shift();
      if (behavior && 'error' in behavior) {
        throw behavior.error;
      }

      const body = behavior ? Buffer.from(behavior.body) : this.contents.get(url);
      if (!body) {
        throw new NetworkError(`HTTP 404 (${url})`, false, 404);
      }

      await fs.ensureDir(path.dirname(destPath));
      await fs.writeFile(destPath, body);
      return { bytes: body.length };
    } finally {
      this.inFlight--;
    }
  }
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const aborted = () => new NetworkError('요청 취소', false);
    if (signal?.aborted) {
      reject(aborted());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(aborted());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * 테스트용 임시 디렉토리
 */
export function makeTempDir(prefix = 'channel-mirror-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * 디렉토리 아래 모든 파일의 상대 경로 ('/' 구분자, 정렬)
 */
export async function listFiles(dir: string): Promise<string[]> {
  if (!(await fs.pathExists(dir))) return [];
  const result: string[] = [];
  const walk = async (current: string, prefix: string) => {
    for (const name of await fs.readdir(current)) {
      const full = path.join(current, name);
      const rel = prefix ? `${prefix}/${name}` : name;
      if ((await fs.stat(full)).isDirectory()) {
        await walk(full, rel);
      } else {
        result.push(rel);
      }
    }
  };
  await walk(dir, '');
  return result.sort();
}
