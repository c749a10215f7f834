import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { DownloadCoordinator, OverallProgress } from './downloadCoordinator';
import { planChannel, resolveChannelPath, STAGING_DIR_NAME } from './channelLayout';
import { NetworkError } from '../errors';
import type { MirrorEntry } from '../../types';
import { FakeFetcher, FixtureArtifact, listFiles, makeArtifact, makeTempDir } from '../../test-utils/mirrorFixtures';

describe('DownloadCoordinator', () => {
  let root: string;
  let artifacts: FixtureArtifact[];

  const planOf = (list: FixtureArtifact[]) => planChannel(list.map((a) => a.record)).entries;
  const finalPath = (artifact: FixtureArtifact) =>
    resolveChannelPath(root, `${artifact.record.subdir}/${artifact.record.filename}`);

  beforeEach(() => {
    root = makeTempDir();
    artifacts = [
      makeArtifact('numpy', '1.26.4', 'py312h8753938_0'),
      makeArtifact('zlib', '1.3.1', 'h4ab18f5_1'),
      makeArtifact('tzdata', '2024a', 'h0c530f3_0', { subdir: 'noarch' }),
    ];
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  describe('다운로드', () => {
    it('모든 레코드를 최종 경로에 배치', async () => {
      const fetcher = new FakeFetcher(artifacts);
      const entries = await new DownloadCoordinator(fetcher).run(planOf(artifacts), { root, retryDelayMs: 0 });

      expect(entries.map((e) => e.status)).toEqual(['complete', 'complete', 'complete']);
      expect(entries.every((e) => e.state === 'verified')).toBe(true);
      for (const artifact of artifacts) {
        expect(await fs.readFile(finalPath(artifact))).toEqual(artifact.content);
      }
      expect(await listFiles(path.join(root, STAGING_DIR_NAME))).toEqual([]);
    });

    it('엔트리에 받은 크기와 시도 횟수 기록', async () => {
      const [numpy] = artifacts;
      const entries = await new DownloadCoordinator(new FakeFetcher([numpy])).run(planOf([numpy]), {
        root,
        retryDelayMs: 0,
      });

      expect(entries[0].bytes).toBe(numpy.content.length);
      expect(entries[0].attempts).toBe(1);
      expect(entries[0].filePath).toBe(finalPath(numpy));
    });

    it('진행률 이벤트와 완료 이벤트 발생', async () => {
      const coordinator = new DownloadCoordinator(new FakeFetcher(artifacts));
      const progress: OverallProgress[] = [];
      let completed: MirrorEntry[] = [];
      coordinator.on('progress', (_entry, overall) => progress.push(overall));
      coordinator.on('allComplete', (entries) => {
        completed = entries;
      });

      await coordinator.run(planOf(artifacts), { root, retryDelayMs: 0 });

      expect(progress[progress.length - 1]).toEqual({
        totalItems: 3,
        finishedItems: 3,
        failedItems: 0,
        skippedItems: 0,
        downloadedBytes: artifacts.reduce((sum, a) => sum + a.content.length, 0),
      });
      expect(completed).toHaveLength(3);
      expect(coordinator.running).toBe(false);
    });
  });

  describe('멱등성', () => {
    it('두 번째 실행은 요청 없이 모두 건너뜀', async () => {
      const fetcher = new FakeFetcher(artifacts);
      await new DownloadCoordinator(fetcher).run(planOf(artifacts), { root, retryDelayMs: 0 });
      expect(fetcher.calls).toHaveLength(3);

      const skipped: string[] = [];
      const coordinator = new DownloadCoordinator(fetcher);
      coordinator.on('itemSkipped', (entry) => skipped.push(entry.channelPath));
      const entries = await coordinator.run(planOf(artifacts), { root, retryDelayMs: 0 });

      expect(fetcher.calls).toHaveLength(3);
      expect(entries.map((e) => e.status)).toEqual(['skipped', 'skipped', 'skipped']);
      expect(entries.every((e) => e.state === 'verified' && e.attempts === 0)).toBe(true);
      expect(skipped).toHaveLength(3);
    });

    it('force면 검증된 파일도 다시 받음', async () => {
      const fetcher = new FakeFetcher(artifacts);
      await new DownloadCoordinator(fetcher).run(planOf(artifacts), { root, retryDelayMs: 0 });

      const entries = await new DownloadCoordinator(fetcher).run(planOf(artifacts), {
        root,
        retryDelayMs: 0,
        force: true,
      });

      expect(fetcher.calls).toHaveLength(6);
      expect(entries.map((e) => e.status)).toEqual(['complete', 'complete', 'complete']);
    });
  });

  describe('재시도', () => {
    it('일시적인 네트워크 오류 후 성공', async () => {
      const [numpy] = artifacts;
      const fetcher = new FakeFetcher([numpy]).script(numpy.record.url, [
        { error: new NetworkError('ECONNRESET', true) },
      ]);
      const coordinator = new DownloadCoordinator(fetcher);
      const retries: string[] = [];
      coordinator.on('itemRetry', (_entry, error) => retries.push(error.message));

      const [entry] = await coordinator.run(planOf([numpy]), { root, retryDelayMs: 0 });

      expect(entry.status).toBe('complete');
      expect(entry.attempts).toBe(2);
      expect(retries).toEqual(['ECONNRESET']);
      expect(await fs.readFile(finalPath(numpy))).toEqual(numpy.content);
    });

    it('잘린 응답은 해시 불일치로 재시도', async () => {
      const [numpy] = artifacts;
      const fetcher = new FakeFetcher([numpy]).script(numpy.record.url, [{ body: numpy.content.subarray(0, 4) }]);

      const [entry] = await new DownloadCoordinator(fetcher).run(planOf([numpy]), { root, retryDelayMs: 0 });

      expect(entry.status).toBe('complete');
      expect(entry.attempts).toBe(2);
      expect(fetcher.callsFor(numpy.record.url)).toBe(2);
    });

    it('계속 손상된 응답이면 최대 시도 후 실패, 최종 경로에 파일 없음', async () => {
      const [numpy] = artifacts;
      const corrupt = { body: 'corrupted payload!!' };
      const fetcher = new FakeFetcher([numpy]).script(numpy.record.url, [corrupt, corrupt, corrupt]);

      const [entry] = await new DownloadCoordinator(fetcher).run(planOf([numpy]), {
        root,
        retryDelayMs: 0,
        maxRetries: 3,
      });

      expect(entry.status).toBe('failed');
      expect(entry.state).toBe('missing');
      expect(entry.attempts).toBe(3);
      expect(entry.failure?.kind).toBe('hash-mismatch');
      expect(await fs.pathExists(finalPath(numpy))).toBe(false);
      expect(await listFiles(path.join(root, STAGING_DIR_NAME))).toEqual([]);
    });

    it('재시도할 수 없는 오류는 한 번만 시도', async () => {
      const [numpy] = artifacts;
      const fetcher = new FakeFetcher([]);

      const [entry] = await new DownloadCoordinator(fetcher).run(planOf([numpy]), { root, retryDelayMs: 0 });

      expect(entry.status).toBe('failed');
      expect(entry.attempts).toBe(1);
      expect(entry.failure).toEqual({ kind: 'network', message: `HTTP 404 (${numpy.record.url})` });
    });
  });

  describe('실패 격리', () => {
    it('한 레코드의 실패가 다른 레코드에 영향을 주지 않음', async () => {
      const [numpy, zlib, tzdata] = artifacts;
      const fetcher = new FakeFetcher([numpy, tzdata]);

      const entries = await new DownloadCoordinator(fetcher).run(planOf(artifacts), { root, retryDelayMs: 0 });

      expect(entries.map((e) => e.status)).toEqual(['complete', 'failed', 'complete']);
      expect(await fs.pathExists(finalPath(numpy))).toBe(true);
      expect(await fs.pathExists(finalPath(zlib))).toBe(false);
      expect(await fs.pathExists(finalPath(tzdata))).toBe(true);
    });
  });

  describe('기존 파일', () => {
    it('손상된 기존 파일은 다시 받아 교체', async () => {
      const [numpy] = artifacts;
      await fs.outputFile(finalPath(numpy), 'stale bytes');
      const fetcher = new FakeFetcher([numpy]);

      const [entry] = await new DownloadCoordinator(fetcher).run(planOf([numpy]), { root, retryDelayMs: 0 });

      expect(entry.status).toBe('complete');
      expect(entry.state).toBe('verified');
      expect(await fs.readFile(finalPath(numpy))).toEqual(numpy.content);
    });

    it('다시 받기에 실패하면 손상된 파일을 그대로 두고 corrupt로 보고', async () => {
      const [numpy] = artifacts;
      await fs.outputFile(finalPath(numpy), 'stale bytes');
      const fetcher = new FakeFetcher([]);

      const [entry] = await new DownloadCoordinator(fetcher).run(planOf([numpy]), { root, retryDelayMs: 0 });

      expect(entry.status).toBe('failed');
      expect(entry.state).toBe('corrupt');
      expect(await fs.readFile(finalPath(numpy), 'utf-8')).toBe('stale bytes');
    });
  });

  describe('동시성', () => {
    it('동시 요청 수가 제한을 넘지 않음', async () => {
      const many = Array.from({ length: 6 }, (_, i) => makeArtifact(`pkg${i}`, '1.0', '0'));
      const fetcher = new FakeFetcher(many, { delayMs: 20 });

      const entries = await new DownloadCoordinator(fetcher).run(planOf(many), {
        root,
        concurrency: 2,
        retryDelayMs: 0,
      });

      expect(entries.every((e) => e.status === 'complete')).toBe(true);
      expect(fetcher.maxInFlight).toBe(2);
    });

    it('잘못된 동시성 값은 에러', async () => {
      const coordinator = new DownloadCoordinator(new FakeFetcher(artifacts));
      await expect(coordinator.run(planOf(artifacts), { root, concurrency: 0 })).rejects.toThrow(
        '동시 다운로드 수는 1 이상의 정수여야 합니다: 0'
      );
    });

    it('잘못된 최대 시도 횟수는 에러', async () => {
      const coordinator = new DownloadCoordinator(new FakeFetcher(artifacts));
      await expect(coordinator.run(planOf(artifacts), { root, maxRetries: 0 })).rejects.toThrow(
        '최대 시도 횟수는 1 이상의 정수여야 합니다: 0'
      );
    });
  });

  describe('취소', () => {
    it('취소하면 진행 중/대기 중 항목을 cancelled로 기록하고 최종 경로에 쓰지 않음', async () => {
      const fetcher = new FakeFetcher(artifacts, { delayMs: 50 });
      const coordinator = new DownloadCoordinator(fetcher);
      let cancelledEvent = false;
      coordinator.on('itemStart', () => coordinator.cancel());
      coordinator.on('cancelled', () => {
        cancelledEvent = true;
      });

      const entries = await coordinator.run(planOf(artifacts), { root, concurrency: 1, retryDelayMs: 0 });

      expect(entries.map((e) => e.status)).toEqual(['cancelled', 'cancelled', 'cancelled']);
      expect(entries.every((e) => e.failure?.kind === 'cancelled')).toBe(true);
      expect(cancelledEvent).toBe(true);
      for (const artifact of artifacts) {
        expect(await fs.pathExists(finalPath(artifact))).toBe(false);
      }
    });

    it('실행 중이 아니면 cancel은 아무 것도 하지 않음', () => {
      const coordinator = new DownloadCoordinator(new FakeFetcher());
      coordinator.cancel();
      expect(coordinator.running).toBe(false);
      expect(coordinator.getEntries()).toEqual([]);
    });
  });
});
