import { describe, it, expect } from 'vitest';
import { buildMirrorReport, formatBytes, formatDuration, formatMirrorReport, EXIT_CANCELLED } from './mirrorReporter';
import type { DownloadStatus, MirrorEntry, MirrorFailure } from '../../types';
import { makeArtifact } from '../../test-utils/mirrorFixtures';

function entry(name: string, status: DownloadStatus, extra: { bytes?: number; failure?: MirrorFailure } = {}): MirrorEntry {
  const { record } = makeArtifact(name, '1.0', '0');
  return {
    id: name,
    record,
    channelPath: `${record.subdir}/${record.filename}`,
    state: status === 'complete' || status === 'skipped' ? 'verified' : 'missing',
    status,
    attempts: status === 'skipped' ? 0 : 1,
    bytes: extra.bytes ?? 0,
    failure: extra.failure,
  };
}

describe('buildMirrorReport', () => {
  it('모두 성공하면 종료 코드 0', () => {
    const report = buildMirrorReport([
      entry('b', 'complete', { bytes: 100 }),
      entry('a', 'complete', { bytes: 50 }),
      entry('c', 'skipped'),
    ]);

    expect(report.total).toBe(3);
    expect(report.added).toEqual(['linux-64/a-1.0-0.conda', 'linux-64/b-1.0-0.conda']);
    expect(report.skipped).toEqual(['linux-64/c-1.0-0.conda']);
    expect(report.bytesDownloaded).toBe(150);
    expect(report.counts.complete).toBe(2);
    expect(report.counts.skipped).toBe(1);
    expect(report.changed).toBe(true);
    expect(report.success).toBe(true);
    expect(report.exitCode).toBe(0);
  });

  it('모두 건너뛰면 변경 없음', () => {
    const report = buildMirrorReport([entry('a', 'skipped')]);
    expect(report.changed).toBe(false);
    expect(report.exitCode).toBe(0);
  });

  it('실패가 있으면 종료 코드 1과 실패 목록', () => {
    const report = buildMirrorReport([
      entry('a', 'complete'),
      entry('b', 'failed', { failure: { kind: 'hash-mismatch', message: '해시 불일치' } }),
      entry('c', 'cancelled'),
    ]);

    expect(report.success).toBe(false);
    expect(report.exitCode).toBe(1);
    expect(report.failures).toEqual([
      {
        channelPath: 'linux-64/b-1.0-0.conda',
        name: 'b',
        version: '1.0',
        build: '0',
        url: 'https://conda.example.com/conda-forge/linux-64/b-1.0-0.conda',
        kind: 'hash-mismatch',
        reason: '해시 불일치',
        attempts: 1,
      },
    ]);
  });

  it('실패 없이 취소된 항목만 있으면 취소 종료 코드', () => {
    const report = buildMirrorReport([entry('a', 'complete'), entry('b', 'cancelled')]);

    expect(report.cancelled).toEqual(['linux-64/b-1.0-0.conda']);
    expect(report.exitCode).toBe(EXIT_CANCELLED);
  });

  it('중간 상태로 남은 항목은 미완료로 취급', () => {
    const report = buildMirrorReport([entry('a', 'fetching')]);

    expect(report.counts.fetching).toBe(1);
    expect(report.cancelled).toEqual(['linux-64/a-1.0-0.conda']);
    expect(report.success).toBe(false);
  });
});

describe('포맷', () => {
  it('formatBytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(1048576)).toBe('1 MB');
  });

  it('formatDuration', () => {
    expect(formatDuration(4500)).toBe('4초');
    expect(formatDuration(125000)).toBe('2분 5초');
  });

  it('실패한 패키지를 식별 정보와 함께 출력', () => {
    const report = buildMirrorReport([
      entry('b', 'failed', { failure: { kind: 'network', message: 'HTTP 404' } }),
    ]);

    const text = formatMirrorReport(report);

    expect(text).toContain('실패한 패키지 (1개):');
    expect(text).toContain('  - b=1.0=0 (linux-64/b-1.0-0.conda) [network, 1회 시도]: HTTP 404');
    expect(text).toContain('✗ 미러 갱신 미완료 (종료 코드 1)');
  });

  it('변경이 없으면 최신 상태 메시지', () => {
    expect(formatMirrorReport(buildMirrorReport([entry('a', 'skipped')]))).toContain('✓ 미러가 이미 최신 상태입니다');
  });
});
