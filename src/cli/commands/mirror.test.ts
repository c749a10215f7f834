import { describe, it, expect } from 'vitest';
import { resolveRunConfig } from './mirror';
import { DEFAULT_CONFIG } from '../../core/config';

describe('resolveRunConfig', () => {
  it('옵션이 없으면 설정값 그대로', () => {
    expect(resolveRunConfig(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
  });

  it('CLI 옵션이 설정값보다 우선', () => {
    const config = resolveRunConfig(
      { ...DEFAULT_CONFIG, concurrentDownloads: 8 },
      { concurrency: '2', maxRetries: '5', retryDelay: '0', timeout: '30000' }
    );

    expect(config).toEqual({
      ...DEFAULT_CONFIG,
      concurrentDownloads: 2,
      maxRetries: 5,
      retryDelayMs: 0,
      requestTimeoutMs: 30000,
    });
  });

  it('잘못된 숫자 옵션은 에러', () => {
    expect(() => resolveRunConfig(DEFAULT_CONFIG, { concurrency: 'many' })).toThrow(
      'concurrentDownloads은(는) 1 이상의 정수여야 합니다: many'
    );
  });
});
