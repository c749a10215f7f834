import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';

// 설정 인터페이스 정의
export interface Config {
  // 다운로드 설정
  concurrentDownloads: number;
  maxRetries: number;
  retryDelayMs: number;
  requestTimeoutMs: number;

  // 기타 설정
  logLevel: LogLevel;
  userAgent: string;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

// 기본 설정값
// 원격 공유 스토리지는 작은 파일의 과도한 동시 I/O에 약하므로 동시성은 낮게 시작
export const DEFAULT_CONFIG: Config = {
  concurrentDownloads: 4,
  maxRetries: 3,
  retryDelayMs: 1000,
  requestTimeoutMs: 60000,
  logLevel: 'info',
  userAgent: 'channel-mirror/1.0',
};

export type ConfigKey = keyof Config;

export const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  concurrentDownloads: '동시 다운로드 수',
  maxRetries: '레코드별 최대 시도 횟수',
  retryDelayMs: '재시도 간격 (ms, 시도 횟수만큼 증가)',
  requestTimeoutMs: '요청 타임아웃 (ms)',
  logLevel: '로그 레벨',
  userAgent: 'HTTP User-Agent',
};

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIG, key);
}

/**
 * 문자열 값을 설정 키에 맞는 타입으로 변환합니다. 잘못된 값이면 에러를 던집니다.
 */
export function parseConfigValue<K extends ConfigKey>(key: K, raw: string): Config[K];
export function parseConfigValue(key: ConfigKey, raw: string): Config[ConfigKey] {
  switch (key) {
    case 'concurrentDownloads':
    case 'maxRetries':
      return parsePositiveInt(key, raw, 1);
    case 'retryDelayMs':
    case 'requestTimeoutMs':
      return parsePositiveInt(key, raw, 0);
    case 'logLevel': {
      const level = LOG_LEVELS.find((l) => l === raw);
      if (!level) {
        throw new Error(`logLevel은 ${LOG_LEVELS.join(', ')} 중 하나여야 합니다: ${raw}`);
      }
      return level;
    }
    case 'userAgent':
      if (!raw.trim()) {
        throw new Error('userAgent는 비어 있을 수 없습니다');
      }
      return raw;
  }
}

function parsePositiveInt(key: string, raw: string, min: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key}은(는) ${min} 이상의 정수여야 합니다: ${raw}`);
  }
  return value;
}

/**
 * 저장된 JSON에서 알려진 키만 검증하여 병합 (잘못된 값은 기본값 유지)
 */
function mergeConfig(raw: unknown): Config {
  const config: Config = { ...DEFAULT_CONFIG };
  if (typeof raw !== 'object' || raw === null) {
    return config;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) continue;
    try {
      assignConfigValue(config, key, String(value));
    } catch {
      // 잘못 저장된 값은 무시하고 기본값 사용
      continue;
    }
  }
  return config;
}

function assignConfigValue<K extends ConfigKey>(config: Config, key: K, raw: string): void {
  config[key] = parseConfigValue(key, raw);
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir?: string) {
    this.configDir =
      configDir ?? process.env.CHANNEL_MIRROR_HOME ?? path.join(os.homedir(), '.channel-mirror');
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * 설정을 로드합니다. 파일이 없으면 기본값을 반환합니다.
   */
  async loadConfig(): Promise<Config> {
    if (await fs.pathExists(this.configPath)) {
      const rawConfig: unknown = await fs.readJson(this.configPath);
      return mergeConfig(rawConfig);
    }
    return { ...DEFAULT_CONFIG };
  }

  /**
   * 설정을 저장합니다.
   */
  async saveConfig(config: Config): Promise<void> {
    await this.ensureDirectories();
    await fs.writeJson(this.configPath, config, { spaces: 2 });
  }

  /**
   * 특정 설정값을 업데이트합니다.
   */
  async updateConfig(updates: Partial<Config>): Promise<Config> {
    const currentConfig = await this.loadConfig();
    const newConfig = { ...currentConfig, ...updates };
    await this.saveConfig(newConfig);
    return newConfig;
  }

  /**
   * 설정값을 문자열에서 파싱하여 저장합니다 (CLI용).
   */
  async set(key: string, raw: string): Promise<Config> {
    if (!isConfigKey(key)) {
      throw new Error(`알 수 없는 설정 키: ${key}`);
    }
    const config = await this.loadConfig();
    assignConfigValue(config, key, raw);
    await this.saveConfig(config);
    return config;
  }

  /**
   * 설정을 기본값으로 초기화합니다.
   */
  async resetToDefaults(): Promise<Config> {
    await this.saveConfig(DEFAULT_CONFIG);
    return { ...DEFAULT_CONFIG };
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getLogsDir(): string {
    return this.logsDir;
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
