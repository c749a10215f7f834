import cliProgress from 'cli-progress';
import chalk from 'chalk';
import * as path from 'path';
import { getConfigManager, parseConfigValue, Config } from '../../core/config';
import { mirrorChannel } from '../../core/channelMirror';
import { DownloadCoordinator } from '../../core/mirror/downloadCoordinator';
import { formatMirrorReport, EXIT_CANCELLED } from '../../core/mirror/mirrorReporter';
import { CommandPublisher } from '../../core/publisher';
import { isMirrorError, toErrorMessage } from '../../core/errors';
import logger from '../../utils/logger';

// mirror 명령어 옵션 (commander가 문자열로 전달)
export interface MirrorCommandOptions {
  concurrency?: string;
  maxRetries?: string;
  retryDelay?: string;
  timeout?: string;
  force?: boolean;
  environment?: string[];
  platform?: string[];
  json?: boolean;
  publish?: string[];
  publishAlways?: boolean;
}

/**
 * CLI 옵션을 설정값 위에 덮어씁니다. 잘못된 숫자는 에러
 */
export function resolveRunConfig(config: Config, options: MirrorCommandOptions): Config {
  return {
    ...config,
    concurrentDownloads:
      options.concurrency !== undefined
        ? parseConfigValue('concurrentDownloads', options.concurrency)
        : config.concurrentDownloads,
    maxRetries: options.maxRetries !== undefined ? parseConfigValue('maxRetries', options.maxRetries) : config.maxRetries,
    retryDelayMs:
      options.retryDelay !== undefined ? parseConfigValue('retryDelayMs', options.retryDelay) : config.retryDelayMs,
    requestTimeoutMs:
      options.timeout !== undefined ? parseConfigValue('requestTimeoutMs', options.timeout) : config.requestTimeoutMs,
  };
}

/**
 * mirror 명령어 핸들러
 */
export async function mirrorCommand(lockfile: string, output: string, options: MirrorCommandOptions): Promise<void> {
  let coordinator: DownloadCoordinator | null = null;
  let interrupted = false;

  const onSigint = () => {
    if (interrupted) {
      process.exit(EXIT_CANCELLED);
    }
    interrupted = true;
    console.error(chalk.yellow('\n중단 요청 - 진행 중인 다운로드를 정리합니다 (한 번 더 누르면 즉시 종료)'));
    coordinator?.cancel();
  };

  try {
    const configManager = getConfigManager();
    const config = resolveRunConfig(await configManager.loadConfig(), options);
    await logger.initialize(config.logLevel);

    const root = path.resolve(output);
    const showProgress = !options.json && process.stdout.isTTY === true;

    if (!options.json) {
      console.log(chalk.cyan(`lock 파일: ${path.resolve(lockfile)}`));
      console.log(chalk.cyan(`미러 경로: ${root}`));
      console.log(chalk.cyan(`동시 다운로드: ${config.concurrentDownloads}개, 최대 시도: ${config.maxRetries}회\n`));
    }

    const bar = new cliProgress.SingleBar(
      {
        clearOnComplete: false,
        hideCursor: true,
        format: ' {bar} | {value}/{total} | {current}',
      },
      cliProgress.Presets.shades_classic
    );

    process.on('SIGINT', onSigint);

    const publishers = (options.publish ?? []).map((commandLine) =>
      CommandPublisher.fromCommandLine(commandLine, !options.publishAlways)
    );

    const result = await mirrorChannel({
      lockfile,
      root,
      environments: options.environment,
      platforms: options.platform,
      concurrency: config.concurrentDownloads,
      maxRetries: config.maxRetries,
      retryDelayMs: config.retryDelayMs,
      requestTimeoutMs: config.requestTimeoutMs,
      userAgent: config.userAgent,
      force: options.force,
      publishers,
      onCoordinator: (created) => {
        coordinator = created;

        if (showProgress) {
          let started = false;
          created.on('progress', (entry, overall) => {
            if (!started) {
              bar.start(overall.totalItems, 0, { current: '' });
              started = true;
            }
            bar.update(overall.finishedItems, { current: entry.channelPath });
          });
          created.on('allComplete', () => bar.stop());
          created.on('cancelled', () => bar.stop());
        } else if (!options.json) {
          created.on('itemComplete', (entry) => console.log(chalk.green(`✓ ${entry.channelPath}`)));
          created.on('itemRetry', (entry, error) =>
            console.log(chalk.yellow(`↻ ${entry.channelPath} (${entry.attempts}회 실패: ${error.message})`))
          );
        }

        if (!options.json) {
          created.on('itemFailed', (entry, error) => {
            if (showProgress) bar.stop();
            console.log(chalk.red(`✗ ${entry.channelPath}: ${error.message}`));
          });
        }
      },
    });

    if (options.json) {
      console.log(
        JSON.stringify(
          { ...result.report, published: result.published, publishFailures: result.publishFailures },
          null,
          2
        )
      );
    } else {
      if (result.sweptTempFiles > 0) {
        console.log(chalk.gray(`이전 실행의 임시 파일 ${result.sweptTempFiles}개를 정리했습니다`));
      }
      console.log('\n' + formatMirrorReport(result.report));
      for (const name of result.published) {
        console.log(chalk.green(`✓ publish 완료: ${name}`));
      }
      for (const failure of result.publishFailures) {
        console.log(chalk.red(`✗ publish 실패: ${failure.message}`));
      }
    }

    process.exitCode = result.exitCode;
  } catch (error) {
    const kind = isMirrorError(error) ? ` [${error.kind}]` : '';
    console.error(chalk.red(`✗ 미러 실행 실패${kind}: ${toErrorMessage(error)}`));
    if (error instanceof Error) {
      logger.logError(error, '미러 실행 실패');
    }
    process.exitCode = 1;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
