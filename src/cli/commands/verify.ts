import chalk from 'chalk';
import Table from 'cli-table3';
import * as path from 'path';
import { verifyChannel } from '../../core/channelMirror';
import { isMirrorError, toErrorMessage } from '../../core/errors';
import { getConfigManager } from '../../core/config';
import logger from '../../utils/logger';

// verify 명령어 옵션
export interface VerifyCommandOptions {
  environment?: string[];
  platform?: string[];
  json?: boolean;
}

/**
 * verify 명령어 핸들러 (네트워크 접근 없음)
 */
export async function verifyCommand(lockfile: string, output: string, options: VerifyCommandOptions): Promise<void> {
  try {
    const config = await getConfigManager().loadConfig();
    await logger.initialize(config.logLevel);

    const result = await verifyChannel({
      lockfile,
      root: output,
      environments: options.environment,
      platforms: options.platform,
    });

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            counts: result.counts,
            problems: result.records
              .filter((r) => r.state !== 'verified')
              .map((r) => ({ channelPath: r.channelPath, state: r.state, url: r.record.url })),
            exitCode: result.exitCode,
          },
          null,
          2
        )
      );
    } else {
      console.log(chalk.cyan(`\n미러 검증: ${path.resolve(output)}\n`));

      const problems = result.records.filter((r) => r.state !== 'verified');
      if (problems.length > 0) {
        const table = new Table({
          head: [chalk.cyan('경로'), chalk.cyan('상태')],
        });
        for (const problem of problems) {
          table.push([
            problem.channelPath,
            problem.state === 'missing' ? chalk.yellow('없음') : chalk.red('손상됨'),
          ]);
        }
        console.log(table.toString());
      }

      console.log(chalk.green(`  검증됨: ${result.counts.verified}`));
      console.log(chalk.yellow(`  없음: ${result.counts.missing}`));
      console.log(chalk.red(`  손상됨: ${result.counts.corrupt}`));
      console.log(
        result.exitCode === 0
          ? chalk.green('\n✓ 모든 패키지가 검증되었습니다')
          : chalk.red('\n✗ 다시 받아야 하는 패키지가 있습니다 (mirror 명령어로 복구)')
      );
    }

    process.exitCode = result.exitCode;
  } catch (error) {
    const kind = isMirrorError(error) ? ` [${error.kind}]` : '';
    console.error(chalk.red(`✗ 검증 실패${kind}: ${toErrorMessage(error)}`));
    process.exitCode = 1;
  }
}
