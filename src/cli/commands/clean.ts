import chalk from 'chalk';
import * as path from 'path';
import { sweepStaging } from '../../core/channelMirror';
import { toErrorMessage } from '../../core/errors';

/**
 * 중단된 실행이 남긴 임시 파일 정리
 */
export async function cleanCommand(output: string): Promise<void> {
  try {
    const count = await sweepStaging(output);
    if (count > 0) {
      console.log(chalk.green(`✓ 임시 파일 ${count}개를 삭제했습니다 (${path.resolve(output)})`));
    } else {
      console.log(chalk.gray('정리할 임시 파일이 없습니다'));
    }
  } catch (error) {
    console.error(chalk.red(`임시 파일 정리 실패: ${toErrorMessage(error)}`));
    process.exitCode = 1;
  }
}
