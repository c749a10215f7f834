#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import type { MirrorCommandOptions } from './commands/mirror';
import type { VerifyCommandOptions } from './commands/verify';

// 버전 정보
const VERSION = '1.0.0';

// 반복 옵션 수집 (--publish a --publish b)
const collect = (value: string, previous: string[] = []): string[] => [...previous, value];

// 메인 프로그램
const program = new Command();

program
  .name('channel-mirror')
  .description(chalk.cyan('channel-mirror - pixi.lock 기반 오프라인 conda 채널 미러'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시');

// mirror 명령어
program
  .command('mirror')
  .description('lock 파일의 패키지를 채널 미러로 다운로드')
  .argument('<lockfile>', 'pixi.lock 경로')
  .argument('<output>', '미러 루트 디렉토리')
  .option('-c, --concurrency <num>', '동시 다운로드 수 (기본: 설정값)')
  .option('-r, --max-retries <num>', '패키지별 최대 시도 횟수')
  .option('--retry-delay <ms>', '재시도 간격 (ms)')
  .option('--timeout <ms>', '요청 타임아웃 (ms)')
  .option('-f, --force', '기존 파일이 있어도 다시 다운로드')
  .option('-e, --environment <names...>', '특정 환경의 패키지만')
  .option('-p, --platform <subdirs...>', '특정 플랫폼의 패키지만 (linux-64 등)')
  .option('--json', '결과를 JSON으로 출력')
  .option('--publish <command>', '성공 후 실행할 명령어 ({root}, {root/} 치환)', collect)
  .option('--publish-always', '추가된 파일이 없어도 publish 실행')
  .action(async (lockfile: string, output: string, options: MirrorCommandOptions) => {
    const { mirrorCommand } = await import('./commands/mirror');
    await mirrorCommand(lockfile, output, options);
  });

// verify 명령어
program
  .command('verify')
  .description('네트워크 없이 미러의 패키지 해시 검증')
  .argument('<lockfile>', 'pixi.lock 경로')
  .argument('<output>', '미러 루트 디렉토리')
  .option('-e, --environment <names...>', '특정 환경의 패키지만')
  .option('-p, --platform <subdirs...>', '특정 플랫폼의 패키지만')
  .option('--json', '결과를 JSON으로 출력')
  .action(async (lockfile: string, output: string, options: VerifyCommandOptions) => {
    const { verifyCommand } = await import('./commands/verify');
    await verifyCommand(lockfile, output, options);
  });

// clean 명령어
program
  .command('clean')
  .description('중단된 실행이 남긴 임시 파일 삭제')
  .argument('<output>', '미러 루트 디렉토리')
  .action(async (output: string) => {
    const { cleanCommand } = await import('./commands/clean');
    await cleanCommand(output);
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key?: string) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key: string, value: string) => {
        const { configSet } = await import('./commands/config');
        await configSet(key, value);
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

// 명령어가 없으면 도움말 표시
if (process.argv.length <= 2) {
  console.log(chalk.cyan('\n  channel-mirror - pixi.lock 기반 오프라인 conda 채널 미러\n'));
  console.log('  사용법: channel-mirror <명령어> [옵션]\n');
  console.log('  명령어:');
  console.log('    mirror      lock 파일의 패키지를 미러로 다운로드');
  console.log('    verify      미러 해시 검증');
  console.log('    clean       임시 파일 정리');
  console.log('    config      설정 관리');
  console.log('\n  예시:');
  console.log(chalk.gray('    channel-mirror mirror pixi.lock ./local_conda_repo -c 2'));
  console.log(chalk.gray('    channel-mirror mirror pixi.lock ./local_conda_repo --publish "conda index {root}"'));
  console.log(chalk.gray('    channel-mirror verify pixi.lock ./local_conda_repo'));
  console.log('\n  자세한 내용: channel-mirror --help\n');
} else {
  // 파싱 및 실행
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
}
