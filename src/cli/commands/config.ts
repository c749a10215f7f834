import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager, isConfigKey, CONFIG_DESCRIPTIONS } from '../../core/config';
import { toErrorMessage } from '../../core/errors';

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const config = await getConfigManager().loadConfig();

  if (key) {
    if (isConfigKey(key)) {
      console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(config[key])));
    } else {
      console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
      process.exitCode = 1;
    }
  } else {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(config, null, 2));
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  try {
    const config = await getConfigManager().set(key, value);
    if (isConfigKey(key)) {
      console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(config[key])}`));
    }
  } catch (error) {
    console.error(chalk.red(`설정 저장 실패: ${toErrorMessage(error)}`));
    process.exitCode = 1;
  }
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const configManager = getConfigManager();
  const config = await configManager.loadConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [22, 24, 40],
  });

  for (const [key, value] of Object.entries(config)) {
    table.push([key, String(value), isConfigKey(key) ? CONFIG_DESCRIPTIONS[key] : '-']);
  }

  console.log(chalk.cyan(`\n설정 목록 (${configManager.getConfigPath()}):\n`));
  console.log(table.toString());
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  try {
    await getConfigManager().resetToDefaults();
    console.log(chalk.green('✓ 설정이 초기화되었습니다'));
  } catch (error) {
    console.error(chalk.red(`설정 초기화 실패: ${toErrorMessage(error)}`));
    process.exitCode = 1;
  }
}
