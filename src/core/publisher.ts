/**
 * 완성된 미러를 외부 도구(conda index, rsync 등)에 넘기는 Publisher
 */

import execa from 'execa';
import * as path from 'path';
import type { MirrorReport } from './mirror/mirrorReporter';
import { toErrorMessage } from './errors';
import logger from '../utils/logger';

export interface Publisher {
  readonly name: string;
  publish(root: string, report: MirrorReport): Promise<void>;
}

export interface CommandPublisherOptions {
  /** 실행 파일 */
  command: string;
  /** 인자. `{root}`는 미러 루트, `{root/}`는 끝에 구분자를 붙인 루트로 치환 */
  args?: string[];
  /** 추가된 파일이 없으면 실행하지 않음 */
  onlyWhenChanged?: boolean;
  cwd?: string;
}

/**
 * `{root}` / `{root/}` 자리표시자 치환
 * rsync 계열 도구는 원본 경로 끝의 구분자 유무에 따라 동작이 달라지므로 둘을 구분합니다.
 */
export function expandRootPlaceholders(arg: string, root: string): string {
  const resolved = path.resolve(root);
  const withSep = resolved.endsWith(path.sep) ? resolved : resolved + path.sep;
  return arg.split('{root/}').join(withSep).split('{root}').join(resolved);
}

/**
 * 셸 명령어 문자열을 실행 파일과 인자로 분리 (따옴표 지원)
 */
export function splitCommandLine(commandLine: string): string[] {
  const tokens: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(commandLine)) !== null) {
    tokens.push(match[1] ?? match[2] ?? match[3]);
  }
  return tokens;
}

/**
 * 외부 명령어를 실행하는 Publisher
 */
export class CommandPublisher implements Publisher {
  readonly name: string;

  constructor(private readonly options: CommandPublisherOptions) {
    this.name = [options.command, ...(options.args ?? [])].join(' ');
  }

  /**
   * "conda index {root}" 형태의 문자열로 생성
   */
  static fromCommandLine(commandLine: string, onlyWhenChanged = true): CommandPublisher {
    const [command, ...args] = splitCommandLine(commandLine);
    if (!command) {
      throw new Error('publish 명령어가 비어 있습니다');
    }
    return new CommandPublisher({ command, args, onlyWhenChanged });
  }

  async publish(root: string, report: MirrorReport): Promise<void> {
    if (this.options.onlyWhenChanged && !report.changed) {
      logger.info('변경 사항이 없어 publish 건너뜀', { publisher: this.name });
      return;
    }

    const args = (this.options.args ?? []).map((arg) => expandRootPlaceholders(arg, root));
    logger.info('publish 실행', { command: this.options.command, args });

    try {
      const result = await execa(this.options.command, args, {
        cwd: this.options.cwd ?? process.cwd(),
        stdio: 'pipe',
      });
      logger.debug('publish 완료', { publisher: this.name, stdout: result.stdout });
    } catch (error) {
      throw new Error(`publish 실패 (${this.name}): ${toErrorMessage(error)}`);
    }
  }
}

export interface PublishCall {
  root: string;
  report: MirrorReport;
}

/**
 * 호출만 기록하는 Publisher (테스트, dry-run용)
 */
export class RecordingPublisher implements Publisher {
  readonly name = 'recording';
  readonly calls: PublishCall[] = [];

  async publish(root: string, report: MirrorReport): Promise<void> {
    this.calls.push({ root, report });
  }
}
