/**
 * 配置文件读写
 *
 * 默认位置按平台惯例放在用户配置目录下，可用 --config-file 或 VTS_CONFIG 覆盖。
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CliConfigSchema } from '../config';
import type { CliConfig } from '../types';
import { ConfigError, errorMessage } from './errors';

const APP_DIR = 'vts-cli';
const CONFIG_FILE = 'config.json';

export function defaultConfigDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir(),
): string {
  if (platform === 'win32') {
    return path.join(env.APPDATA || path.join(home, 'AppData', 'Roaming'), APP_DIR, 'config');
  }
  if (platform === 'darwin') {
    return path.join(home, 'Library', 'Application Support', APP_DIR);
  }
  return path.join(env.XDG_CONFIG_HOME || path.join(home, '.config'), APP_DIR);
}

export function resolveConfigPath(override: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  const explicit = override || env.VTS_CONFIG;
  if (explicit) return path.resolve(explicit);
  return path.join(defaultConfigDir(env), CONFIG_FILE);
}

/** 校验并补全默认值，source 用于错误信息 */
export function validateConfig(value: unknown, source: string): CliConfig {
  const result = CliConfigSchema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`${source} 无效: ${detail}`);
  }
  return result.data;
}

export class ConfigStore {
  constructor(readonly configPath: string) {}

  load(): CliConfig {
    let raw: string;
    try {
      raw = fs.readFileSync(this.configPath, 'utf-8');
    } catch (e) {
      throw new ConfigError(
        `无法读取配置文件 ${this.configPath}（${errorMessage(e)}），请先运行 \`vts config init\` 创建`,
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new ConfigError(`配置文件 ${this.configPath} 不是有效的 JSON: ${errorMessage(e)}`);
    }

    return validateConfig(json, `配置文件 ${this.configPath}`);
  }

  save(config: CliConfig): void {
    fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n');
  }
}
