import type { ApiSender } from '../services/vts-client';

/** 命令处理函数的运行环境 */
export interface CommandContext {
  client: ApiSender;
  print(value: unknown): void;
  sleep(ms: number): Promise<void>;
}

export const toSeconds = (ms: number) => ms / 1000;
