import { logDebug } from '../core/logger';
import type { CliConfig } from '../types';
import { VtsClient, type ApiSender } from './vts-client';

/** 一次性会话：连接、认证，用完关闭 */
export interface Session extends ApiSender {
  close(): Promise<void>;
}

export interface SessionHooks {
  onNewToken: (token: string) => void | Promise<void>;
}

export type SessionFactory = (config: CliConfig, hooks: SessionHooks) => Promise<Session>;

export function endpointOf(config: Pick<CliConfig, 'host' | 'port'>): string {
  return `ws://${config.host}:${config.port}`;
}

export const openSession: SessionFactory = async (config, hooks) => {
  const url = endpointOf(config);
  logDebug(`连接 ${url}...`);

  const client = await VtsClient.connect(url, {
    pluginName: config.pluginName,
    pluginDeveloper: config.pluginDeveloper,
    token: config.token,
    onNewToken: hooks.onNewToken,
  });

  try {
    await client.authenticate();
  } catch (e) {
    await client.close();
    throw e;
  }
  return client;
};
