import type { ConfigStore } from '../core/config-store';
import { logOk } from '../core/logger';
import type { SessionFactory } from '../services/session';
import type { CliConfig } from '../types';

/**
 * 初始化配置：连接并申请插件权限，成功后连同 token 写入配置文件。
 * 不读取已有配置，参数缺省时使用默认值。
 */
export async function initConfig(store: ConfigStore, config: CliConfig, openSession: SessionFactory): Promise<CliConfig> {
  let token = config.token;
  const session = await openSession(config, {
    onNewToken: (t) => { token = t; },
  });
  try {
    // 任意需要认证的请求即可触发授权弹窗
    await session.send('StatisticsRequest', {});
  } finally {
    await session.close();
  }

  const saved: CliConfig = { ...config, token };
  store.save(saved);
  logOk(`配置已写入 ${store.configPath}`);
  return saved;
}
