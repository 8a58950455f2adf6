import { z } from 'zod';
import type { CliConfig } from './types';

export const DEFAULT_CONFIG: CliConfig = {
  host: 'localhost',
  port: 8001,
  pluginName: 'VTube Studio CLI',
  pluginDeveloper: 'vts-cli',
};

export const API_NAME = 'VTubeStudioPublicAPI';
export const API_VERSION = '1.0';

/** 普通请求超时 */
export const REQUEST_TIMEOUT_MS = 30_000;
/** 申请 token 需要用户在 VTube Studio 弹窗中确认，给足时间 */
export const TOKEN_REQUEST_TIMEOUT_MS = 120_000;

// VTube Studio 要求插件名与开发者名为 3~32 个字符
const pluginLabel = z.string().min(3).max(32);

export const CliConfigSchema: z.ZodType<CliConfig, z.ZodTypeDef, unknown> = z.object({
  host: z.string().min(1).default(DEFAULT_CONFIG.host),
  port: z.number().int().min(1).max(65535).default(DEFAULT_CONFIG.port),
  token: z.string().min(1).optional(),
  pluginName: pluginLabel.default(DEFAULT_CONFIG.pluginName),
  pluginDeveloper: pluginLabel.default(DEFAULT_CONFIG.pluginDeveloper),
});
