#!/usr/bin/env node
/**
 * vts CLI
 *
 * 一次性连接 VTube Studio 插件 API，执行一条命令后断开。
 *
 * 用法：
 *   vts config init                      # 申请插件权限并保存 token
 *   vts hotkeys trigger --name Smile     # 按名称触发热键
 *   vts artmeshes tint --all --color '#ff000080' --duration 5s
 *   vts models move --x 0.5 --duration 1s
 */

import { CommanderError } from 'commander';
import { errorMessage } from './core/errors';
import { isVerbose, logDebug, logErr } from './core/logger';
import { createProgram } from './program';

async function main() {
  await createProgram().parseAsync(process.argv);
}

// ======================== 入口 ========================

main().catch((e: unknown) => {
  // 用法错误和 --help 已由 commander 输出
  if (e instanceof CommanderError) {
    process.exitCode = e.exitCode;
    return;
  }
  logErr(errorMessage(e));
  if (isVerbose() && e instanceof Error && e.stack) logDebug(e.stack);
  process.exitCode = 1;
});
