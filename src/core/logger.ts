/**
 * 彩色日志输出
 *
 * 全部写到 stderr，stdout 只留给命令结果（JSON），方便管道处理。
 */

// ======================== 颜色输出 ========================

export const C = {
  reset: '\x1b[0m', bold: '\x1b[1m', dim: '\x1b[2m',
  red: '\x1b[31m', green: '\x1b[32m', yellow: '\x1b[33m',
  blue: '\x1b[34m', magenta: '\x1b[35m', cyan: '\x1b[36m', gray: '\x1b[90m',
};

export const co = (t: string, ...c: string[]) => c.join('') + t + C.reset;
const now = () => co(new Date().toLocaleTimeString('en-US', { hour12: false }), C.gray);

let verbose = false;

export function setVerbose(value: boolean): void {
  verbose = value;
}

export function isVerbose(): boolean {
  return verbose;
}

export const logInfo = (m: string) => console.error(`${now()} ${co('ℹ', C.blue)} ${m}`);
export const logOk = (m: string) => console.error(`${now()} ${co('✓', C.green)} ${m}`);
export const logWarn = (m: string) => console.error(`${now()} ${co('⚠', C.yellow)} ${m}`);
export const logErr = (m: string) => console.error(`${now()} ${co('✗', C.red)} ${m}`);
export const logDebug = (m: string) => {
  if (verbose) console.error(`${now()} ${co('·', C.dim)} ${co(m, C.dim)}`);
};
