/**
 * 命令行参数值解析：颜色、时长、数字、布尔值
 */

export interface HexColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

const HEX_COLOR = /^([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})?$/i;

/** `#rrggbb` 或 `#rrggbbaa`，# 可省略，缺省 alpha 为 255 */
export function parseHexColor(value: string): HexColor {
  const m = HEX_COLOR.exec(value.trim().replace(/^#+/, ''));
  if (!m) throw new Error(`无法将 "${value}" 解析为十六进制颜色`);
  const byte = (hex: string | undefined, fallback: number) => (hex === undefined ? fallback : parseInt(hex, 16));
  return {
    r: byte(m[1], 0),
    g: byte(m[2], 0),
    b: byte(m[3], 0),
    a: byte(m[4], 255),
  };
}

const UNIT_MS: Record<string, number> = {
  ms: 1, msec: 1, millisecond: 1, milliseconds: 1,
  s: 1000, sec: 1000, secs: 1000, second: 1000, seconds: 1000,
  m: 60_000, min: 60_000, mins: 60_000, minute: 60_000, minutes: 60_000,
  h: 3_600_000, hr: 3_600_000, hrs: 3_600_000, hour: 3_600_000, hours: 3_600_000,
};

/** setTimeout 能表示的最大延迟 */
export const MAX_DURATION_MS = 2_147_483_647;

const DURATION_PART = /(\d+(?:\.\d+)?|\.\d+)\s*([a-z]*)/gy;

/**
 * 解析时长，返回毫秒。
 * 支持 `500ms`、`5s`、`1m30s`、`1.5s`，纯数字按秒计。
 */
export function parseDuration(value: string): number {
  const input = value.trim().toLowerCase();
  if (!input) throw new Error('时长不能为空');

  let total = 0;
  let pos = 0;
  DURATION_PART.lastIndex = 0;
  while (pos < input.length) {
    const m = DURATION_PART.exec(input);
    if (!m) throw new Error(`无法解析时长 "${value}"`);
    const unit = !m[2] ? 1000 : Object.hasOwn(UNIT_MS, m[2]) ? UNIT_MS[m[2]] : undefined;
    if (unit === undefined) throw new Error(`时长 "${value}" 中的单位 "${m[2]}" 无效`);
    total += parseFloat(m[1]) * unit;
    pos = DURATION_PART.lastIndex;
    while (input[pos] === ' ') pos++;
    DURATION_PART.lastIndex = pos;
  }
  const ms = Math.round(total);
  if (ms > MAX_DURATION_MS) throw new Error(`时长 "${value}" 超过上限 ${MAX_DURATION_MS}ms（约 24.8 天）`);
  return ms;
}

export function parseNumber(value: string): number {
  const n = Number(value.trim());
  if (!value.trim() || !Number.isFinite(n)) throw new Error(`"${value}" 不是有效的数字`);
  return n;
}

export function parseInteger(value: string): number {
  const n = parseNumber(value);
  if (!Number.isInteger(n)) throw new Error(`"${value}" 不是整数`);
  return n;
}

/** 限定取值范围，含两端 */
export function inRange(parse: (value: string) => number, min: number, max: number) {
  return (value: string): number => {
    const n = parse(value);
    if (n < min || n > max) throw new Error(`"${value}" 超出范围 ${min}~${max}`);
    return n;
  };
}

export function parseBoolean(value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case 'true': return true;
    case 'false': return false;
    default: throw new Error(`"${value}" 不是布尔值 (true / false)`);
  }
}

