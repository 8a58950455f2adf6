import type { PhysicsOverride } from '../types';
import { toSeconds, type CommandContext } from './context';

export const PHYSICS_KINDS = ['strength', 'wind'] as const;
export type PhysicsKind = (typeof PHYSICS_KINDS)[number];

export interface SetPhysicsOptions {
  kind: PhysicsKind;
  value: number;
  /** 物理组 ID，仅倍率模式使用 */
  id?: string;
  /** 毫秒，VTube Studio 接受 0.5s~5s */
  duration: number;
}

export async function getPhysics(ctx: CommandContext): Promise<void> {
  ctx.print(await ctx.client.send('GetCurrentModelPhysicsRequest', {}));
}

/** 覆盖基础值（0~100），作用于整个模型 */
export async function setPhysicsBase(ctx: CommandContext, opts: SetPhysicsOptions): Promise<void> {
  await sendOverride(ctx, opts.kind, {
    id: '',
    value: opts.value,
    setBaseValue: true,
    overrideSeconds: toSeconds(opts.duration),
  });
}

/** 覆盖某个物理组的倍率（0~2） */
export async function setPhysicsMultiplier(ctx: CommandContext, opts: SetPhysicsOptions): Promise<void> {
  if (!opts.id) throw new Error('倍率模式必须指定 --id');
  await sendOverride(ctx, opts.kind, {
    id: opts.id,
    value: opts.value,
    setBaseValue: false,
    overrideSeconds: toSeconds(opts.duration),
  });
}

async function sendOverride(ctx: CommandContext, kind: PhysicsKind, override: PhysicsOverride): Promise<void> {
  ctx.print(await ctx.client.send('SetCurrentModelPhysicsRequest', {
    strengthOverrides: kind === 'strength' ? [override] : [],
    windOverrides: kind === 'wind' ? [override] : [],
  }));
}
