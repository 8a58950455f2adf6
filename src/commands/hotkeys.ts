import type { CommandContext } from './context';

export interface ListHotkeysOptions {
  modelId?: string;
  live2dFile?: string;
}

export interface TriggerHotkeyOptions {
  id?: string;
  name?: string;
  /** Live2D 道具实例 ID，触发道具上的热键时使用 */
  item?: string;
}

export async function listHotkeys(ctx: CommandContext, opts: ListHotkeysOptions): Promise<void> {
  ctx.print(await ctx.client.send('HotkeysInCurrentModelRequest', {
    modelID: opts.modelId,
    live2DItemFileName: opts.live2dFile,
  }));
}

export async function triggerHotkey(ctx: CommandContext, opts: TriggerHotkeyOptions): Promise<void> {
  const hotkeyID = await resolveHotkeyId(ctx, opts);
  ctx.print(await ctx.client.send('HotkeyTriggerRequest', { hotkeyID, itemInstanceID: opts.item }));
}

async function resolveHotkeyId(ctx: CommandContext, opts: TriggerHotkeyOptions): Promise<string> {
  if (opts.id !== undefined && opts.name !== undefined) {
    throw new Error('id 与 --name 只能指定其中一个');
  }
  if (opts.id !== undefined) return opts.id;
  if (opts.name === undefined) throw new Error('必须指定 id 或 --name');

  const { availableHotkeys } = await ctx.client.send('HotkeysInCurrentModelRequest', {});
  const hotkey = availableHotkeys.find(h => h.name === opts.name);
  if (!hotkey) throw new Error(`找不到名为 "${opts.name}" 的热键`);
  return hotkey.hotkeyID;
}
