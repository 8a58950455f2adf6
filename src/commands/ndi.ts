import type { CommandContext } from './context';

export interface NdiSetOptions {
  active?: boolean;
  useNdi5?: boolean;
  /** 为 true 时 NDI 输出不再跟随窗口分辨率，改用自定义宽高 */
  useCustomResolution?: boolean;
  /** 16 的倍数，256~8192 */
  width?: number;
  /** 8 的倍数，256~8192 */
  height?: number;
}

export async function getNdiConfig(ctx: CommandContext): Promise<void> {
  ctx.print(await ctx.client.send('NDIConfigRequest', { setNewConfig: false }));
}

export async function setNdiConfig(ctx: CommandContext, opts: NdiSetOptions): Promise<void> {
  ctx.print(await ctx.client.send('NDIConfigRequest', {
    setNewConfig: true,
    ndiActive: opts.active,
    useNDI5: opts.useNdi5,
    useCustomResolution: opts.useCustomResolution,
    customWidthNDI: opts.width,
    customHeightNDI: opts.height,
  }));
}
