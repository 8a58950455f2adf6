import type { HexColor } from '../core/parse';
import { logInfo } from '../core/logger';
import { toSeconds, type CommandContext } from './context';

export interface TintOptions {
  color: HexColor;
  /** jeb_ 彩虹模式 */
  rainbow?: boolean;
  mixSceneLighting?: number;
  all?: boolean;
  artMeshNumber?: number[];
  nameExact?: string[];
  nameContains?: string[];
  tagExact?: string[];
  tagContains?: string[];
  /** 毫秒。插件断开后 VTube Studio 会清除染色，所以要保持连接这么久 */
  duration: number;
}

export interface SelectOptions {
  setText?: string;
  setHelp?: string;
  count?: number;
  preselect?: string[];
}

export async function listArtMeshes(ctx: CommandContext): Promise<void> {
  ctx.print(await ctx.client.send('ArtMeshListRequest', {}));
}

export async function tintArtMeshes(ctx: CommandContext, opts: TintOptions): Promise<void> {
  const resp = await ctx.client.send('ColorTintRequest', {
    colorTint: {
      colorR: opts.color.r,
      colorG: opts.color.g,
      colorB: opts.color.b,
      colorA: opts.color.a,
      mixWithSceneLightingColor: opts.mixSceneLighting,
      jeb_: opts.rainbow ?? false,
    },
    artMeshMatcher: {
      tintAll: opts.all ?? false,
      artMeshNumber: opts.artMeshNumber ?? [],
      nameExact: opts.nameExact ?? [],
      nameContains: opts.nameContains ?? [],
      tagExact: opts.tagExact ?? [],
      tagContains: opts.tagContains ?? [],
    },
  });
  ctx.print(resp);

  if (resp.matchedArtMeshes > 0) {
    logInfo(`染色成功，保持 ${toSeconds(opts.duration)}s 后退出...`);
    await ctx.sleep(opts.duration);
  }
}

/** 弹出选择框让用户在 VTube Studio 中选择 ArtMesh */
export async function selectArtMeshes(ctx: CommandContext, opts: SelectOptions): Promise<void> {
  ctx.print(await ctx.client.send('ArtMeshSelectionRequest', {
    textOverride: opts.setText,
    helpOverride: opts.setHelp,
    requestedArtMeshCount: opts.count ?? 0,
    activeArtMeshes: opts.preselect ?? [],
  }));
}
