import type { CommandContext } from './context';

/** 无参数的查询类请求 */
export type InfoQuery =
  | 'APIStateRequest'
  | 'StatisticsRequest'
  | 'VTSFolderInfoRequest'
  | 'SceneColorOverlayInfoRequest'
  | 'FaceFoundRequest';

export async function queryInfo(ctx: CommandContext, type: InfoQuery): Promise<void> {
  ctx.print(await ctx.client.send(type, {}));
}
