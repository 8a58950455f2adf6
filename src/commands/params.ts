import type { CommandContext } from './context';

export interface CreateParamOptions {
  default: number;
  min: number;
  max: number;
  explanation?: string;
}

export interface InjectParamOptions {
  weight?: number;
  faceFound?: boolean;
  add?: boolean;
}

export async function getParam(ctx: CommandContext, name: string): Promise<void> {
  ctx.print(await ctx.client.send('ParameterValueRequest', { name }));
}

export async function createParam(ctx: CommandContext, name: string, opts: CreateParamOptions): Promise<void> {
  ctx.print(await ctx.client.send('ParameterCreationRequest', {
    parameterName: name,
    explanation: opts.explanation,
    min: opts.min,
    max: opts.max,
    defaultValue: opts.default,
  }));
}

/** 注入的值若 1 秒内没有再次更新，VTube Studio 会恢复原值 */
export async function injectParam(ctx: CommandContext, id: string, value: number, opts: InjectParamOptions): Promise<void> {
  ctx.print(await ctx.client.send('InjectParameterDataRequest', {
    faceFound: opts.faceFound ?? false,
    mode: opts.add ? 'add' : 'set',
    parameterValues: [{ id, value, weight: opts.weight }],
  }));
}

export async function deleteParam(ctx: CommandContext, name: string): Promise<void> {
  ctx.print(await ctx.client.send('ParameterDeletionRequest', { parameterName: name }));
}

export async function listInputParams(ctx: CommandContext): Promise<void> {
  ctx.print(await ctx.client.send('InputParameterListRequest', {}));
}

export async function listLive2DParams(ctx: CommandContext): Promise<void> {
  ctx.print(await ctx.client.send('Live2DParameterListRequest', {}));
}
