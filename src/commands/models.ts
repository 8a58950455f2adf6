import { toSeconds, type CommandContext } from './context';

export interface LoadModelOptions {
  id?: string;
  name?: string;
}

export interface MoveModelOptions {
  /** 毫秒 */
  duration: number;
  relative?: boolean;
  x?: number;
  y?: number;
  rotation?: number;
  size?: number;
}

export async function listModels(ctx: CommandContext): Promise<void> {
  ctx.print(await ctx.client.send('AvailableModelsRequest', {}));
}

export async function currentModel(ctx: CommandContext): Promise<void> {
  ctx.print(await ctx.client.send('CurrentModelRequest', {}));
}

export async function loadModel(ctx: CommandContext, opts: LoadModelOptions): Promise<void> {
  const modelID = await resolveModelId(ctx, opts);
  ctx.print(await ctx.client.send('ModelLoadRequest', { modelID }));
}

export async function moveModel(ctx: CommandContext, opts: MoveModelOptions): Promise<void> {
  ctx.print(await ctx.client.send('MoveModelRequest', {
    timeInSeconds: toSeconds(opts.duration),
    valuesAreRelativeToModel: opts.relative ?? false,
    positionX: opts.x,
    positionY: opts.y,
    rotation: opts.rotation,
    size: opts.size,
  }));
}

async function resolveModelId(ctx: CommandContext, opts: LoadModelOptions): Promise<string> {
  if (opts.id !== undefined && opts.name !== undefined) {
    throw new Error('id 与 --name 只能指定其中一个');
  }
  if (opts.id !== undefined) return opts.id;
  if (opts.name === undefined) throw new Error('必须指定 id 或 --name');

  const { availableModels } = await ctx.client.send('AvailableModelsRequest', {});
  const model = availableModels.find(m => m.modelName === opts.name);
  if (!model) throw new Error(`找不到名为 "${opts.name}" 的模型`);
  return model.modelID;
}
