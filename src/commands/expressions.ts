import type { CommandContext } from './context';

export async function listExpressions(ctx: CommandContext, file: string | undefined, details: boolean): Promise<void> {
  ctx.print(await ctx.client.send('ExpressionStateRequest', { details, expressionFile: file }));
}

export async function setExpressionActive(ctx: CommandContext, file: string, active: boolean): Promise<void> {
  ctx.print(await ctx.client.send('ExpressionActivationRequest', { expressionFile: file, active }));
}
