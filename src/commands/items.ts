import type { FadeMode } from '../types';
import { toSeconds, type CommandContext } from './context';

export const FADE_MODES: readonly FadeMode[] = ['linear', 'easeIn', 'easeOut', 'easeBoth', 'overshoot', 'zip'];

export interface ListItemsOptions {
  spots?: boolean;
  instances?: boolean;
  files?: boolean;
  withFileName?: string;
  withInstanceId?: string;
}

export interface LoadItemOptions {
  x: number;
  y: number;
  size: number;
  rotation: number;
  fadeTime: number;
  order: number;
  failIfOrderTaken?: boolean;
  smoothing: number;
  censored?: boolean;
  flipped?: boolean;
  locked?: boolean;
}

export interface UnloadItemsOptions {
  all?: boolean;
  fromThisPlugin?: boolean;
  fromOtherPlugins?: boolean;
  id?: string[];
  file?: string[];
}

export interface MoveItemOptions {
  /** 毫秒 */
  duration: number;
  fadeMode: FadeMode;
  x?: number;
  y?: number;
  size?: number;
  rotation?: number;
  order?: number;
  setFlip?: boolean;
  flip?: boolean;
  userCanStop?: boolean;
}

export interface AnimateItemOptions {
  framerate?: number;
  frame?: number;
  brightness?: number;
  opacity?: number;
  stopFrame?: number[];
  resetStopFrames?: boolean;
  play?: boolean;
  stop?: boolean;
}

export const ITEM_LOAD_DEFAULTS = {
  x: 0,
  y: 0,
  size: 0.32,
  rotation: 0,
  fadeTime: 0.5,
  order: 1,
  smoothing: 0,
} as const;

export async function listItems(ctx: CommandContext, opts: ListItemsOptions): Promise<void> {
  ctx.print(await ctx.client.send('ItemListRequest', {
    includeAvailableSpots: opts.spots ?? false,
    includeItemInstancesInScene: opts.instances ?? false,
    includeAvailableItemFiles: opts.files ?? false,
    onlyItemsWithFileName: opts.withFileName,
    onlyItemsWithInstanceID: opts.withInstanceId,
  }));
}

export async function loadItem(ctx: CommandContext, fileName: string, opts: LoadItemOptions): Promise<void> {
  ctx.print(await ctx.client.send('ItemLoadRequest', {
    fileName,
    positionX: opts.x,
    positionY: opts.y,
    size: opts.size,
    rotation: opts.rotation,
    fadeTime: opts.fadeTime,
    order: opts.order,
    failIfOrderTaken: opts.failIfOrderTaken ?? false,
    smoothing: opts.smoothing,
    censored: opts.censored ?? false,
    flipped: opts.flipped ?? false,
    locked: opts.locked ?? false,
    // CLI 执行完立即断开，道具要留在场景里
    unloadWhenPluginDisconnects: false,
  }));
}

export async function unloadItems(ctx: CommandContext, opts: UnloadItemsOptions): Promise<void> {
  ctx.print(await ctx.client.send('ItemUnloadRequest', {
    unloadAllInScene: opts.all ?? false,
    unloadAllLoadedByThisPlugin: opts.fromThisPlugin ?? false,
    allowUnloadingItemsLoadedByUserOrOtherPlugins: opts.fromOtherPlugins ?? false,
    instanceIDs: opts.id ?? [],
    fileNames: opts.file ?? [],
  }));
}

export async function moveItem(ctx: CommandContext, itemInstanceID: string, opts: MoveItemOptions): Promise<void> {
  ctx.print(await ctx.client.send('ItemMoveRequest', {
    itemsToMove: [{
      itemInstanceID,
      timeInSeconds: toSeconds(opts.duration),
      fadeMode: opts.fadeMode,
      positionX: opts.x,
      positionY: opts.y,
      size: opts.size,
      rotation: opts.rotation,
      order: opts.order,
      setFlip: opts.setFlip ?? false,
      flip: opts.flip ?? false,
      userCanStop: opts.userCanStop ?? false,
    }],
  }));
}

export async function animateItem(ctx: CommandContext, itemInstanceID: string, opts: AnimateItemOptions): Promise<void> {
  if (opts.play && opts.stop) throw new Error('--play 与 --stop 只能指定其中一个');

  const play = opts.play ?? false;
  const stop = opts.stop ?? false;
  const stopFrames = opts.stopFrame ?? [];
  const reset = opts.resetStopFrames ?? false;

  ctx.print(await ctx.client.send('ItemAnimationControlRequest', {
    itemInstanceID,
    framerate: opts.framerate,
    frame: opts.frame,
    brightness: opts.brightness,
    opacity: opts.opacity,
    setAutoStopFrames: stopFrames.length > 0 || reset,
    autoStopFrames: reset ? [] : stopFrames,
    setAnimationPlayState: play || stop,
    animationPlayState: play || !stop,
  }));
}
