import { describe, expect, it } from 'vitest';
import { FakeSender, fakeContext } from '../testing/fake-sender';
import { ITEM_LOAD_DEFAULTS, animateItem, loadItem, moveItem, unloadItems } from './items';

describe('items', () => {
  it('loads an item that stays after the plugin disconnects', async () => {
    const sender = new FakeSender({ ItemLoadRequest: { instanceID: 'inst-1', fileName: 'hat.png' } });
    const { ctx, printed } = fakeContext(sender);

    await loadItem(ctx, 'hat.png', { ...ITEM_LOAD_DEFAULTS, locked: true });

    expect(sender.sent[0]).toEqual({
      type: 'ItemLoadRequest',
      data: {
        fileName: 'hat.png',
        positionX: 0,
        positionY: 0,
        size: 0.32,
        rotation: 0,
        fadeTime: 0.5,
        order: 1,
        failIfOrderTaken: false,
        smoothing: 0,
        censored: false,
        flipped: false,
        locked: true,
        unloadWhenPluginDisconnects: false,
      },
    });
    expect(printed).toEqual([{ instanceID: 'inst-1', fileName: 'hat.png' }]);
  });

  it('unloads by instance ID and file name', async () => {
    const sender = new FakeSender();
    const { ctx } = fakeContext(sender);

    await unloadItems(ctx, { id: ['inst-1', 'inst-2'], file: ['hat.png'], fromOtherPlugins: true });

    expect(sender.sent[0].data).toEqual({
      unloadAllInScene: false,
      unloadAllLoadedByThisPlugin: false,
      allowUnloadingItemsLoadedByUserOrOtherPlugins: true,
      instanceIDs: ['inst-1', 'inst-2'],
      fileNames: ['hat.png'],
    });
  });

  it('moves one item', async () => {
    const sender = new FakeSender();
    const { ctx } = fakeContext(sender);

    await moveItem(ctx, 'inst-1', { duration: 250, fadeMode: 'easeBoth', x: 0.2, setFlip: true, flip: true });

    expect(sender.sent[0].data).toEqual({
      itemsToMove: [{
        itemInstanceID: 'inst-1',
        timeInSeconds: 0.25,
        fadeMode: 'easeBoth',
        positionX: 0.2,
        positionY: undefined,
        size: undefined,
        rotation: undefined,
        order: undefined,
        setFlip: true,
        flip: true,
        userCanStop: false,
      }],
    });
  });

  describe('animation', () => {
    it('plays by default without touching stop frames', async () => {
      const sender = new FakeSender();
      const { ctx } = fakeContext(sender);

      await animateItem(ctx, 'inst-1', { framerate: 24 });

      expect(sender.sent[0].data).toMatchObject({
        itemInstanceID: 'inst-1',
        framerate: 24,
        setAutoStopFrames: false,
        autoStopFrames: [],
        setAnimationPlayState: false,
        animationPlayState: true,
      });
    });

    it('stops and sets stop frames', async () => {
      const sender = new FakeSender();
      const { ctx } = fakeContext(sender);

      await animateItem(ctx, 'inst-1', { stop: true, stopFrame: [3, 9] });

      expect(sender.sent[0].data).toMatchObject({
        setAutoStopFrames: true,
        autoStopFrames: [3, 9],
        setAnimationPlayState: true,
        animationPlayState: false,
      });
    });

    it('clears stop frames on reset', async () => {
      const sender = new FakeSender();
      const { ctx } = fakeContext(sender);

      await animateItem(ctx, 'inst-1', { resetStopFrames: true, stopFrame: [3], play: true });

      expect(sender.sent[0].data).toMatchObject({
        setAutoStopFrames: true,
        autoStopFrames: [],
        setAnimationPlayState: true,
        animationPlayState: true,
      });
    });

    it('rejects play together with stop', async () => {
      const { ctx } = fakeContext(new FakeSender());

      await expect(animateItem(ctx, 'inst-1', { play: true, stop: true })).rejects.toThrow('--play 与 --stop 只能指定其中一个');
    });
  });
});
