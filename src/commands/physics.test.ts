import { describe, expect, it } from 'vitest';
import { FakeSender, fakeContext } from '../testing/fake-sender';
import { setPhysicsBase, setPhysicsMultiplier } from './physics';

describe('physics overrides', () => {
  it('sets the base strength for the whole model', async () => {
    const sender = new FakeSender();
    const { ctx } = fakeContext(sender);

    await setPhysicsBase(ctx, { kind: 'strength', value: 80, duration: 500 });

    expect(sender.sent).toEqual([{
      type: 'SetCurrentModelPhysicsRequest',
      data: {
        strengthOverrides: [{ id: '', value: 80, setBaseValue: true, overrideSeconds: 0.5 }],
        windOverrides: [],
      },
    }]);
  });

  it('sets a wind multiplier for one group', async () => {
    const sender = new FakeSender();
    const { ctx } = fakeContext(sender);

    await setPhysicsMultiplier(ctx, { kind: 'wind', value: 1.5, id: 'PhysicsSetting1', duration: 2000 });

    expect(sender.sent[0].data).toEqual({
      strengthOverrides: [],
      windOverrides: [{ id: 'PhysicsSetting1', value: 1.5, setBaseValue: false, overrideSeconds: 2 }],
    });
  });

  it('requires a group ID for multipliers', async () => {
    const { ctx } = fakeContext(new FakeSender());

    await expect(setPhysicsMultiplier(ctx, { kind: 'wind', value: 1, duration: 500 })).rejects.toThrow('倍率模式必须指定 --id');
  });
});
