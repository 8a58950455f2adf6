import { describe, expect, it } from 'vitest';
import { FakeSender, fakeContext } from '../testing/fake-sender';
import { loadModel, moveModel } from './models';

const MODELS = {
  numberOfModels: 2,
  availableModels: [
    { modelLoaded: true, modelName: 'Akari', modelID: 'model-akari' },
    { modelLoaded: false, modelName: 'Hiyori', modelID: 'model-hiyori' },
  ],
};

describe('models', () => {
  it('loads a model by name', async () => {
    const sender = new FakeSender({ AvailableModelsRequest: MODELS, ModelLoadRequest: { modelID: 'model-hiyori' } });
    const { ctx, printed } = fakeContext(sender);

    await loadModel(ctx, { name: 'Hiyori' });

    expect(sender.sent).toEqual([
      { type: 'AvailableModelsRequest', data: {} },
      { type: 'ModelLoadRequest', data: { modelID: 'model-hiyori' } },
    ]);
    expect(printed).toEqual([{ modelID: 'model-hiyori' }]);
  });

  it('loads a model by ID directly', async () => {
    const sender = new FakeSender();
    const { ctx } = fakeContext(sender);

    await loadModel(ctx, { id: 'model-akari' });

    expect(sender.sent).toEqual([{ type: 'ModelLoadRequest', data: { modelID: 'model-akari' } }]);
  });

  it('fails on an unknown model name', async () => {
    const { ctx } = fakeContext(new FakeSender({ AvailableModelsRequest: MODELS }));

    await expect(loadModel(ctx, { name: 'Nobody' })).rejects.toThrow('找不到名为 "Nobody" 的模型');
  });

  it('converts the move duration to seconds', async () => {
    const sender = new FakeSender();
    const { ctx } = fakeContext(sender);

    await moveModel(ctx, { duration: 1500, relative: true, x: -0.5, rotation: 90 });

    expect(sender.sent[0]).toEqual({
      type: 'MoveModelRequest',
      data: {
        timeInSeconds: 1.5,
        valuesAreRelativeToModel: true,
        positionX: -0.5,
        positionY: undefined,
        rotation: 90,
        size: undefined,
      },
    });
  });
});
