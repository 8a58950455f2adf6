import { describe, expect, it } from 'vitest';
import { FakeSender, fakeContext } from '../testing/fake-sender';
import { createParam, deleteParam, injectParam } from './params';

describe('params', () => {
  it('creates a custom parameter', async () => {
    const sender = new FakeSender({ ParameterCreationRequest: { parameterName: 'MyParam' } });
    const { ctx, printed } = fakeContext(sender);

    await createParam(ctx, 'MyParam', { default: 10, min: 0, max: 50, explanation: 'test parameter' });

    expect(sender.sent).toEqual([{
      type: 'ParameterCreationRequest',
      data: { parameterName: 'MyParam', explanation: 'test parameter', min: 0, max: 50, defaultValue: 10 },
    }]);
    expect(printed).toEqual([{ parameterName: 'MyParam' }]);
  });

  it('injects in set mode by default', async () => {
    const sender = new FakeSender();
    const { ctx } = fakeContext(sender);

    await injectParam(ctx, 'MyParam', 42, {});

    expect(sender.sent[0].data).toEqual({
      faceFound: false,
      mode: 'set',
      parameterValues: [{ id: 'MyParam', value: 42, weight: undefined }],
    });
  });

  it('injects in add mode with weight and face found', async () => {
    const sender = new FakeSender();
    const { ctx } = fakeContext(sender);

    await injectParam(ctx, 'FaceAngleX', -5, { add: true, weight: 0.5, faceFound: true });

    expect(sender.sent[0].data).toEqual({
      faceFound: true,
      mode: 'add',
      parameterValues: [{ id: 'FaceAngleX', value: -5, weight: 0.5 }],
    });
  });

  it('deletes by parameter name', async () => {
    const sender = new FakeSender();
    const { ctx } = fakeContext(sender);

    await deleteParam(ctx, 'MyParam');

    expect(sender.sent).toEqual([{ type: 'ParameterDeletionRequest', data: { parameterName: 'MyParam' } }]);
  });
});
