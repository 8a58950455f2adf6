import { afterEach, describe, expect, it, vi } from 'vitest';
import { ApiError, AuthenticationError } from '../core/errors';
import { MockVtsServer, type MockVtsServerOptions } from '../testing/mock-vts-server';
import { VtsClient, type VtsClientOptions } from './vts-client';

const PLUGIN = { pluginName: 'Test Plugin', pluginDeveloper: 'tester' };

describe('VtsClient', () => {
  let server: MockVtsServer;
  let client: VtsClient | null = null;

  async function setup(serverOptions: MockVtsServerOptions, clientOptions: Partial<VtsClientOptions> = {}) {
    server = new MockVtsServer(serverOptions);
    await server.start();
    client = await VtsClient.connect(server.url, { ...PLUGIN, ...clientOptions });
    return client;
  }

  afterEach(async () => {
    await client?.close();
    client = null;
    await server.stop();
  });

  it('wraps requests in the API envelope and resolves with the response data', async () => {
    const c = await setup({
      handlers: { APIStateRequest: () => ({ active: true, vTubeStudioVersion: '1.28.0' }) },
    });

    await expect(c.send('APIStateRequest', {})).resolves.toEqual({ active: true, vTubeStudioVersion: '1.28.0' });
    expect(server.received).toEqual([{
      apiName: 'VTubeStudioPublicAPI',
      apiVersion: '1.0',
      requestID: '1',
      messageType: 'APIStateRequest',
      data: {},
    }]);
  });

  it('correlates concurrent requests by request ID', async () => {
    const c = await setup({
      handlers: {
        APIStateRequest: () => ({ which: 'state' }),
        ParameterValueRequest: (data) => ({ echoed: data }),
      },
      validTokens: ['saved-token'],
    }, { token: 'saved-token' });
    await c.authenticate();

    const [state, param] = await Promise.all([
      c.send('APIStateRequest', {}),
      c.send('ParameterValueRequest', { name: 'FaceAngleX' }),
    ]);
    expect(state).toEqual({ which: 'state' });
    expect(param).toEqual({ echoed: { name: 'FaceAngleX' } });
  });

  it('authenticates with a saved token without asking for a new one', async () => {
    const onNewToken = vi.fn();
    const c = await setup({ validTokens: ['saved-token'] }, { token: 'saved-token', onNewToken });

    await c.authenticate();

    expect(server.received.map(r => r.messageType)).toEqual(['AuthenticationRequest']);
    expect(server.received[0].data).toEqual({ ...PLUGIN, authenticationToken: 'saved-token' });
    expect(onNewToken).not.toHaveBeenCalled();
  });

  it('requests a new token when the saved one is rejected', async () => {
    const onNewToken = vi.fn();
    const c = await setup({ issueToken: 'issued-token' }, { token: 'stale-token', onNewToken });

    await c.authenticate();

    expect(server.received.map(r => r.messageType)).toEqual([
      'AuthenticationRequest',
      'AuthenticationTokenRequest',
      'AuthenticationRequest',
    ]);
    expect(server.requestsOf('AuthenticationTokenRequest')[0].data).toEqual(PLUGIN);
    expect(server.received[2].data).toEqual({ ...PLUGIN, authenticationToken: 'issued-token' });
    expect(onNewToken).toHaveBeenCalledWith('issued-token');
    expect(c.currentToken).toBe('issued-token');
  });

  it('requests a token straight away when none is saved', async () => {
    const onNewToken = vi.fn();
    const c = await setup({ issueToken: 'issued-token' }, { onNewToken });

    await c.authenticate();

    expect(server.received.map(r => r.messageType)).toEqual(['AuthenticationTokenRequest', 'AuthenticationRequest']);
    expect(onNewToken).toHaveBeenCalledTimes(1);
  });

  it('surfaces a denied token request as an ApiError', async () => {
    const c = await setup({ issueToken: null });

    const err = await c.authenticate().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({
      errorID: 50,
      requestType: 'AuthenticationTokenRequest',
      message: 'APIError 50: User has denied API access for your plugin.',
    });
  });

  it('fails when a newly issued token is not accepted', async () => {
    const onNewToken = vi.fn();
    const c = await setup({ issueToken: 'issued-token', rejectIssuedTokens: true }, { onNewToken });

    const err = await c.authenticate().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AuthenticationError);
    expect(err).toMatchObject({ message: '认证失败: Token invalid.' });
    expect(onNewToken).toHaveBeenCalledWith('issued-token');
    expect(server.received.map(r => r.messageType)).toEqual(['AuthenticationTokenRequest', 'AuthenticationRequest']);
  });

  it('maps APIError responses to ApiError', async () => {
    const c = await setup({ handlers: { StatisticsRequest: () => ({ uptime: 1 }) } });

    await expect(c.send('StatisticsRequest', {})).rejects.toThrow('APIError 8: This request requires authentication.');
  });

  it('rejects responses that do not have the expected shape', async () => {
    const c = await setup({
      validTokens: ['saved-token'],
      handlers: { HotkeysInCurrentModelRequest: () => ({ availableHotkeys: 'none' }) },
    }, { token: 'saved-token' });
    await c.authenticate();

    await expect(c.send('HotkeysInCurrentModelRequest', {}))
      .rejects.toThrow(/^HotkeysInCurrentModelRequest 的响应格式不符合预期: availableHotkeys: /);
  });

  it('rejects a response of the wrong type', async () => {
    const c = await setup({
      handlers: { APIStateRequest: () => ({ active: true }) },
      replyTypes: { APIStateRequest: 'StatisticsResponse' },
    });

    const err = await c.send('APIStateRequest', {}).catch((e: unknown) => e);

    expect(err).not.toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ message: 'APIStateRequest 收到意外的响应类型 StatisticsResponse' });
  });

  it('rejects an APIError without an error ID', async () => {
    const c = await setup({
      handlers: { APIStateRequest: () => ({ message: 'broken' }) },
      replyTypes: { APIStateRequest: 'APIError' },
    });

    const err = await c.send('APIStateRequest', {}).catch((e: unknown) => e);

    expect(err).not.toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ message: 'APIStateRequest 返回了无法解析的 APIError' });
  });

  it('times out when no response arrives', async () => {
    const c = await setup({ handlers: { APIStateRequest: () => null } }, { timeoutMs: 50 });

    await expect(c.send('APIStateRequest', {})).rejects.toThrow('APIStateRequest 请求超时 (50ms)');
  });

  it('rejects pending requests when the connection drops', async () => {
    const c = await setup({ handlers: { APIStateRequest: () => null } });

    const pending = c.send('APIStateRequest', {});
    server.dropClients();

    await expect(pending).rejects.toThrow(/^连接已断开/);
    await expect(c.send('APIStateRequest', {})).rejects.toThrow('连接未打开，无法发送 APIStateRequest');
  });

  it('ignores messages that do not answer a request', async () => {
    const c = await setup({ handlers: { APIStateRequest: () => ({ active: true }) } });

    server.broadcast('not json');
    server.broadcast(JSON.stringify({ requestID: 'event', messageType: 'TestEvent', data: {} }));

    await expect(c.send('APIStateRequest', {})).resolves.toEqual({ active: true });
  });

  it('fails to connect when nothing is listening', async () => {
    server = new MockVtsServer();
    await server.start();
    const url = server.url;
    await server.stop();

    await expect(VtsClient.connect(url, PLUGIN)).rejects.toThrow(`无法连接 ${url}`);
  });
});
