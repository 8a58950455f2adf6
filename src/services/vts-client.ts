/**
 * VTube Studio 插件 API 客户端
 *
 * 一条 WebSocket 连接，requestID 关联请求与响应。
 * 授权流程：已有 token 先直接认证，失败或没有 token 时向 VTube Studio 申请新 token
 * （需要用户在弹窗中允许），拿到后通过 onNewToken 交给调用方保存。
 */

import WebSocket from 'ws';
import { API_NAME, API_VERSION, REQUEST_TIMEOUT_MS, TOKEN_REQUEST_TIMEOUT_MS } from '../config';
import { ApiError, AuthenticationError } from '../core/errors';
import { logDebug, logErr, logInfo, logWarn } from '../core/logger';
import type { ApiRequest, RequestPayloads, RequestType } from '../types';
import {
  ApiEnvelopeSchema,
  ApiErrorDataSchema,
  RESPONSE_SCHEMAS,
  parseResponse,
  responseTypeOf,
  type ResponseData,
} from './schemas';

/** 命令处理只依赖这一层 */
export interface ApiSender {
  send<K extends RequestType>(type: K, data: RequestPayloads[K]): Promise<ResponseData<K>>;
}

export interface VtsClientOptions {
  pluginName: string;
  pluginDeveloper: string;
  token?: string;
  onNewToken?: (token: string) => void | Promise<void>;
  /** 单个请求的超时 */
  timeoutMs?: number;
  /** 申请 token 的超时（等待用户点击） */
  tokenTimeoutMs?: number;
}

interface PendingRequest {
  type: RequestType;
  expected: string;
  resolve: (data: unknown) => void;
  reject: (e: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class VtsClient implements ApiSender {
  private ws: WebSocket;
  private options: VtsClientOptions;
  private nextId = 1;
  private pending = new Map<string, PendingRequest>();
  private token: string | undefined;

  static connect(url: string, options: VtsClientOptions): Promise<VtsClient> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url);
      const onOpen = () => {
        ws.off('error', onError);
        resolve(new VtsClient(ws, options));
      };
      const onError = (e: Error) => {
        ws.off('open', onOpen);
        reject(new Error(`无法连接 ${url}: ${e.message}`));
      };
      ws.once('open', onOpen);
      ws.once('error', onError);
    });
  }

  constructor(ws: WebSocket, options: VtsClientOptions) {
    this.ws = ws;
    this.options = options;
    this.token = options.token;

    ws.on('message', (raw: WebSocket.RawData) => this.onMessage(raw));
    ws.on('close', (code: number) => {
      logDebug(`连接关闭 (${code})`);
      this.rejectAll(new Error(`连接已断开 (${code})`));
    });
    ws.on('error', (e: Error) => logErr(`连接错误: ${e.message}`));
  }

  /** 当前使用的 token（认证成功后即为有效 token） */
  get currentToken(): string | undefined {
    return this.token;
  }

  async authenticate(): Promise<void> {
    const { pluginName, pluginDeveloper } = this.options;

    if (this.token) {
      const resp = await this.send('AuthenticationRequest', {
        pluginName,
        pluginDeveloper,
        authenticationToken: this.token,
      });
      if (resp.authenticated) {
        logDebug('认证成功');
        return;
      }
      logWarn(`已保存的 token 被拒绝${resp.reason ? ` (${resp.reason})` : ''}，重新申请`);
    }

    logInfo('正在申请插件权限，请在 VTube Studio 的弹窗中点击允许。');
    const { authenticationToken } = await this.send(
      'AuthenticationTokenRequest',
      { pluginName, pluginDeveloper },
      this.options.tokenTimeoutMs ?? TOKEN_REQUEST_TIMEOUT_MS,
    );
    this.token = authenticationToken;
    await this.options.onNewToken?.(authenticationToken);

    const resp = await this.send('AuthenticationRequest', {
      pluginName,
      pluginDeveloper,
      authenticationToken,
    });
    if (!resp.authenticated) {
      throw new AuthenticationError(`认证失败: ${resp.reason || '新 token 被拒绝'}`);
    }
    logDebug('认证成功');
  }

  async send<K extends RequestType>(type: K, data: RequestPayloads[K], timeoutMs?: number): Promise<ResponseData<K>> {
    const raw = await this.request(type, data, timeoutMs ?? this.options.timeoutMs ?? REQUEST_TIMEOUT_MS);
    return parseResponse(RESPONSE_SCHEMAS[type], type, raw);
  }

  close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise((resolve) => {
      this.ws.once('close', () => resolve());
      if (this.ws.readyState !== WebSocket.CLOSING) this.ws.close(1000);
    });
  }

  private request(type: RequestType, data: unknown, timeoutMs: number): Promise<unknown> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error(`连接未打开，无法发送 ${type}`));
    }

    return new Promise((resolve, reject) => {
      const requestID = String(this.nextId++);
      const timer = setTimeout(() => {
        if (this.pending.delete(requestID)) {
          reject(new Error(`${type} 请求超时 (${timeoutMs}ms)`));
        }
      }, timeoutMs);
      this.pending.set(requestID, { type, expected: responseTypeOf(type), resolve, reject, timer });

      const req: ApiRequest = { apiName: API_NAME, apiVersion: API_VERSION, requestID, messageType: type, data };
      logDebug(`→ ${type} #${requestID}`);
      this.ws.send(JSON.stringify(req), (err) => {
        if (err && this.pending.delete(requestID)) {
          clearTimeout(timer);
          reject(err);
        }
      });
    });
  }

  private onMessage(raw: WebSocket.RawData): void {
    let json: unknown;
    try {
      json = JSON.parse(raw.toString());
    } catch {
      logDebug('忽略非 JSON 消息');
      return;
    }

    const parsed = ApiEnvelopeSchema.safeParse(json);
    if (!parsed.success) {
      logDebug('忽略无法识别的消息');
      return;
    }

    const msg = parsed.data;
    const p = this.pending.get(msg.requestID);
    if (!p) {
      // 事件推送等与请求无关的消息
      logDebug(`忽略 ${msg.messageType} #${msg.requestID}`);
      return;
    }
    logDebug(`← ${msg.messageType} #${msg.requestID}`);
    this.pending.delete(msg.requestID);
    clearTimeout(p.timer);

    if (msg.messageType === 'APIError') {
      const err = ApiErrorDataSchema.safeParse(msg.data);
      p.reject(err.success
        ? new ApiError(err.data.errorID, err.data.message, p.type)
        : new Error(`${p.type} 返回了无法解析的 APIError`));
      return;
    }
    if (msg.messageType !== p.expected) {
      p.reject(new Error(`${p.type} 收到意外的响应类型 ${msg.messageType}`));
      return;
    }
    p.resolve(msg.data);
  }

  private rejectAll(e: Error): void {
    for (const p of this.pending.values()) {
      clearTimeout(p.timer);
      p.reject(e);
    }
    this.pending.clear();
  }
}
