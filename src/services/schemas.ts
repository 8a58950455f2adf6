/**
 * 响应数据校验
 *
 * 只对 CLI 需要读取字段的响应做结构约束，其余响应原样打印。
 * 所有对象都 passthrough，保留未声明的字段。
 */

import { z } from 'zod';
import type { RequestType } from '../types';

export const ApiEnvelopeSchema = z.object({
  apiName: z.string().optional(),
  apiVersion: z.string().optional(),
  timestamp: z.number().optional(),
  requestID: z.string(),
  messageType: z.string(),
  data: z.unknown(),
});

export const ApiErrorDataSchema = z.object({
  errorID: z.number(),
  message: z.string(),
}).passthrough();

const ApiDataSchema = z.record(z.string(), z.unknown());

const AuthenticationTokenResponseSchema = z.object({
  authenticationToken: z.string().min(1),
}).passthrough();

const AuthenticationResponseSchema = z.object({
  authenticated: z.boolean(),
  reason: z.string().optional(),
}).passthrough();

const HotkeysInCurrentModelResponseSchema = z.object({
  availableHotkeys: z.array(z.object({
    name: z.string(),
    hotkeyID: z.string(),
  }).passthrough()),
}).passthrough();

const AvailableModelsResponseSchema = z.object({
  availableModels: z.array(z.object({
    modelName: z.string(),
    modelID: z.string(),
  }).passthrough()),
}).passthrough();

const ColorTintResponseSchema = z.object({
  matchedArtMeshes: z.number(),
}).passthrough();

export const RESPONSE_SCHEMAS = {
  APIStateRequest: ApiDataSchema,
  AuthenticationTokenRequest: AuthenticationTokenResponseSchema,
  AuthenticationRequest: AuthenticationResponseSchema,
  StatisticsRequest: ApiDataSchema,
  VTSFolderInfoRequest: ApiDataSchema,
  SceneColorOverlayInfoRequest: ApiDataSchema,
  FaceFoundRequest: ApiDataSchema,
  ParameterValueRequest: ApiDataSchema,
  ParameterCreationRequest: ApiDataSchema,
  ParameterDeletionRequest: ApiDataSchema,
  InjectParameterDataRequest: ApiDataSchema,
  InputParameterListRequest: ApiDataSchema,
  Live2DParameterListRequest: ApiDataSchema,
  HotkeysInCurrentModelRequest: HotkeysInCurrentModelResponseSchema,
  HotkeyTriggerRequest: ApiDataSchema,
  ArtMeshListRequest: ApiDataSchema,
  ColorTintRequest: ColorTintResponseSchema,
  ArtMeshSelectionRequest: ApiDataSchema,
  AvailableModelsRequest: AvailableModelsResponseSchema,
  CurrentModelRequest: ApiDataSchema,
  ModelLoadRequest: ApiDataSchema,
  MoveModelRequest: ApiDataSchema,
  ExpressionStateRequest: ApiDataSchema,
  ExpressionActivationRequest: ApiDataSchema,
  NDIConfigRequest: ApiDataSchema,
  GetCurrentModelPhysicsRequest: ApiDataSchema,
  SetCurrentModelPhysicsRequest: ApiDataSchema,
  ItemListRequest: ApiDataSchema,
  ItemLoadRequest: ApiDataSchema,
  ItemUnloadRequest: ApiDataSchema,
  ItemMoveRequest: ApiDataSchema,
  ItemAnimationControlRequest: ApiDataSchema,
} satisfies Record<RequestType, z.ZodTypeAny>;

export type ResponseData<K extends RequestType> = z.infer<(typeof RESPONSE_SCHEMAS)[K]>;

/** `FooRequest` → `FooResponse` */
export function responseTypeOf(type: RequestType): string {
  return type.replace(/Request$/, 'Response');
}

export function parseResponse<S extends z.ZodTypeAny>(schema: S, type: string, data: unknown): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new Error(`${type} 的响应格式不符合预期: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  return result.data;
}
