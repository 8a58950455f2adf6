/** 配置文件内容 */
export interface CliConfig {
  host: string;
  port: number;
  /** VTube Studio 颁发的插件 token，首次授权后写回 */
  token?: string;
  pluginName: string;
  pluginDeveloper: string;
}

// ======================== 协议信封 ========================

/** API 请求 */
export interface ApiRequest<T = unknown> {
  apiName: string;
  apiVersion: string;
  requestID: string;
  messageType: string;
  data?: T;
}

/** API 响应（messageType 为 `<Name>Response` 或 `APIError`） */
export interface ApiResponse<T = unknown> {
  apiName: string;
  apiVersion: string;
  timestamp: number;
  requestID: string;
  messageType: string;
  data: T;
}

// ======================== 请求数据 ========================

export type EmptyPayload = Record<string, never>;

export interface AuthenticationTokenPayload {
  pluginName: string;
  pluginDeveloper: string;
}

export interface AuthenticationPayload {
  pluginName: string;
  pluginDeveloper: string;
  authenticationToken: string;
}

export interface ParameterCreationPayload {
  parameterName: string;
  explanation?: string;
  min: number;
  max: number;
  defaultValue: number;
}

export interface ParameterValue {
  id: string;
  value: number;
  weight?: number;
}

export interface InjectParameterDataPayload {
  faceFound: boolean;
  mode: 'set' | 'add';
  parameterValues: ParameterValue[];
}

export interface ColorTint {
  colorR: number;
  colorG: number;
  colorB: number;
  colorA: number;
  mixWithSceneLightingColor?: number;
  jeb_: boolean;
}

export interface ArtMeshMatcher {
  tintAll: boolean;
  artMeshNumber: number[];
  nameExact: string[];
  nameContains: string[];
  tagExact: string[];
  tagContains: string[];
}

export interface ArtMeshSelectionPayload {
  textOverride?: string;
  helpOverride?: string;
  requestedArtMeshCount: number;
  activeArtMeshes: string[];
}

export interface MoveModelPayload {
  timeInSeconds: number;
  valuesAreRelativeToModel: boolean;
  positionX?: number;
  positionY?: number;
  rotation?: number;
  size?: number;
}

export interface NdiConfigPayload {
  setNewConfig: boolean;
  ndiActive?: boolean;
  useNDI5?: boolean;
  useCustomResolution?: boolean;
  customWidthNDI?: number;
  customHeightNDI?: number;
}

export interface PhysicsOverride {
  id: string;
  value: number;
  setBaseValue: boolean;
  overrideSeconds: number;
}

export interface SetPhysicsPayload {
  strengthOverrides: PhysicsOverride[];
  windOverrides: PhysicsOverride[];
}

export interface ItemListPayload {
  includeAvailableSpots: boolean;
  includeItemInstancesInScene: boolean;
  includeAvailableItemFiles: boolean;
  onlyItemsWithFileName?: string;
  onlyItemsWithInstanceID?: string;
}

export interface ItemLoadPayload {
  fileName: string;
  positionX: number;
  positionY: number;
  size: number;
  rotation: number;
  fadeTime: number;
  order: number;
  failIfOrderTaken: boolean;
  smoothing: number;
  censored: boolean;
  flipped: boolean;
  locked: boolean;
  unloadWhenPluginDisconnects: boolean;
}

export interface ItemUnloadPayload {
  unloadAllInScene: boolean;
  unloadAllLoadedByThisPlugin: boolean;
  allowUnloadingItemsLoadedByUserOrOtherPlugins: boolean;
  instanceIDs: string[];
  fileNames: string[];
}

export type FadeMode = 'linear' | 'easeIn' | 'easeOut' | 'easeBoth' | 'overshoot' | 'zip';

export interface ItemToMove {
  itemInstanceID: string;
  timeInSeconds: number;
  fadeMode: FadeMode;
  positionX?: number;
  positionY?: number;
  size?: number;
  rotation?: number;
  order?: number;
  setFlip: boolean;
  flip: boolean;
  userCanStop: boolean;
}

export interface ItemAnimationControlPayload {
  itemInstanceID: string;
  framerate?: number;
  frame?: number;
  brightness?: number;
  opacity?: number;
  setAutoStopFrames: boolean;
  autoStopFrames: number[];
  setAnimationPlayState: boolean;
  animationPlayState: boolean;
}

/** messageType → 请求数据 */
export interface RequestPayloads {
  APIStateRequest: EmptyPayload;
  AuthenticationTokenRequest: AuthenticationTokenPayload;
  AuthenticationRequest: AuthenticationPayload;
  StatisticsRequest: EmptyPayload;
  VTSFolderInfoRequest: EmptyPayload;
  SceneColorOverlayInfoRequest: EmptyPayload;
  FaceFoundRequest: EmptyPayload;
  ParameterValueRequest: { name: string };
  ParameterCreationRequest: ParameterCreationPayload;
  ParameterDeletionRequest: { parameterName: string };
  InjectParameterDataRequest: InjectParameterDataPayload;
  InputParameterListRequest: EmptyPayload;
  Live2DParameterListRequest: EmptyPayload;
  HotkeysInCurrentModelRequest: { modelID?: string; live2DItemFileName?: string };
  HotkeyTriggerRequest: { hotkeyID: string; itemInstanceID?: string };
  ArtMeshListRequest: EmptyPayload;
  ColorTintRequest: { colorTint: ColorTint; artMeshMatcher: ArtMeshMatcher };
  ArtMeshSelectionRequest: ArtMeshSelectionPayload;
  AvailableModelsRequest: EmptyPayload;
  CurrentModelRequest: EmptyPayload;
  ModelLoadRequest: { modelID: string };
  MoveModelRequest: MoveModelPayload;
  ExpressionStateRequest: { details: boolean; expressionFile?: string };
  ExpressionActivationRequest: { expressionFile: string; active: boolean };
  NDIConfigRequest: NdiConfigPayload;
  GetCurrentModelPhysicsRequest: EmptyPayload;
  SetCurrentModelPhysicsRequest: SetPhysicsPayload;
  ItemListRequest: ItemListPayload;
  ItemLoadRequest: ItemLoadPayload;
  ItemUnloadRequest: ItemUnloadPayload;
  ItemMoveRequest: { itemsToMove: ItemToMove[] };
  ItemAnimationControlRequest: ItemAnimationControlPayload;
}

export type RequestType = keyof RequestPayloads;
