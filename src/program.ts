/**
 * 命令行定义
 *
 * 每个命令：读取配置 → 连接并认证 → 发送 1~2 个请求 → 打印 JSON → 断开。
 * 外部依赖（连接、输出、计时）通过 ProgramDeps 注入，测试时替换。
 */

import { Argument, Command, InvalidArgumentError, Option } from 'commander';
import { DEFAULT_CONFIG } from './config';
import { ConfigStore, resolveConfigPath, validateConfig } from './core/config-store';
import { errorMessage } from './core/errors';
import { logOk, setVerbose } from './core/logger';
import { inRange, parseBoolean, parseDuration, parseHexColor, parseInteger, parseNumber } from './core/parse';
import { openSession, type SessionFactory } from './services/session';
import type { CommandContext } from './commands/context';
import { queryInfo } from './commands/info';
import {
  createParam, deleteParam, getParam, injectParam, listInputParams, listLive2DParams,
  type CreateParamOptions, type InjectParamOptions,
} from './commands/params';
import { listHotkeys, triggerHotkey, type ListHotkeysOptions } from './commands/hotkeys';
import { listArtMeshes, selectArtMeshes, tintArtMeshes, type SelectOptions, type TintOptions } from './commands/artmeshes';
import { currentModel, listModels, loadModel, moveModel, type MoveModelOptions } from './commands/models';
import { listExpressions, setExpressionActive } from './commands/expressions';
import { getNdiConfig, setNdiConfig, type NdiSetOptions } from './commands/ndi';
import { PHYSICS_KINDS, getPhysics, setPhysicsBase, setPhysicsMultiplier, type PhysicsKind } from './commands/physics';
import {
  FADE_MODES, ITEM_LOAD_DEFAULTS, animateItem, listItems, loadItem, moveItem, unloadItems,
  type AnimateItemOptions, type ListItemsOptions, type LoadItemOptions, type MoveItemOptions, type UnloadItemsOptions,
} from './commands/items';
import { initConfig } from './commands/config';

export const VERSION = '0.1.0';

export interface ProgramDeps {
  openSession: SessionFactory;
  env: NodeJS.ProcessEnv;
  write: (text: string) => void;
  writeErr: (text: string) => void;
  sleep: (ms: number) => Promise<void>;
}

export const defaultDeps: ProgramDeps = {
  openSession,
  env: process.env,
  write: (text) => { process.stdout.write(text); },
  writeErr: (text) => { process.stderr.write(text); },
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

interface GlobalOptions {
  configFile?: string;
  compact?: boolean;
  verbose?: boolean;
}

interface InitOptions {
  host: string;
  port: number;
  token?: string;
  pluginName: string;
  pluginDeveloper: string;
}

type TintCliOptions = Omit<TintOptions, 'rainbow'> & { rainbow?: boolean; jeb_?: boolean };

// ======================== 参数解析 ========================

/** 把解析错误转成 commander 的用法错误 */
function arg<T>(parse: (value: string) => T) {
  return (value: string): T => {
    try {
      return parse(value);
    } catch (e) {
      throw new InvalidArgumentError(errorMessage(e));
    }
  };
}

/** 可重复的选项 */
function list<T>(parse: (value: string) => T) {
  const one = arg(parse);
  return (value: string, previous: T[] = []): T[] => [...previous, one(value)];
}

const durationOption = (description: string, fallback: string) =>
  new Option('--duration <duration>', description)
    .argParser(arg(parseDuration))
    .default(parseDuration(fallback), fallback);

// ======================== 程序 ========================

export function createProgram(deps: ProgramDeps = defaultDeps): Command {
  const program = new Command();

  program
    .name('vts')
    .description('VTube Studio 插件 API 命令行客户端')
    .version(VERSION)
    .option('--config-file <path>', '配置文件路径（也可用环境变量 VTS_CONFIG）')
    .option('--compact', '输出单行 JSON')
    .option('-v, --verbose', '详细日志')
    .exitOverride()
    .configureOutput({ writeOut: deps.write, writeErr: deps.writeErr })
    .hook('preAction', () => {
      setVerbose(program.opts<GlobalOptions>().verbose ?? false);
    });

  const globals = () => program.opts<GlobalOptions>();
  const configStore = () => new ConfigStore(resolveConfigPath(globals().configFile, deps.env));

  const print = (value: unknown) => {
    deps.write(JSON.stringify(value, null, globals().compact ? undefined : 2) + '\n');
  };

  async function withSession(fn: (ctx: CommandContext) => Promise<void>): Promise<void> {
    const store = configStore();
    const config = store.load();
    const session = await deps.openSession(config, {
      onNewToken: (token) => {
        store.save({ ...config, token });
        logOk(`新 token 已写入 ${store.configPath}`);
      },
    });
    try {
      await fn({ client: session, print, sleep: deps.sleep });
    } finally {
      await session.close();
    }
  }

  // ==================== config ====================

  const config = program.command('config').description('本程序的配置管理');

  config
    .command('init')
    .description('向 VTube Studio 申请插件权限并生成配置文件')
    .option('--host <host>', 'VTube Studio 地址', DEFAULT_CONFIG.host)
    .option('-p, --port <port>', 'VTube Studio API 端口', arg(parseInteger), DEFAULT_CONFIG.port)
    .option('--token <token>', '已有的插件 token（也可用环境变量 VTS_TOKEN）')
    .option('--plugin-name <name>', '插件名', DEFAULT_CONFIG.pluginName)
    .option('--plugin-developer <name>', '插件开发者', DEFAULT_CONFIG.pluginDeveloper)
    .action(async (opts: InitOptions) => {
      const cfg = validateConfig({
        host: opts.host,
        port: opts.port,
        token: opts.token ?? (deps.env.VTS_TOKEN || undefined),
        pluginName: opts.pluginName,
        pluginDeveloper: opts.pluginDeveloper,
      }, '命令行参数');
      await initConfig(configStore(), cfg, deps.openSession);
    });

  config
    .command('show')
    .description('显示配置文件内容')
    .action(() => {
      print(configStore().load());
    });

  config
    .command('path')
    .description('显示配置文件路径')
    .action(() => {
      deps.write(configStore().configPath + '\n');
    });

  // ==================== 查询 ====================

  program.command('state').description('API 状态')
    .action(() => withSession(ctx => queryInfo(ctx, 'APIStateRequest')));
  program.command('stats').description('VTube Studio 统计信息')
    .action(() => withSession(ctx => queryInfo(ctx, 'StatisticsRequest')));
  program.command('folders').description('VTube Studio 目录')
    .action(() => withSession(ctx => queryInfo(ctx, 'VTSFolderInfoRequest')));
  program.command('scene-colors').description('场景颜色叠加信息')
    .action(() => withSession(ctx => queryInfo(ctx, 'SceneColorOverlayInfoRequest')));
  program.command('face-found').description('追踪器当前是否检测到脸部')
    .action(() => withSession(ctx => queryInfo(ctx, 'FaceFoundRequest')));

  // ==================== params ====================

  const params = program.command('params').alias('param').description('参数');

  params.command('get').description('获取参数当前值')
    .argument('<name>', '参数名')
    .action((name: string) => withSession(ctx => getParam(ctx, name)));

  params.command('create').description('创建自定义参数')
    .argument('<name>', '参数名')
    .option('--default <value>', '默认值', arg(parseNumber), 0)
    .option('--min <value>', '最小值', arg(parseNumber), 0)
    .option('--max <value>', '最大值', arg(parseNumber), 100)
    .option('--explanation <text>', '说明')
    .action((name: string, opts: CreateParamOptions) => withSession(ctx => createParam(ctx, name, opts)));

  params.command('inject').description('临时设置参数值（VTube Studio 会在 1 秒未更新后恢复）')
    .argument('<id>', '参数 ID')
    .argument('<value>', '值', arg(parseNumber))
    .option('--weight <weight>', '权重 0~1', arg(parseNumber))
    .option('--face-found', '同时标记为检测到脸部')
    .option('--add', '叠加到当前值而不是覆盖')
    .action((id: string, value: number, opts: InjectParamOptions) => withSession(ctx => injectParam(ctx, id, value, opts)));

  params.command('delete').description('删除自定义参数')
    .argument('<name>', '参数名')
    .action((name: string) => withSession(ctx => deleteParam(ctx, name)));

  params.command('list-inputs').description('当前模型的全部输入参数')
    .action(() => withSession(ctx => listInputParams(ctx)));

  params.command('list-live2d').description('当前模型的全部 Live2D 参数')
    .action(() => withSession(ctx => listLive2DParams(ctx)));

  // ==================== hotkeys ====================

  const hotkeys = program.command('hotkeys').alias('hotkey').description('热键');

  hotkeys.command('list').description('列出模型的热键')
    .option('--model-id <id>', '模型 ID（默认当前模型）')
    .option('--live2d-file <file>', 'Live2D 道具文件名')
    .action((opts: ListHotkeysOptions) => withSession(ctx => listHotkeys(ctx, opts)));

  hotkeys.command('trigger').description('按 ID 或名称触发热键')
    .argument('[id]', '热键 ID')
    .option('--name <name>', '触发第一个同名热键')
    .option('--item <instanceId>', 'Live2D 道具实例 ID')
    .action((id: string | undefined, opts: { name?: string; item?: string }) =>
      withSession(ctx => triggerHotkey(ctx, { id, name: opts.name, item: opts.item })));

  // ==================== artmeshes ====================

  const artmeshes = program.command('artmeshes').alias('artmesh').description('ArtMesh');

  artmeshes.command('list').description('列出当前模型的 ArtMesh')
    .action(() => withSession(ctx => listArtMeshes(ctx)));

  artmeshes.command('tint').description('给匹配的 ArtMesh 染色')
    .addOption(new Option('--duration <duration>', '染色保持时长，如 5s、1m30s（断开后 VTube Studio 会清除染色）')
      .argParser(arg(parseDuration))
      .makeOptionMandatory())
    .option('--color <hex>', '十六进制颜色，可带 alpha', arg(parseHexColor), parseHexColor('#ffffff'))
    .option('--rainbow', '彩虹模式 (jeb_)')
    .addOption(new Option('--jeb_').hideHelp())
    .option('--mix-scene-lighting <value>', '与场景光照颜色混合 0~1', arg(parseNumber))
    .option('--all', '匹配全部 ArtMesh')
    .option('--art-mesh-number <n>', '按序号匹配（可重复）', list(parseInteger))
    .option('--name-exact <name>', '名称完全相同（可重复）', list(String))
    .option('--name-contains <text>', '名称包含（可重复）', list(String))
    .option('--tag-exact <tag>', '标签完全相同（可重复）', list(String))
    .option('--tag-contains <text>', '标签包含（可重复）', list(String))
    .action(({ jeb_, rainbow, ...opts }: TintCliOptions) =>
      withSession(ctx => tintArtMeshes(ctx, { ...opts, rainbow: rainbow || jeb_ })));

  artmeshes.command('select').description('弹出 ArtMesh 选择框')
    .option('--set-text <text>', '覆盖提示文字')
    .option('--set-help <text>', '覆盖帮助文字')
    .option('--count <n>', '需要选择的数量', arg(parseInteger))
    .option('--preselect <id>', '预选的 ArtMesh（可重复）', list(String))
    .action((opts: SelectOptions) => withSession(ctx => selectArtMeshes(ctx, opts)));

  // ==================== models ====================

  const models = program.command('models').alias('model').description('模型');

  models.command('list').description('列出可用模型')
    .action(() => withSession(ctx => listModels(ctx)));

  models.command('current').description('当前模型')
    .action(() => withSession(ctx => currentModel(ctx)));

  models.command('load').description('按 ID 或名称加载模型')
    .argument('[id]', '模型 ID')
    .option('--name <name>', '加载第一个同名模型')
    .action((id: string | undefined, opts: { name?: string }) =>
      withSession(ctx => loadModel(ctx, { id, name: opts.name })));

  models.command('move').description('移动当前模型')
    .addOption(durationOption('动画时长', '0s'))
    .option('--relative', '相对当前位置移动')
    .option('--x <x>', '水平位置，-1 左边缘，1 右边缘', arg(parseNumber))
    .option('--y <y>', '垂直位置，-1 下边缘，1 上边缘', arg(parseNumber))
    .option('--rotation <deg>', '旋转角度 -360~360', arg(parseNumber))
    .option('--size <size>', '大小 -100~100', arg(parseNumber))
    .action((opts: MoveModelOptions) => withSession(ctx => moveModel(ctx, opts)));

  // ==================== expressions ====================

  const expressions = program.command('expressions').alias('expression').description('表情');

  expressions.command('list').description('列出表情状态')
    .argument('[file]', '只返回该表情文件的状态')
    .option('--details', '返回更多细节')
    .action((file: string | undefined, opts: { details?: boolean }) =>
      withSession(ctx => listExpressions(ctx, file, opts.details ?? false)));

  expressions.command('activate').description('激活表情')
    .argument('<file>', '表情文件')
    .action((file: string) => withSession(ctx => setExpressionActive(ctx, file, true)));

  expressions.command('deactivate').description('取消表情')
    .argument('<file>', '表情文件')
    .action((file: string) => withSession(ctx => setExpressionActive(ctx, file, false)));

  // ==================== ndi ====================

  const ndi = program.command('ndi').description('NDI 设置');

  ndi.command('get-config').description('显示当前 NDI 设置')
    .action(() => withSession(ctx => getNdiConfig(ctx)));

  ndi.command('set-config').description('修改 NDI 设置')
    .option('--active <bool>', '是否启用 NDI', arg(parseBoolean))
    .option('--use-ndi5 <bool>', '是否使用 NDI 5', arg(parseBoolean))
    .option('--use-custom-resolution <bool>', '是否使用自定义分辨率', arg(parseBoolean))
    .option('--width <px>', '自定义宽度（16 的倍数，256~8192）', arg(parseInteger))
    .option('--height <px>', '自定义高度（8 的倍数，256~8192）', arg(parseInteger))
    .action((opts: NdiSetOptions) => withSession(ctx => setNdiConfig(ctx, opts)));

  // ==================== physics ====================

  const physics = program.command('physics').description('物理');

  physics.command('get').description('当前模型的物理设置')
    .action(() => withSession(ctx => getPhysics(ctx)));

  const physicsSet = physics.command('set').description('临时覆盖物理设置');
  const kindArgument = () => new Argument('<kind>', '类型').choices(PHYSICS_KINDS);

  physicsSet.command('base').description('覆盖基础值')
    .addArgument(kindArgument())
    .argument('<value>', '基础值 0~100', arg(inRange(parseInteger, 0, 100)))
    .addOption(durationOption('覆盖时长 0.5s~5s', '500ms'))
    .action((kind: PhysicsKind, value: number, opts: { duration: number }) =>
      withSession(ctx => setPhysicsBase(ctx, { kind, value, duration: opts.duration })));

  physicsSet.command('multiplier').description('覆盖物理组倍率')
    .addArgument(kindArgument())
    .argument('<value>', '倍率 0~2', arg(inRange(parseNumber, 0, 2)))
    .requiredOption('--id <groupId>', '物理组 ID')
    .addOption(durationOption('覆盖时长 0.5s~5s', '500ms'))
    .action((kind: PhysicsKind, value: number, opts: { id: string; duration: number }) =>
      withSession(ctx => setPhysicsMultiplier(ctx, { kind, value, id: opts.id, duration: opts.duration })));

  // ==================== items ====================

  const items = program.command('items').alias('item').description('道具');

  items.command('list').description('列出道具')
    .option('--spots', '包含可用的位置')
    .option('--instances', '包含场景中的道具实例')
    .option('--files', '包含可用的道具文件')
    .option('--with-file-name <file>', '只返回该文件的道具')
    .option('--with-instance-id <id>', '只返回该实例')
    .action((opts: ListItemsOptions) => withSession(ctx => listItems(ctx, opts)));

  items.command('load').description('加载道具到场景')
    .argument('<file>', '道具文件名')
    .option('--x <x>', '水平位置', arg(parseNumber), ITEM_LOAD_DEFAULTS.x)
    .option('--y <y>', '垂直位置', arg(parseNumber), ITEM_LOAD_DEFAULTS.y)
    .option('--size <size>', '大小 0~1', arg(parseNumber), ITEM_LOAD_DEFAULTS.size)
    .option('--rotation <deg>', '旋转角度', arg(parseNumber), ITEM_LOAD_DEFAULTS.rotation)
    .option('--fade-time <seconds>', '淡入时长 0~2 秒', arg(parseNumber), ITEM_LOAD_DEFAULTS.fadeTime)
    .option('--order <n>', '层级', arg(parseInteger), ITEM_LOAD_DEFAULTS.order)
    .option('--fail-if-order-taken', '层级已被占用时失败')
    .option('--smoothing <value>', '平滑 0~1', arg(parseNumber), ITEM_LOAD_DEFAULTS.smoothing)
    .option('--censored', '打码')
    .option('--flipped', '翻转')
    .option('--locked', '锁定')
    .action((file: string, opts: LoadItemOptions) => withSession(ctx => loadItem(ctx, file, opts)));

  items.command('unload').description('从场景卸载道具')
    .option('--all', '卸载场景中全部道具')
    .option('--from-this-plugin', '卸载本插件加载的全部道具')
    .option('--from-other-plugins', '允许卸载用户或其他插件加载的道具')
    .option('--id <instanceId>', '道具实例 ID（可重复）', list(String))
    .option('--file <file>', '道具文件名（可重复）', list(String))
    .action((opts: UnloadItemsOptions) => withSession(ctx => unloadItems(ctx, opts)));

  items.command('move').description('移动道具')
    .argument('<id>', '道具实例 ID')
    .addOption(durationOption('动画时长', '0s'))
    .addOption(new Option('--fade-mode <mode>', '缓动方式').choices(FADE_MODES).default('linear'))
    .option('--x <x>', '水平位置', arg(parseNumber))
    .option('--y <y>', '垂直位置', arg(parseNumber))
    .option('--size <size>', '大小', arg(parseNumber))
    .option('--rotation <deg>', '旋转角度', arg(parseNumber))
    .option('--order <n>', '层级', arg(parseInteger))
    .option('--set-flip', '应用 --flip')
    .option('--flip', '翻转')
    .option('--user-can-stop', '允许用户拖动中断')
    .action((id: string, opts: MoveItemOptions) => withSession(ctx => moveItem(ctx, id, opts)));

  items.command('animation').description('控制道具动画')
    .argument('<id>', '道具实例 ID')
    .option('--framerate <fps>', '帧率', arg(parseNumber))
    .option('--frame <n>', '跳到指定帧', arg(parseInteger))
    .option('--brightness <value>', '亮度 0~1', arg(parseNumber))
    .option('--opacity <value>', '不透明度 0~1', arg(parseNumber))
    .option('--stop-frame <n>', '自动停止帧（可重复）', list(parseInteger))
    .option('--reset-stop-frames', '清除自动停止帧')
    .addOption(new Option('--play', '播放').conflicts('stop'))
    .addOption(new Option('--stop', '停止').conflicts('play'))
    .action((id: string, opts: AnimateItemOptions) => withSession(ctx => animateItem(ctx, id, opts)));

  return program;
}
