import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { configSchema, type Config } from './schema.js';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// 環境変数をオブジェクトにマッピング
function resolveEnvVariables(obj: unknown): unknown {
  if (typeof obj === 'string') {
    // ${ENV_VAR} 形式の環境変数を解決
    return obj.replace(/\$\{(\w+)\}/g, (_, envVar: string) => {
      return process.env[envVar] ?? '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVariables);
  }
  if (isRecord(obj)) {
    const result: RawConfig = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVariables(value);
    }
    return result;
  }
  return obj;
}

// セクションを取得（存在しなければ作成）
function section(config: RawConfig, key: string): RawConfig {
  const current = config[key];
  if (isRecord(current)) {
    return current;
  }
  const created: RawConfig = {};
  config[key] = created;
  return created;
}

// 設定ファイルを読み込む
export function loadConfig(configPath?: string): Config {
  const defaultConfigPath = path.resolve(process.cwd(), 'config/default.yaml');
  const filePath = configPath ?? defaultConfigPath;

  let rawConfig: unknown = {};

  if (fs.existsSync(filePath)) {
    const content = fs.readFileSync(filePath, 'utf-8');
    rawConfig = parseYaml(content);
  } else if (configPath) {
    // 明示的に指定されたファイルが存在しない場合はエラー
    throw new Error(`設定ファイルが見つかりません: ${configPath}`);
  }

  // 環境変数を解決
  const resolved = resolveEnvVariables(rawConfig);
  const config: RawConfig = isRecord(resolved) ? resolved : {};

  // 環境変数からのオーバーライド
  if (process.env.API_BASE_URL) {
    section(config, 'api').baseUrl = process.env.API_BASE_URL;
  }
  if (process.env.DATA_DIR) {
    section(config, 'storage').dataDir = process.env.DATA_DIR;
  }
  if (process.env.LOG_LEVEL) {
    section(config, 'logging').level = process.env.LOG_LEVEL;
  }

  // バリデーションとデフォルト値の適用
  return configSchema.parse(config);
}

export {
  configSchema,
  type Config,
  type ApiConfig,
  type CategoryMergePolicy,
} from './schema.js';
