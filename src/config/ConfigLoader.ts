import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import type { NoteLinkConfig, PartialConfig } from './types.js';
import { ConfigError } from '../domain/errors/DomainErrors.js';
import { expandHome } from '../shared/PathUtils.js';

export type { NoteLinkConfig, PartialConfig } from './types.js';

const noteTypeSchema = z.enum(['daily', 'quick', 'project', 'person', 'reading', 'generic']);

const configSchema = z.object({
  version: z.number().int(),
  notes: z.object({
    root: z.string().min(1, 'notes.root must not be empty'),
    extensions: z
      .array(z.string().regex(/^[a-z0-9]+$/, 'extensions must be lower-case without dots'))
      .min(1, 'extensions must not be empty'),
    archiveDir: z.string().min(1),
    indexFileName: z.string().min(1),
    noteTypes: z.record(noteTypeSchema),
  }),
  scan: z.object({
    junkPatterns: z.array(z.string()),
    scanner: z.enum(['walk', 'fd']),
    searcher: z.enum(['scan', 'rg']),
  }),
  cache: z.object({
    ttlSeconds: z.number().int('ttlSeconds must be a non-negative integer').min(0, 'ttlSeconds must be a non-negative integer'),
  }),
  rename: z.object({
    backupByDefault: z.boolean(),
    rollbackOnFailure: z.boolean(),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 深層合併：partial 覆蓋 base，陣列整個取代 */
function deepMerge(base: unknown, partial: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(partial)) {
    return partial === undefined ? base : partial;
  }
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(partial)) {
    if (val === undefined) continue;
    result[key] = isPlainObject(val) ? deepMerge(result[key], val) : val;
  }
  return result;
}

/** 環境變數覆蓋：NOTELINK_ROOT → notes.root，NOTELINK_LOG_LEVEL → logging.level */
function applyEnvOverrides(raw: unknown): unknown {
  const env: Record<string, unknown> = {};
  if (process.env.NOTELINK_ROOT) {
    env.notes = { root: process.env.NOTELINK_ROOT };
  }
  if (process.env.NOTELINK_LOG_LEVEL) {
    env.logging = { level: process.env.NOTELINK_LOG_LEVEL };
  }
  return deepMerge(raw, env);
}

/** 讀取設定檔；JSON 格式錯誤時拋出 ConfigError */
function readConfigFile(configPath: string): unknown {
  if (!fs.existsSync(configPath)) return {};
  const raw = fs.readFileSync(configPath, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${CONFIG_FILE_NAME} is not valid JSON`, { cause: err });
  }
}

/** 驗證設定值的合法性 */
function validate(raw: unknown): NoteLinkConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.join('.');
    throw new ConfigError(`${issue.message}${where ? ` (at ${where})` : ''}`);
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 .notelink.json（若存在）並合併到預設值上
 * @param baseDir - 設定檔所在目錄，相對的 notes.root 以此為基準
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(baseDir: string, overrides?: PartialConfig): NoteLinkConfig {
  const fileConfig = readConfigFile(path.join(baseDir, CONFIG_FILE_NAME));

  // 合併順序：defaults < file config < overrides < 環境變數
  let merged = deepMerge(DEFAULT_CONFIG, fileConfig);
  if (overrides) {
    merged = deepMerge(merged, overrides);
  }
  merged = applyEnvOverrides(merged);

  const config = validate(merged);
  config.notes.root = path.resolve(baseDir, expandHome(config.notes.root));
  return config;
}
