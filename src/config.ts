import fs from 'node:fs/promises';
import path from 'node:path';

import type { ColorMode, ModelEntry, WardenConfig } from './types.js';
import { configDir, isRecord } from './utils.js';

const DEFAULTS: WardenConfig = {
  current_model: 'local',
  models: {
    local: {
      name: 'local-model',
      base_url: 'http://localhost:1234/v1',
    },
  },
  approved_folders: [],
  max_tokens: 8000,
  context_limit: 32000,
  fallback_max_tokens: 2000,
  trim_threshold: 25000,
  keep_recent: 6,
  max_iterations: 50,
  stream: true,
  exec_timeout: 30,
  max_output_bytes: 65536,
  response_timeout: 600,
  context_file: 'AGENTS.md',
  no_context: false,
  color: 'auto',
  verbose: false,
  yes: false,
};

export function defaultConfig(): WardenConfig {
  return {
    ...DEFAULTS,
    models: { ...DEFAULTS.models },
    approved_folders: [...DEFAULTS.approved_folders],
  };
}

export function defaultConfigPath() {
  return path.join(configDir(), 'config.json');
}

function parseBool(v: string | undefined): boolean | undefined {
  if (v == null) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(v.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(v.toLowerCase())) return false;
  return undefined;
}

function parseNum(v: string | undefined): number | undefined {
  if (v == null || v.trim() === '') return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

function parseCsv(v: string | undefined): string[] | undefined {
  if (v == null) return undefined;
  const values = v
    .split(',')
    .map((x) => x.trim())
    .filter(Boolean);
  return values.length ? values : undefined;
}

function parseColor(v: unknown): ColorMode | undefined {
  if (v === 'auto' || v === 'always' || v === 'never') return v;
  return undefined;
}

function num(v: unknown): number | undefined {
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

function bool(v: unknown): boolean | undefined {
  return typeof v === 'boolean' ? v : undefined;
}

function str(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

function parseModels(v: unknown): Record<string, ModelEntry> | undefined {
  if (!isRecord(v)) return undefined;
  const out: Record<string, ModelEntry> = {};
  for (const [alias, raw] of Object.entries(v)) {
    if (!isRecord(raw)) continue;
    const name = str(raw.name);
    const baseUrl = str(raw.base_url);
    if (!name || !baseUrl) {
      console.warn(`[warn] config: model "${alias}" needs name and base_url, ignoring it`);
      continue;
    }
    const apiKey = str(raw.api_key);
    out[alias] = { name, base_url: baseUrl, ...(apiKey ? { api_key: apiKey } : {}) };
  }
  return out;
}

/** Pick the recognised keys of a parsed config file, dropping anything mistyped. */
export function parseFileConfig(raw: unknown): Partial<WardenConfig> {
  if (!isRecord(raw)) return {};
  const folders = Array.isArray(raw.approved_folders)
    ? raw.approved_folders.filter((f): f is string => typeof f === 'string')
    : undefined;
  return stripUndef({
    current_model: str(raw.current_model),
    models: parseModels(raw.models),
    approved_folders: folders,
    max_tokens: num(raw.max_tokens),
    context_limit: num(raw.context_limit),
    fallback_max_tokens: num(raw.fallback_max_tokens),
    temperature: num(raw.temperature),
    trim_threshold: num(raw.trim_threshold),
    keep_recent: num(raw.keep_recent),
    max_iterations: num(raw.max_iterations),
    stream: bool(raw.stream),
    exec_timeout: num(raw.exec_timeout),
    max_output_bytes: num(raw.max_output_bytes),
    response_timeout: num(raw.response_timeout),
    context_file: str(raw.context_file),
    no_context: bool(raw.no_context),
    color: parseColor(raw.color),
    verbose: bool(raw.verbose),
  });
}

function stripUndef<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(obj)) {
    if (!isKeyOf(obj, key)) continue;
    const v = obj[key];
    if (v !== undefined) out[key] = v;
  }
  return out;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

async function readConfigFile(configPath: string): Promise<unknown> {
  try {
    const raw = await fs.readFile(configPath, 'utf8');
    return raw.trim().length ? JSON.parse(raw) : {};
  } catch (e: unknown) {
    if (isRecord(e) && e.code === 'ENOENT') return {};
    throw e;
  }
}

export async function loadConfig(opts: {
  configPath?: string;
  cli?: Partial<WardenConfig>;
}): Promise<{ config: WardenConfig; configPath: string }> {
  const configPath = opts.configPath ?? defaultConfigPath();
  const fileCfg = parseFileConfig(await readConfigFile(configPath));

  const envCfg = stripUndef<Partial<WardenConfig>>({
    current_model: process.env.PATCHWARDEN_MODEL,
    approved_folders: parseCsv(process.env.PATCHWARDEN_APPROVED_FOLDERS),
    max_tokens: parseNum(process.env.PATCHWARDEN_MAX_TOKENS),
    context_limit: parseNum(process.env.PATCHWARDEN_CONTEXT_LIMIT),
    fallback_max_tokens: parseNum(process.env.PATCHWARDEN_FALLBACK_MAX_TOKENS),
    temperature: parseNum(process.env.PATCHWARDEN_TEMPERATURE),
    trim_threshold: parseNum(process.env.PATCHWARDEN_TRIM_THRESHOLD),
    keep_recent: parseNum(process.env.PATCHWARDEN_KEEP_RECENT),
    max_iterations: parseNum(process.env.PATCHWARDEN_MAX_ITERATIONS),
    stream: parseBool(process.env.PATCHWARDEN_STREAM),
    exec_timeout: parseNum(process.env.PATCHWARDEN_EXEC_TIMEOUT),
    max_output_bytes: parseNum(process.env.PATCHWARDEN_MAX_OUTPUT_BYTES),
    response_timeout: parseNum(process.env.PATCHWARDEN_RESPONSE_TIMEOUT),
    context_file: process.env.PATCHWARDEN_CONTEXT_FILE,
    no_context: parseBool(process.env.PATCHWARDEN_NO_CONTEXT),
    color: parseColor(process.env.PATCHWARDEN_COLOR),
    verbose: parseBool(process.env.PATCHWARDEN_VERBOSE),
    yes: parseBool(process.env.PATCHWARDEN_YES),
  });
  const cliCfg = stripUndef(opts.cli ?? {});

  // merge order: defaults < file < env < cli
  const merged: WardenConfig = { ...defaultConfig(), ...fileCfg, ...envCfg, ...cliCfg };

  // A file with an empty models map would leave nothing to talk to.
  if (Object.keys(merged.models).length === 0) merged.models = { ...DEFAULTS.models };
  merged.approved_folders = [...new Set(merged.approved_folders.map((f) => path.resolve(f)))];
  merged.keep_recent = Math.max(1, Math.floor(merged.keep_recent));
  merged.max_iterations = Math.max(1, Math.floor(merged.max_iterations));
  merged.exec_timeout = Math.max(1, merged.exec_timeout);

  return { config: merged, configPath };
}

/** Resolve the active model entry, or throw naming the configured aliases. */
export function resolveModel(config: WardenConfig, alias = config.current_model): ModelEntry {
  const entry = config.models[alias];
  if (!entry) {
    const known = Object.keys(config.models).join(', ') || '(none)';
    throw new Error(`Unknown model "${alias}". Configured models: ${known}`);
  }
  return entry;
}

export async function ensureConfigDir(configPath: string) {
  await fs.mkdir(path.dirname(configPath), { recursive: true });
}

/**
 * Rewrite only the given top-level keys of the config file, keeping
 * everything else the operator wrote there.
 */
export async function saveConfigPatch(
  configPath: string,
  patch: Partial<Pick<WardenConfig, 'approved_folders' | 'current_model' | 'models'>>
): Promise<void> {
  const current = await readConfigFile(configPath);
  const base = isRecord(current) ? current : {};
  const next = { ...base, ...stripUndef(patch) };
  await ensureConfigDir(configPath);
  await fs.writeFile(configPath, JSON.stringify(next, null, 2) + '\n', 'utf8');
}
