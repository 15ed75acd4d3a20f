import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parse } from 'toml';
import { ConfigurationError } from './errors.js';

export const API_KEY_VAR = 'OPENAI_API_KEY';
export const DEFAULT_KEY_FILE = '~/.clai.env';
export const DEFAULT_CONFIG_PATH = '~/.clai.toml';
export const DEFAULT_ENDPOINT = 'https://api.openai.com/v1/chat/completions';
export const DEFAULT_MODEL = 'gpt-4o';
export const DEFAULT_EDITOR = 'vim';

export type Env = Record<string, string | undefined>;

export interface ChatConfig {
  endpoint: string;
  model: string;
  system_prompt?: string;
  key_file: string;
}

export interface EditorConfig {
  command?: string;
}

export interface ClaiConfig {
  chat: ChatConfig;
  editor: EditorConfig;
}

/**
 * Expand a leading `~` against `HOME` from the given environment.
 */
export function resolvePath(path: string, env: Env): string {
  if (!path.startsWith('~')) {
    return path;
  }
  const home = env.HOME ?? homedir();
  return join(home, path.slice(1).replace(/^[/\\]+/, ''));
}

export function loadConfig(configPath: string): ClaiConfig {
  const config: ClaiConfig = {
    chat: {
      endpoint: DEFAULT_ENDPOINT,
      model: DEFAULT_MODEL,
      key_file: DEFAULT_KEY_FILE,
    },
    editor: {},
  };

  if (!existsSync(configPath)) {
    return config;
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(
      `Failed to read config: ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new ConfigurationError(
      `Invalid TOML in config: ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const root = section(parsed, configPath, null);
  const chat = section(root['chat'], configPath, 'chat');
  const editor = section(root['editor'], configPath, 'editor');

  config.chat.endpoint = stringField(chat, 'endpoint', configPath) ?? config.chat.endpoint;
  config.chat.model = stringField(chat, 'model', configPath) ?? config.chat.model;
  config.chat.key_file = stringField(chat, 'key_file', configPath) ?? config.chat.key_file;
  config.chat.system_prompt = stringField(chat, 'system_prompt', configPath);
  config.editor.command = stringField(editor, 'command', configPath);

  return config;
}

function section(value: unknown, configPath: string, name: string | null): Record<string, unknown> {
  if (value === undefined) {
    return {};
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigurationError(`Expected [${name ?? 'root'}] to be a table in config: ${configPath}`);
  }
  return Object.fromEntries(Object.entries(value));
}

function stringField(table: Record<string, unknown>, key: string, configPath: string): string | undefined {
  const value = table[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(`Expected "${key}" to be a string in config: ${configPath}`);
  }
  return value;
}

export function resolveEditorCommand(config: ClaiConfig, env: Env): string {
  return config.editor.command || env.VISUAL || env.EDITOR || DEFAULT_EDITOR;
}

/**
 * Read the API key out of a `KEY="value"` file.
 * The `OPENAI_API_KEY` entry wins over any other; otherwise the first entry is used.
 */
export function parseKeyFile(contents: string): string | undefined {
  let first: string | undefined;

  for (const rawLine of contents.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const eq = line.indexOf('=');
    if (eq === -1) continue;

    const key = line.slice(0, eq).trim().replace(/^export\s+/, '');
    const value = unquote(line.slice(eq + 1).trim());
    if (!value) continue;

    if (key === API_KEY_VAR) {
      return value;
    }
    first ??= value;
  }

  return first;
}

// strips stray edge quotes too, so a missing closing quote still yields the bare key
function unquote(value: string): string {
  return value.replace(/^["']+|["']+$/g, '');
}

export function resolveApiKey(opts: { env: Env; keyFile?: string }): string {
  const keyFile = opts.keyFile ?? DEFAULT_KEY_FILE;
  const keyPath = resolvePath(keyFile, opts.env);

  if (existsSync(keyPath)) {
    const apiKey = parseKeyFile(readFileSync(keyPath, 'utf-8'));
    if (!apiKey) {
      throw new ConfigurationError(`No API key found in ${keyFile}`);
    }
    return apiKey;
  }

  const fromEnv = opts.env[API_KEY_VAR];
  if (fromEnv) {
    return fromEnv;
  }

  throw new ConfigurationError(`API key not set in ${keyFile} or in env var '${API_KEY_VAR}'`);
}
