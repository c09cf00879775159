import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[];
}

export interface WebSocketConfig {
  path: string;
  heartbeatInterval: number;
}

export interface TmuxConfig {
  /** Name passed to `tmux -L`, keeps our sessions off the user's default server */
  socket: string;
  sessionPrefix: string;
  defaultCols: number;
  defaultRows: number;
  scrollbackLimit: number;
  defaultShell: string;
  /** Wait between creating a session and typing its initial command */
  commandDelayMs: number;
  /** Start new sessions at a username prompt that runs `su -l` instead of a shell */
  loginShell: boolean;
}

export interface BridgeConfig {
  /** Delay before an unsubscribed PTY is reclaimed */
  graceMs: number;
  preAttachDelayMs: number;
  attachSettleMs: number;
  /** Strip OSC color/clipboard queries and DCS strings from output */
  filterQuerySequences: boolean;
}

export interface DisplayConfig {
  base: number;
  count: number;
  vncPortBase: number;
  wsPortBase: number;
  depth: number;
  defaultWidth: number;
  defaultHeight: number;
  xvfbSettleMs: number;
  vncSettleMs: number;
  wsSettleMs: number;
  terminateGraceMs: number;
}

export interface CommandsConfig {
  file: string;
}

export interface AuthConfig {
  enabled: boolean;
  secret: string;
  tokenExpiry: number;
  username: string;
  passwordHash: string;
}

export interface AppConfig {
  server: ServerConfig;
  websocket: WebSocketConfig;
  tmux: TmuxConfig;
  bridge: BridgeConfig;
  displays: DisplayConfig;
  commands: CommandsConfig;
  auth: AuthConfig;
}

export type PartialConfig = { [K in keyof AppConfig]?: Partial<AppConfig[K]> };

export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 5000,
    host: '127.0.0.1',
    corsOrigins: ['http://localhost:5000', 'http://127.0.0.1:5000'],
  },
  websocket: {
    path: '/ws',
    heartbeatInterval: 30000,
  },
  tmux: {
    socket: 'termpanel',
    sessionPrefix: 'term-',
    defaultCols: 120,
    defaultRows: 40,
    scrollbackLimit: 50000,
    defaultShell: process.env.SHELL || '/bin/bash',
    commandDelayMs: 200,
    loginShell: false,
  },
  bridge: {
    graceMs: 5000,
    preAttachDelayMs: 50,
    attachSettleMs: 100,
    filterQuerySequences: true,
  },
  displays: {
    base: 100,
    count: 3,
    vncPortBase: 5900,
    wsPortBase: 6100,
    depth: 24,
    defaultWidth: 1280,
    defaultHeight: 800,
    xvfbSettleMs: 500,
    vncSettleMs: 500,
    wsSettleMs: 300,
    terminateGraceMs: 100,
  },
  commands: {
    file: 'commands.json',
  },
  auth: {
    enabled: false,
    secret: 'change-this-secret-in-production',
    tokenExpiry: 86400,
    username: 'admin',
    passwordHash: '',
  },
};

const CONFIG_PATHS = [
  join(process.cwd(), 'config', 'config.json'),
  join(homedir(), '.config', 'termpanel', 'config.json'),
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasSameShape<V>(expected: V, value: unknown): value is V {
  if (Array.isArray(expected)) {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
  }
  if (typeof expected === 'number') {
    return typeof value === 'number' && Number.isFinite(value);
  }
  return typeof value === typeof expected;
}

/** Keeps only the keys of a file section whose type matches the default */
function pickSection<T extends object>(defaults: T, raw: unknown): Partial<T> {
  const picked: Partial<T> = {};
  if (!isPlainObject(raw)) return picked;
  for (const key in defaults) {
    const value = raw[key];
    if (value === undefined) continue;
    if (hasSameShape(defaults[key], value)) {
      picked[key] = value;
    } else {
      console.error(`[Config] Ignoring invalid value for "${key}"`);
    }
  }
  return picked;
}

export function parseConfigFile(content: unknown): PartialConfig {
  if (!isPlainObject(content)) {
    throw new Error('Config file must contain a JSON object');
  }
  return {
    server: pickSection(DEFAULT_CONFIG.server, content.server),
    websocket: pickSection(DEFAULT_CONFIG.websocket, content.websocket),
    tmux: pickSection(DEFAULT_CONFIG.tmux, content.tmux),
    bridge: pickSection(DEFAULT_CONFIG.bridge, content.bridge),
    displays: pickSection(DEFAULT_CONFIG.displays, content.displays),
    commands: pickSection(DEFAULT_CONFIG.commands, content.commands),
    auth: pickSection(DEFAULT_CONFIG.auth, content.auth),
  };
}

function loadConfigFile(): PartialConfig {
  for (const configPath of CONFIG_PATHS) {
    if (existsSync(configPath)) {
      try {
        const content = parseConfigFile(JSON.parse(readFileSync(configPath, 'utf-8')));
        console.log(`[Config] Loaded config from ${configPath}`);
        return content;
      } catch (err) {
        console.error(`[Config] Failed to load config from ${configPath}:`, err);
      }
    }
  }
  return {};
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

function envString(name: string): string | undefined {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? undefined : raw;
}

function loadEnvConfig(): PartialConfig {
  const passwordHash = envString('AUTH_PASSWORD_HASH');
  const authEnabled = envString('AUTH_ENABLED');
  const loginShell = envString('LOGIN_SHELL');

  return {
    server: { port: envInt('PORT'), host: envString('HOST') },
    tmux: {
      socket: envString('TMUX_SOCKET'),
      sessionPrefix: envString('SESSION_PREFIX'),
      loginShell: loginShell === undefined ? undefined : loginShell === 'true',
    },
    displays: { base: envInt('DISPLAY_BASE'), count: envInt('DISPLAY_COUNT') },
    commands: { file: envString('COMMANDS_FILE') },
    auth: {
      // A password hash implies auth, as does an explicit AUTH_ENABLED=true
      enabled: passwordHash ? true : authEnabled === undefined ? undefined : authEnabled === 'true',
      secret: envString('AUTH_SECRET'),
      tokenExpiry: envInt('AUTH_TOKEN_EXPIRY'),
      username: envString('AUTH_USERNAME'),
      passwordHash,
    },
  };
}

function mergeSection<T extends object>(target: T, source: Partial<T> | undefined): T {
  if (!source) return target;
  const result = { ...target };
  for (const key in target) {
    const value = source[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

export function mergeConfig(base: AppConfig, override: PartialConfig): AppConfig {
  return {
    server: mergeSection(base.server, override.server),
    websocket: mergeSection(base.websocket, override.websocket),
    tmux: mergeSection(base.tmux, override.tmux),
    bridge: mergeSection(base.bridge, override.bridge),
    displays: mergeSection(base.displays, override.displays),
    commands: mergeSection(base.commands, override.commands),
    auth: mergeSection(base.auth, override.auth),
  };
}

export function validateConfig(config: AppConfig): void {
  if (config.server.port < 1 || config.server.port > 65535) {
    throw new Error('Invalid port number');
  }
  if (!config.tmux.sessionPrefix) {
    throw new Error('Session prefix must not be empty');
  }
  if (config.displays.count < 1) {
    throw new Error('At least one display panel is required');
  }
  const { base, count, vncPortBase, wsPortBase } = config.displays;
  if (vncPortBase + count > 65536 || wsPortBase + count > 65536) {
    throw new Error('Display port range exceeds 65535');
  }
  if (vncPortBase < wsPortBase + count && wsPortBase < vncPortBase + count) {
    throw new Error('VNC and WebSocket port ranges overlap');
  }
  if (base < 0) {
    throw new Error('Display base must be non-negative');
  }
  if (config.bridge.graceMs < 0) {
    throw new Error('Bridge grace period must be non-negative');
  }
  if (config.auth.enabled && !config.auth.secret) {
    throw new Error('Auth secret is required when auth is enabled');
  }
  if (config.auth.enabled && !config.auth.passwordHash) {
    throw new Error('Auth password hash is required when auth is enabled');
  }
}

let cachedConfig: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;

  // Priority: env > file > defaults
  let config = mergeConfig(DEFAULT_CONFIG, loadConfigFile());
  config = mergeConfig(config, loadEnvConfig());

  validateConfig(config);

  cachedConfig = config;
  return config;
}

export function getConfig(): AppConfig {
  return cachedConfig || loadConfig();
}

export function reloadConfig(): AppConfig {
  cachedConfig = null;
  return loadConfig();
}
