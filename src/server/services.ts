import type { AppConfig } from '../config/index.js';
import { TmuxClient, type Multiplexer } from '../utils/tmux.js';
import { ProcessSlotRegistry, type KillFn, type SpawnFn } from '../services/ProcessSlotRegistry.js';
import { TerminalBridgeManager, type PtySpawnFn } from '../services/TerminalBridge.js';
import { DisplayManager, type ResourceProbe } from '../services/DisplayManager.js';
import { SessionManager } from '../services/SessionManager.js';
import { SignalRouter, type ProcessSignaller } from '../services/SignalRouter.js';
import { CommandStorage } from '../services/CommandStorage.js';
import { AuthService } from '../services/AuthService.js';
import { MessageHandler } from './MessageHandler.js';

export interface AppServices {
  config: AppConfig;
  tmux: Multiplexer;
  registry: ProcessSlotRegistry;
  bridge: TerminalBridgeManager;
  displays: DisplayManager;
  sessions: SessionManager;
  signals: SignalRouter;
  commands: CommandStorage;
  auth: AuthService;
  messages: MessageHandler;
}

/** Seams for replacing the OS-facing pieces, used by tests */
export interface ServiceOverrides {
  tmux?: Multiplexer;
  spawnPty?: PtySpawnFn;
  spawnProcess?: SpawnFn;
  killProcess?: KillFn;
  resources?: ResourceProbe;
  signaller?: ProcessSignaller;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const tmux = overrides.tmux ?? new TmuxClient(config.tmux.socket);
  const registry = new ProcessSlotRegistry({
    terminateGraceMs: config.displays.terminateGraceMs,
    spawn: overrides.spawnProcess,
    kill: overrides.killProcess,
  });
  const bridge = new TerminalBridgeManager(tmux, config.bridge, overrides.spawnPty);
  const displays = new DisplayManager(config.displays, registry, overrides.resources);
  const sessions = new SessionManager(tmux, bridge, displays, config.tmux);
  const signals = new SignalRouter(tmux, overrides.signaller);
  const commands = new CommandStorage(config.commands.file);
  const auth = new AuthService(config.auth);
  const messages = new MessageHandler(bridge, sessions, signals, config.tmux);

  return { config, tmux, registry, bridge, displays, sessions, signals, commands, auth, messages };
}
