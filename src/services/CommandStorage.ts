import * as fs from 'fs/promises';
import * as path from 'path';
import type { CommandMap, QuickCommand } from '../types/Command.js';
import { KeyedLock } from '../utils/async.js';
import { errorMessage, isErrnoException, notFound } from '../utils/errors.js';

function isQuickCommand(value: unknown): value is QuickCommand {
  return (
    typeof value === 'object' &&
    value !== null &&
    'label' in value &&
    'command' in value &&
    typeof value.label === 'string' &&
    typeof value.command === 'string'
  );
}

/** Keeps the well-formed entries of a parsed commands file */
export function parseCommandFile(content: unknown): CommandMap {
  const commands: CommandMap = {};
  if (typeof content !== 'object' || content === null || Array.isArray(content)) {
    return commands;
  }
  for (const [session, list] of Object.entries(content)) {
    if (Array.isArray(list)) {
      commands[session] = list.filter(isQuickCommand).map(({ label, command }) => ({ label, command }));
    }
  }
  return commands;
}

/**
 * Quick-command buttons per session, kept in memory and mirrored to a JSON
 * file on every change.
 */
export class CommandStorage {
  private readonly storagePath: string;
  private commands: CommandMap | null = null;
  private lock = new KeyedLock();

  constructor(file: string) {
    this.storagePath = path.resolve(file);
  }

  private async load(): Promise<CommandMap> {
    if (this.commands) return this.commands;

    try {
      const content = await fs.readFile(this.storagePath, 'utf-8');
      this.commands = parseCommandFile(JSON.parse(content));
    } catch (err) {
      if (!(isErrnoException(err) && err.code === 'ENOENT')) {
        console.error(`[CommandStorage] Could not read ${this.storagePath}, starting empty:`, errorMessage(err));
      }
      this.commands = {};
    }
    return this.commands;
  }

  /**
   * Write commands to file atomically
   */
  private async writeFile(data: CommandMap): Promise<void> {
    await fs.mkdir(path.dirname(this.storagePath), { recursive: true });
    const tempPath = `${this.storagePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await fs.rename(tempPath, this.storagePath);
  }

  private mutate<T>(change: (commands: CommandMap) => T): Promise<T> {
    return this.lock.run('file', async () => {
      const commands = await this.load();
      const result = change(commands);
      await this.writeFile(commands);
      return result;
    });
  }

  async all(): Promise<CommandMap> {
    const commands = await this.load();
    return Object.fromEntries(Object.entries(commands).map(([session, list]) => [session, [...list]]));
  }

  async get(session: string): Promise<QuickCommand[]> {
    const commands = await this.load();
    return [...(commands[session] ?? [])];
  }

  add(session: string, label: string, command: string): Promise<QuickCommand[]> {
    return this.mutate((commands) => {
      const list = commands[session] ?? [];
      list.push({ label, command });
      commands[session] = list;
      return [...list];
    });
  }

  remove(session: string, index: number): Promise<QuickCommand[]> {
    return this.mutate((commands) => {
      const list = commands[session];
      if (!list || !Number.isInteger(index) || index < 0 || index >= list.length) {
        throw notFound(`No command ${index} for session ${session}`);
      }
      list.splice(index, 1);
      return [...list];
    });
  }

  /** Returns whether the session had any commands */
  clear(session: string): Promise<boolean> {
    return this.mutate((commands) => {
      const existed = session in commands;
      delete commands[session];
      return existed;
    });
  }
}
