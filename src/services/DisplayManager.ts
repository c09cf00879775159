import { createServer } from 'net';
import { access } from 'fs/promises';
import { execFile as execFileCallback } from 'child_process';
import { promisify } from 'util';
import type { DisplayConfig } from '../config/index.js';
import type {
  AllocateRequest,
  AllocateResult,
  DisplayBinding,
  DisplayNumber,
  PanelAssignment,
  PipelineStage,
  SlotInfo,
  SlotState,
  StagePids,
} from '../types/Display.js';
import { AppError, errorMessage, invalidRequest, notFound } from '../utils/errors.js';
import { toDisplayNumber } from '../utils/identity.js';
import { delay } from '../utils/async.js';
import type { ProcessSlotRegistry, TrackedProcess } from './ProcessSlotRegistry.js';

const execFile = promisify(execFileCallback);

export const REQUIRED_BINARIES = ['Xvfb', 'x11vnc', 'websockify'] as const;
export const INSTALL_HINT = 'Install with: sudo apt install xvfb x11vnc websockify';

/** OS-level checks made before a slot is claimed */
export interface ResourceProbe {
  missingBinaries(names: readonly string[]): Promise<string[]>;
  isPortFree(port: number): Promise<boolean>;
  isDisplayFree(displayNumber: number): Promise<boolean>;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class SystemResourceProbe implements ResourceProbe {
  async missingBinaries(names: readonly string[]): Promise<string[]> {
    const missing: string[] = [];
    for (const name of names) {
      try {
        await execFile('which', [name]);
      } catch {
        missing.push(name);
      }
    }
    return missing;
  }

  isPortFree(port: number): Promise<boolean> {
    return new Promise((resolve) => {
      const server = createServer();
      server.once('error', () => resolve(false));
      server.listen(port, '127.0.0.1', () => {
        server.close(() => resolve(true));
      });
    });
  }

  /** A stale lock file or socket counts as taken, even if nothing runs there */
  async isDisplayFree(displayNumber: number): Promise<boolean> {
    const [lock, socket] = await Promise.all([
      pathExists(`/tmp/.X${displayNumber}-lock`),
      pathExists(`/tmp/.X11-unix/X${displayNumber}`),
    ]);
    return !lock && !socket;
  }
}

interface DisplaySlot {
  displayNumber: DisplayNumber;
  panelIndex: number;
  vncPort: number;
  wsPort: number;
  width: number;
  height: number;
  state: SlotState;
  pids: Partial<StagePids>;
  startedAt: Date;
  /** Settles when the pipeline is up (or failed); shared by concurrent allocate calls */
  ready: Promise<SlotInfo>;
  stopped: Promise<void> | null;
}

type PendingSlot = Omit<DisplaySlot, 'ready'>;

const COMPETING_VARIABLES = ['WAYLAND_DISPLAY', 'XDG_SESSION_TYPE'] as const;

export function displayName(displayNumber: number): string {
  return `:${displayNumber}`;
}

/** Shell snippet that routes GUI output to the display in `binding` */
export function exportCommand(binding: DisplayBinding): string {
  const parts = [`export DISPLAY=${binding.set.DISPLAY}`];
  for (const variable of binding.unset) {
    parts.push(`unset ${variable}`);
  }
  parts.push(
    `export GDK_BACKEND=${binding.set.GDK_BACKEND}`,
    `export QT_QPA_PLATFORM=${binding.set.QT_QPA_PLATFORM}`,
    `export LIBGL_ALWAYS_SOFTWARE=${binding.set.LIBGL_ALWAYS_SOFTWARE}`
  );
  return parts.join(' && ');
}

export function bindingFor(displayNumber: number): DisplayBinding {
  return {
    set: {
      DISPLAY: displayName(displayNumber),
      GDK_BACKEND: 'x11',
      QT_QPA_PLATFORM: 'xcb',
      LIBGL_ALWAYS_SOFTWARE: '1',
    },
    unset: COMPETING_VARIABLES,
  };
}

/** process.env minus competing display servers, plus the binding */
function cleanEnvironment(displayNumber: number, base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const binding = bindingFor(displayNumber);
  const env: NodeJS.ProcessEnv = { ...base, ...binding.set };
  for (const variable of binding.unset) {
    delete env[variable];
  }
  return env;
}

function describeExit(tracked: TrackedProcess): string {
  const exit = tracked.exitInfo();
  const stderr = tracked.stderrTail();
  if (stderr) return stderr;
  if (exit?.spawnError) return exit.spawnError.message;
  if (exit?.signal) return `killed by ${exit.signal}`;
  return `exited with code ${exit?.code ?? 'unknown'}`;
}

/**
 * Supervises Xvfb -> x11vnc -> websockify pipelines, one per display panel.
 *
 * Panels are a fixed table: panel i owns display `base + i`, VNC port
 * `vncPortBase + i` and WebSocket port `wsPortBase + i`, so a panel is a
 * stable address for the browser.
 */
export class DisplayManager {
  private slots = new Map<number, DisplaySlot>();

  constructor(
    private readonly config: DisplayConfig,
    private readonly registry: ProcessSlotRegistry,
    private readonly resources: ResourceProbe = new SystemResourceProbe()
  ) {}

  private slotKey(displayNumber: number): string {
    return `display:${displayNumber}`;
  }

  displayForPanel(panelIndex: number): DisplayNumber | null {
    if (!Number.isInteger(panelIndex) || panelIndex < 0 || panelIndex >= this.config.count) {
      return null;
    }
    return toDisplayNumber(this.config.base + panelIndex);
  }

  panelForDisplay(displayNumber: number): number | null {
    const index = displayNumber - this.config.base;
    return Number.isInteger(index) && index >= 0 && index < this.config.count ? index : null;
  }

  panels(): PanelAssignment[] {
    const result: PanelAssignment[] = [];
    for (let panelIndex = 0; panelIndex < this.config.count; panelIndex++) {
      const displayNumber = toDisplayNumber(this.config.base + panelIndex);
      result.push({
        panelIndex,
        displayNumber,
        display: displayName(displayNumber),
        vncPort: this.config.vncPortBase + panelIndex,
        wsPort: this.config.wsPortBase + panelIndex,
        running: this.slots.get(displayNumber)?.state === 'running',
      });
    }
    return result;
  }

  private toInfo(slot: PendingSlot): SlotInfo {
    return {
      display: displayName(slot.displayNumber),
      displayNumber: slot.displayNumber,
      panelIndex: slot.panelIndex,
      vncPort: slot.vncPort,
      wsPort: slot.wsPort,
      width: slot.width,
      height: slot.height,
    };
  }

  private resolveRequested(request: AllocateRequest): DisplayNumber | null {
    if (request.displayNumber !== undefined) {
      const displayNumber = toDisplayNumber(request.displayNumber);
      if (this.panelForDisplay(displayNumber) === null) {
        const last = this.config.base + this.config.count - 1;
        throw invalidRequest(`Invalid display number ${displayNumber}. Must be between ${this.config.base} and ${last}`);
      }
      return displayNumber;
    }
    if (request.panelIndex !== undefined) {
      const displayNumber = this.displayForPanel(request.panelIndex);
      if (displayNumber === null) {
        throw invalidRequest(`Invalid panel index ${request.panelIndex}. Must be between 0 and ${this.config.count - 1}`);
      }
      return displayNumber;
    }
    return null;
  }

  /**
   * Claims the first panel that is neither tracked here nor held by another
   * process. A panel claimed by a concurrent caller while it was being
   * checked is skipped, never shared.
   */
  private async claimFreeDisplay(width: number, height: number): Promise<DisplaySlot> {
    for (const panel of this.panels()) {
      if (this.slots.has(panel.displayNumber)) continue;
      const busy = await this.busyResource(panel.displayNumber, panel.vncPort, panel.wsPort);
      if (busy === null && !this.slots.has(panel.displayNumber)) {
        return this.claim(panel.displayNumber, width, height);
      }
    }
    throw new AppError('ResourceBusy', 'No free display panel available', { resource: 'display' });
  }

  /** Registers a starting slot and launches its pipeline; nothing awaits in between */
  private claim(displayNumber: DisplayNumber, width: number, height: number): DisplaySlot {
    const panelIndex = displayNumber - this.config.base;
    const pending: PendingSlot = {
      displayNumber,
      panelIndex,
      vncPort: this.config.vncPortBase + panelIndex,
      wsPort: this.config.wsPortBase + panelIndex,
      width,
      height,
      state: 'starting',
      pids: {},
      startedAt: new Date(),
      stopped: null,
    };
    const slot: DisplaySlot = Object.assign(pending, { ready: this.startPipeline(pending) });
    this.slots.set(displayNumber, slot);
    return slot;
  }

  /** Returns the busy resource, or null when all three are free */
  private async busyResource(displayNumber: number, vncPort: number, wsPort: number): Promise<string | null> {
    if (!(await this.resources.isPortFree(vncPort))) return `VNC port ${vncPort}`;
    if (!(await this.resources.isPortFree(wsPort))) return `WebSocket port ${wsPort}`;
    if (!(await this.resources.isDisplayFree(displayNumber))) return `Display ${displayName(displayNumber)}`;
    return null;
  }

  async allocate(request: AllocateRequest = {}): Promise<AllocateResult> {
    const width = request.width ?? this.config.defaultWidth;
    const height = request.height ?? this.config.defaultHeight;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw invalidRequest(`Invalid geometry ${width}x${height}`);
    }

    const requested = this.resolveRequested(request);
    if (requested === null) {
      const slot = await this.claimFreeDisplay(width, height);
      return { slot: await slot.ready, created: true };
    }

    const existing = this.slots.get(requested);
    if (existing) {
      return this.joinExisting(existing);
    }

    const slot = this.claim(requested, width, height);
    return { slot: await slot.ready, created: true };
  }

  private async joinExisting(slot: DisplaySlot): Promise<AllocateResult> {
    if (slot.state === 'stopping') {
      throw new AppError('ResourceBusy', `Display ${displayName(slot.displayNumber)} is shutting down`, {
        resource: 'display',
      });
    }
    // Running slots resolve immediately; starting ones share the first caller's outcome
    const info = await slot.ready;
    return { slot: info, created: false };
  }

  private async startPipeline(slot: PendingSlot): Promise<SlotInfo> {
    // Let claim() register the slot before any await resolves
    await Promise.resolve();

    const { displayNumber } = slot;
    const key = this.slotKey(displayNumber);
    const display = displayName(displayNumber);

    try {
      const missing = await this.resources.missingBinaries(REQUIRED_BINARIES);
      if (missing.length > 0) {
        throw new AppError('DependencyMissing', `Missing dependencies: ${missing.join(', ')}. ${INSTALL_HINT}`, {
          missing,
          installHint: INSTALL_HINT,
        });
      }

      const busy = await this.busyResource(displayNumber, slot.vncPort, slot.wsPort);
      if (busy) {
        throw new AppError('ResourceBusy', `${busy} is in use by another process`, { resource: busy });
      }

      const env = cleanEnvironment(displayNumber);

      await this.startStage(slot, 'xvfb', 'Xvfb', [
        display,
        '-screen', '0', `${slot.width}x${slot.height}x${this.config.depth}`,
        '-ac', '+extension', 'GLX', '+extension', 'RENDER', '-nolisten', 'tcp',
      ], env, this.config.xvfbSettleMs);

      await this.startStage(slot, 'x11vnc', 'x11vnc', [
        '-display', display,
        '-rfbport', String(slot.vncPort),
        '-nopw', '-forever', '-shared', '-noxdamage', '-wait', '5', '-defer', '5',
      ], env, this.config.vncSettleMs);

      await this.startStage(slot, 'websockify', 'websockify', [
        String(slot.wsPort),
        `127.0.0.1:${slot.vncPort}`,
      ], process.env, this.config.wsSettleMs);

      slot.state = 'running';
      console.log(`[DisplayManager] Display ${display} running (vnc ${slot.vncPort}, ws ${slot.wsPort})`);
      return this.toInfo(slot);
    } catch (err) {
      slot.state = 'stopping';
      await this.registry.terminateSlot(key);
      this.slots.delete(displayNumber);
      console.error(`[DisplayManager] Display ${display} failed to start:`, errorMessage(err));
      throw err instanceof AppError ? err : new AppError('ProcessStartFailure', errorMessage(err));
    }
  }

  private async startStage(
    slot: PendingSlot,
    stage: PipelineStage,
    command: string,
    args: string[],
    env: NodeJS.ProcessEnv,
    settleMs: number
  ): Promise<void> {
    const tracked = this.registry.spawn(this.slotKey(slot.displayNumber), stage, command, args, env);
    slot.pids[stage] = tracked.pid;

    await delay(settleMs);

    if (!tracked.hasExited()) return;

    const exit = tracked.exitInfo();
    const spawnError = exit?.spawnError;
    if (spawnError && 'code' in spawnError && spawnError.code === 'ENOENT') {
      throw new AppError('DependencyMissing', `Missing dependencies: ${command}. ${INSTALL_HINT}`, {
        missing: [command],
        installHint: INSTALL_HINT,
        stage,
      });
    }
    const reason = describeExit(tracked);
    throw new AppError('ProcessStartFailure', `Failed to start ${command}: ${reason}`, {
      stage,
      stderr: tracked.stderrTail() || undefined,
    });
  }

  async release(displayNumber: number): Promise<void> {
    const slot = this.slots.get(displayNumber);
    if (!slot) {
      throw notFound(`Display ${displayName(displayNumber)} not found`);
    }

    if (slot.state === 'starting') {
      try {
        await slot.ready;
      } catch {
        // Failed start already cleaned up after itself
        return;
      }
    }

    if (slot.stopped) {
      await slot.stopped;
      return;
    }

    slot.state = 'stopping';
    slot.stopped = this.stopSlot(slot);
    await slot.stopped;
  }

  private async stopSlot(slot: DisplaySlot): Promise<void> {
    await this.registry.terminateSlot(this.slotKey(slot.displayNumber));
    if (this.slots.get(slot.displayNumber) === slot) {
      this.slots.delete(slot.displayNumber);
    }
    console.log(`[DisplayManager] Display ${displayName(slot.displayNumber)} stopped`);
  }

  /** Liveness-checks the framebuffer; a dead one releases the whole slot */
  async probe(displayNumber: number): Promise<SlotInfo | null> {
    const slot = this.slots.get(displayNumber);
    if (!slot || slot.state !== 'running') return null;

    const primary = slot.pids.xvfb;
    if (primary !== undefined && this.registry.isAlive(primary)) {
      return this.toInfo(slot);
    }

    console.log(`[DisplayManager] Display ${displayName(displayNumber)} framebuffer died, releasing slot`);
    try {
      await this.release(displayNumber);
    } catch (err) {
      console.error(`[DisplayManager] Failed to release dead display ${displayNumber}:`, errorMessage(err));
    }
    return null;
  }

  async list(): Promise<SlotInfo[]> {
    const numbers = [...this.slots.keys()].sort((a, b) => a - b);
    const result: SlotInfo[] = [];
    for (const displayNumber of numbers) {
      const info = await this.probe(displayNumber);
      if (info) result.push(info);
    }
    return result;
  }

  /** Restarts the pipeline at a new geometry */
  async resize(displayNumber: number, width: number, height: number): Promise<SlotInfo> {
    if (!this.slots.has(displayNumber)) {
      throw notFound(`Display ${displayName(displayNumber)} not found`);
    }
    await this.release(displayNumber);
    const { slot } = await this.allocate({ displayNumber, width, height });
    return slot;
  }

  /** Pure lookup: the variables a shell needs to render on a running slot */
  bindingEnvironment(displayNumber: number): DisplayBinding | null {
    const slot = this.slots.get(displayNumber);
    if (!slot || slot.state !== 'running') return null;
    return bindingFor(displayNumber);
  }

  stagePids(displayNumber: number): Partial<StagePids> | null {
    const slot = this.slots.get(displayNumber);
    return slot ? { ...slot.pids } : null;
  }

  async releaseAll(): Promise<void> {
    for (const displayNumber of [...this.slots.keys()]) {
      try {
        await this.release(displayNumber);
      } catch (err) {
        console.error(`[DisplayManager] Failed to release display ${displayNumber}:`, errorMessage(err));
      }
    }
  }
}
