/** X display number (the N in ":N"), produced only by toDisplayNumber() */
export type DisplayNumber = number & { readonly __brand: 'DisplayNumber' };

export type SlotState = 'starting' | 'running' | 'stopping';

export type PipelineStage = 'xvfb' | 'x11vnc' | 'websockify';

/** Stages in start order; teardown walks this list backwards */
export const PIPELINE_STAGES: readonly PipelineStage[] = ['xvfb', 'x11vnc', 'websockify'];

export interface StagePids {
  xvfb: number;
  x11vnc: number;
  websockify: number;
}

/** Display slot as reported to clients */
export interface SlotInfo {
  display: string;
  displayNumber: DisplayNumber;
  panelIndex: number;
  vncPort: number;
  wsPort: number;
  width: number;
  height: number;
}

export interface AllocateResult {
  slot: SlotInfo;
  created: boolean;
}

export interface AllocateRequest {
  displayNumber?: number;
  panelIndex?: number;
  width?: number;
  height?: number;
}

/** One row of the fixed panel -> display table */
export interface PanelAssignment {
  panelIndex: number;
  displayNumber: DisplayNumber;
  display: string;
  vncPort: number;
  wsPort: number;
  running: boolean;
}

/** Variables a shell exports to render GUI programs on a slot */
export interface DisplayEnvironment {
  DISPLAY: string;
  GDK_BACKEND: 'x11';
  QT_QPA_PLATFORM: 'xcb';
  LIBGL_ALWAYS_SOFTWARE: '1';
}

/** Variables that would route GUI output to a competing display server */
export type CompetingDisplayVariable = 'WAYLAND_DISPLAY' | 'XDG_SESSION_TYPE';

export interface DisplayBinding {
  set: DisplayEnvironment;
  unset: readonly CompetingDisplayVariable[];
}
