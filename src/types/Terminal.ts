import type { SessionId, Dimensions } from './Session.js';

/** PTY connection - one per attached tmux session */
export interface PtyConnectionInfo {
  sessionId: SessionId;
  pid: number;
  dimensions: Dimensions;
  subscriberCount: number;
  readerStopped: boolean;
  createdAt: Date;
  lastActivityAt: Date;
}

/** Signals clients may route to the foreground process of a session */
export const SUPPORTED_SIGNALS = [
  'SIGINT',
  'SIGTERM',
  'SIGKILL',
  'SIGSTOP',
  'SIGCONT',
  'SIGTSTP',
  'SIGHUP',
  'SIGQUIT',
] as const;

export type SupportedSignal = (typeof SUPPORTED_SIGNALS)[number];

/** Copy-mode navigation a client may drive */
export const SCROLL_COMMANDS = ['enter', 'exit', 'up', 'down', 'page_up', 'page_down', 'top', 'bottom'] as const;

export type ScrollCommand = (typeof SCROLL_COMMANDS)[number];
