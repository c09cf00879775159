/** Prefixed tmux session name, produced only by toSessionId() */
export type SessionId = string & { readonly __brand: 'SessionId' };

/** Terminal dimensions */
export interface Dimensions {
  cols: number;
  rows: number;
}

/** A live tmux session as reported to clients */
export interface SessionInfo {
  id: SessionId;
  cwd: string | null;
  command: string | null;
  pid: number | null;
  dimensions: Dimensions;
  createdAt: string;
  /** Whether a PTY bridge is currently attached */
  attached: boolean;
  subscribers: number;
}

/** Session creation request */
export interface CreateSessionRequest {
  name?: string;
  cwd?: string;
  command?: string;
}

/** Captured tmux history */
export interface Scrollback {
  session: SessionId;
  content: string;
  historySize: number;
  start: number;
}
