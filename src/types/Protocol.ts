import type { ScrollCommand } from './Terminal.js';

// Client -> Server messages
export interface SubscribeMessage {
  type: 'subscribe';
  session: string;
  cols?: number;
  rows?: number;
}

export interface UnsubscribeMessage {
  type: 'unsubscribe';
  session: string;
}

export interface InputMessage {
  type: 'input';
  session: string;
  keys: string;
}

export interface ResizeMessage {
  type: 'resize';
  session: string;
  cols: number;
  rows: number;
}

export interface SignalMessage {
  type: 'signal';
  session: string;
  /** Defaults to SIGINT */
  signal?: string;
}

export interface ScrollbackRequestMessage {
  type: 'scrollback';
  session: string;
  start?: number;
  end?: number;
}

export interface ScrollMessage {
  type: 'scroll';
  session: string;
  command: ScrollCommand;
  /** Lines for up/down; defaults to 1 */
  lines?: number;
}

export type ClientMessage =
  | SubscribeMessage
  | UnsubscribeMessage
  | InputMessage
  | ResizeMessage
  | SignalMessage
  | ScrollbackRequestMessage
  | ScrollMessage;

// Server -> Client messages
export interface ConnectedMessage {
  type: 'connected';
  clientId: string;
}

export interface SubscribedMessage {
  type: 'subscribed';
  session: string;
}

export interface UnsubscribedMessage {
  type: 'unsubscribed';
  session: string;
}

export interface OutputMessage {
  type: 'output';
  session: string;
  data: string;
}

export interface ScrollbackMessage {
  type: 'scrollback';
  session: string;
  content: string;
  historySize: number;
  start: number;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
  code?: string;
}

export type ServerMessage =
  | ConnectedMessage
  | SubscribedMessage
  | UnsubscribedMessage
  | OutputMessage
  | ScrollbackMessage
  | ErrorMessage;
