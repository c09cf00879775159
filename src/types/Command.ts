/** A quick-command button attached to a session */
export interface QuickCommand {
  label: string;
  command: string;
}

export type CommandMap = Record<string, QuickCommand[]>;
