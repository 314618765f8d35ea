export interface ParsedCommand {
  bin: string;
  args: string[];
  /** Leading `KEY=value` assignments */
  env: Record<string, string>;
  raw: string;
  /** False when the input ends inside a quote or after a lone backslash */
  complete: boolean;
}

export type CommandPlan =
  | {
      ok: true;
      bin: string;
      args: string[];
      env: Record<string, string>;
      shell: boolean;
    }
  | { ok: false; reason: string };
