import type { CommandPlan, ParsedCommand } from './types';

const ENV_ASSIGNMENT = /^([a-zA-Z_][a-zA-Z0-9_]*)=(.*)$/s;

export function parseCommand(input: string): ParsedCommand {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: "'" | '"' | null = null;
  let escape = false;

  const trimmed = input.trim();

  for (const char of trimmed) {
    if (escape) {
      current += char;
      escape = false;
    } else if (char === '\\' && quote !== "'") {
      escape = true;
      inToken = true;
    } else if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
      inToken = true;
    } else if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += char;
      inToken = true;
    }
  }

  if (inToken) {
    tokens.push(current);
  }

  // Leading assignments become the environment; the first other token is the binary.
  const env: Record<string, string> = {};
  let cmdIndex = 0;
  while (cmdIndex < tokens.length) {
    const match = ENV_ASSIGNMENT.exec(tokens[cmdIndex]);
    if (!match) break;
    env[match[1]] = match[2];
    cmdIndex++;
  }

  return {
    bin: tokens[cmdIndex] ?? '',
    args: tokens.slice(cmdIndex + 1),
    env,
    raw: input,
    complete: quote === null && !escape,
  };
}

// Detects characters that require a shell to interpret.
export function isShellCommand(command: string): boolean {
  return /[|&;<>`$]/.test(command);
}

/**
 * Decides how a free-form command line is executed: shell syntax goes through the
 * shell untouched, everything else is tokenized and spawned directly.
 */
export function planCommandLine(commandLine: string): CommandPlan {
  if (commandLine.trim() === '') {
    return { ok: false, reason: 'Command is empty' };
  }

  const parsed = parseCommand(commandLine);
  if (!parsed.complete) {
    return { ok: false, reason: `Could not parse command (unterminated quote or escape): ${commandLine}` };
  }
  if (!parsed.bin) {
    return { ok: false, reason: `Command names no program to run: ${commandLine}` };
  }

  if (isShellCommand(commandLine)) {
    return { ok: true, bin: commandLine.trim(), args: [], env: {}, shell: true };
  }

  return { ok: true, bin: parsed.bin, args: parsed.args, env: parsed.env, shell: false };
}
