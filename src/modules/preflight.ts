/**
 * Preflight dependency check
 *
 * Runs before any domain is processed. Each required executable is located
 * on PATH with `which`; a missing tool with a known install command is
 * installed, anything else fails the run.
 */

import type { CommandResult, CommandRunner } from '../core/commandRunner.js';
import { tools } from '../core/env.js';
import { Errors } from '../core/errors.js';
import { createModuleLogger } from '../core/logger.js';

const log = createModuleLogger('preflight');

export interface RequiredTool {
  name: string;
  /** Shell-free install command, split on whitespace */
  installCommand?: string;
}

export function defaultRequiredTools(): RequiredTool[] {
  return [
    { name: tools.HTTP_TOOL },
    { name: tools.ARCHIVE_TOOL, installCommand: tools.ARCHIVE_TOOL_INSTALL || undefined },
  ];
}

export async function locateTool(runner: CommandRunner, name: string): Promise<string | null> {
  try {
    const { exitCode, stdout } = await runner.execute('which', [name]);
    const resolved = stdout.trim();
    return exitCode === 0 && resolved ? resolved : null;
  } catch (error) {
    log.debug({ tool: name, err: error }, 'which lookup failed');
    return null;
  }
}

async function installTool(runner: CommandRunner, tool: RequiredTool & { installCommand: string }): Promise<void> {
  const [command, ...args] = tool.installCommand.split(/\s+/).filter(Boolean);
  if (!command) {
    throw Errors.toolMissing(tool.name);
  }

  log.info({ tool: tool.name, command: tool.installCommand }, `Attempting to install ${tool.name}...`);
  let result: CommandResult;
  try {
    result = await runner.execute(command, args);
  } catch (error) {
    throw Errors.installFailed(tool.name, error);
  }
  if (result.exitCode !== 0) {
    throw Errors.installFailed(tool.name, Errors.nonZeroExit(command, result.exitCode ?? -1, result.stderr));
  }
  log.info({ tool: tool.name }, `${tool.name} installed successfully.`);
}

export async function ensureDependencies(options: {
  runner: CommandRunner;
  required?: RequiredTool[];
}): Promise<void> {
  const { runner } = options;
  const required = options.required ?? defaultRequiredTools();

  for (const tool of required) {
    const found = await locateTool(runner, tool.name);
    if (found) {
      log.debug({ tool: tool.name, path: found }, 'Tool available');
      continue;
    }

    log.warn({ tool: tool.name }, `${tool.name} is not installed.`);
    if (!tool.installCommand) {
      throw Errors.toolMissing(tool.name);
    }

    await installTool(runner, { ...tool, installCommand: tool.installCommand });

    // go install drops binaries in GOPATH/bin, which is not always on PATH
    if (!(await locateTool(runner, tool.name))) {
      throw Errors.toolMissing(tool.name);
    }
  }
}
