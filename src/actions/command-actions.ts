/**
 * Command action: execute_command.
 */

import { z } from 'zod';
import { defineAction, type ActionDefinition } from '../gateway/action-registry.js';
import { runCommand } from '../runtime/shell/command-runner.js';
import { resolveWorkspacePath, type ActionServices } from './shared.js';

const executeCommandSchema = z.object({
  command: z.string().min(1),
  working_directory: z.string().min(1).optional(),
  /** Seconds */
  timeout: z.number().positive().optional(),
});

export function createCommandActions(
  services: ActionServices
): Record<'execute_command', ActionDefinition> {
  const { workspace, commands } = services.config;

  return {
    execute_command: defineAction({
      description: 'Run a shell command with a timeout',
      failureMessage: 'Failed to execute command',
      schema: executeCommandSchema,
      handler: async (input, context) => {
        const timeoutSec = Math.min(
          input.timeout ?? commands.defaultTimeoutSec,
          commands.maxTimeoutSec
        );
        const cwd = resolveWorkspacePath(workspace.root, input.working_directory ?? '.');

        context.logger.info({ command: input.command, cwd, timeoutSec }, 'Executing command');

        const result = await runCommand(input.command, {
          cwd,
          timeoutMs: Math.round(timeoutSec * 1000),
          killGraceMs: commands.killGraceMs,
          maxOutputBytes: commands.maxOutputBytes,
        });

        context.logger.info(
          {
            exitCode: result.exit_code,
            signal: result.signal,
            timedOut: result.timed_out,
            durationMs: result.duration_ms,
          },
          'Command finished'
        );

        return {
          message: result.timed_out ? 'Command timed out' : 'Command executed',
          data: { ...result },
        };
      },
    }),
  };
}
