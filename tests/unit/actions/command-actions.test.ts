import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { createActionDefinitions } from '../../../src/actions/index.js';
import { createActionRegistry, type ActionRegistry } from '../../../src/gateway/action-registry.js';
import type { ActionData } from '../../../src/gateway/protocol.js';
import {
  createFakeCollaborator,
  createMockLogger,
  createTempWorkspace,
  createTestConfig,
} from '../../helpers/factories.js';

describe('command actions', () => {
  let root: string;
  let cleanup: () => Promise<void>;
  let registry: ActionRegistry;

  const dispatch = (data: ActionData) =>
    registry.dispatch('execute_command', data, {
      connectionId: 'c1',
      requestId: 'r1',
      logger: createMockLogger(),
    });

  beforeEach(async () => {
    ({ root, cleanup } = await createTempWorkspace());
    registry = createActionRegistry(
      createMockLogger(),
      createActionDefinitions({ config: createTestConfig(root), collaborator: createFakeCollaborator() })
    );
  });

  afterEach(async () => {
    await cleanup();
  });

  it('runs the command in the workspace root', async () => {
    const outcome = await dispatch({ command: 'echo hi && ls' });

    expect(outcome.message).toBe('Command executed');
    expect(outcome.data).toMatchObject({ stdout: 'hi\n', exit_code: 0, timed_out: false });
  });

  it('honors working_directory', async () => {
    await mkdir(join(root, 'sub'));
    await mkdir(join(root, 'sub', 'inner'));

    const outcome = await dispatch({ command: 'ls', working_directory: 'sub' });

    expect(outcome.data).toMatchObject({ stdout: 'inner\n' });
  });

  it('returns a timed out result', async () => {
    const outcome = await dispatch({ command: 'sleep 10', timeout: 0.3 });

    expect(outcome.success).toBe(true);
    expect(outcome.message).toBe('Command timed out');
    expect(outcome.data).toMatchObject({ timed_out: true, exit_code: null });
  });

  it('rejects a non-positive timeout', async () => {
    const outcome = await dispatch({ command: 'true', timeout: 0 });

    expect(outcome.error).toBe('invalid field timeout: Number must be greater than 0');
  });

  it('fails for a missing working directory', async () => {
    const outcome = await dispatch({ command: 'true', working_directory: 'missing' });

    expect(outcome.message).toBe('Failed to execute command');
    expect(outcome.error_code).toBe('NOT_FOUND');
  });
});
