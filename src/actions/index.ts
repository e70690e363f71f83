/**
 * Action definitions for every ActionName.
 */

import type { ActionDefinitions } from '../gateway/action-registry.js';
import { createAssistActions } from './assist-actions.js';
import { createCommandActions } from './command-actions.js';
import { createFileActions } from './file-actions.js';
import { createMockActions } from './mock-actions.js';
import { createSearchActions } from './search-actions.js';
import type { ActionServices } from './shared.js';

export type { ActionServices } from './shared.js';
export { resolveWorkspacePath } from './shared.js';

export function createActionDefinitions(services: ActionServices): ActionDefinitions {
  return {
    ...createFileActions(services),
    ...createSearchActions(services),
    ...createCommandActions(services),
    ...createAssistActions(services),
    ...createMockActions(),
  };
}
