import { isAbsolute, resolve } from 'node:path';
import type { GatewayConfig } from '../config/index.js';
import type { Collaborator } from '../llm/collaborator.js';

/**
 * What action handlers are built from.
 */
export interface ActionServices {
  config: Pick<GatewayConfig, 'workspace' | 'commands' | 'search'>;
  collaborator: Collaborator;
}

/**
 * Resolve a request path against the workspace root. Absolute paths are kept.
 */
export function resolveWorkspacePath(root: string, path: string): string {
  return isAbsolute(path) ? resolve(path) : resolve(root, path);
}
