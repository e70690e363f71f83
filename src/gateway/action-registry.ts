/**
 * Action Registry
 *
 * Binds every ActionName to an input schema and a handler. The set is closed:
 * names outside ACTION_NAMES are rejected before any validation runs, and
 * registration stops once the registry is frozen at startup.
 */

import type { z } from 'zod';
import type { Logger } from '../types/logger.js';
import {
  GatewayError,
  UnknownActionError,
  ValidationError,
} from './errors.js';
import {
  failureOutcome,
  isActionName,
  successOutcome,
  type ActionData,
  type ActionName,
  type ActionOutcome,
  type RequestId,
} from './protocol.js';

/**
 * What a handler sees besides its validated input.
 */
export interface ActionContext {
  connectionId: string;
  requestId: RequestId;
  logger: Logger;
}

/**
 * Successful handler output. Failures are thrown as GatewayErrors.
 */
export interface ActionResult {
  message: string;
  data: ActionData;
}

export interface ActionDefinition<S extends z.ZodTypeAny = z.ZodTypeAny> {
  /** One-line summary for logs and the health endpoint */
  description: string;
  /** Envelope `message` when the handler fails */
  failureMessage: string;
  schema: S;
  handler: (input: z.output<S>, context: ActionContext) => Promise<ActionResult>;
}

/**
 * A definition for every action; omitting one is a compile error.
 */
export type ActionDefinitions = { [K in ActionName]: ActionDefinition };

/**
 * Identity helper that keeps the handler's input type tied to its schema.
 */
export function defineAction<S extends z.ZodTypeAny>(definition: ActionDefinition<S>): ActionDefinition {
  return definition;
}

/**
 * Render zod issues as client-facing field errors.
 */
export function formatValidationIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const field = issue.path.join('.');
      if (issue.code === 'invalid_type' && issue.received === 'undefined' && field) {
        return `missing required field: ${field}`;
      }
      return field ? `invalid field ${field}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

export class ActionRegistry {
  private readonly actions = new Map<ActionName, ActionDefinition>();
  private readonly logger: Logger;
  private frozen = false;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'action-registry' });
  }

  /**
   * Bind a handler. Only valid before freeze().
   */
  register(name: ActionName, definition: ActionDefinition): void {
    if (this.frozen) {
      throw new Error(`Cannot register action "${name}": registry is frozen`);
    }
    if (this.actions.has(name)) {
      throw new Error(`Action "${name}" is already registered`);
    }
    this.actions.set(name, definition);
  }

  /**
   * Close registration. Called once, before the server accepts connections.
   */
  freeze(): void {
    this.frozen = true;
    this.logger.debug({ actions: this.names() }, 'Action registry frozen');
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  has(name: string): name is ActionName {
    return isActionName(name) && this.actions.has(name);
  }

  names(): ActionName[] {
    return Array.from(this.actions.keys()).sort();
  }

  describe(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const name of this.names()) {
      const definition = this.actions.get(name);
      if (definition) result[name] = definition.description;
    }
    return result;
  }

  /**
   * Validate `data` against the action's schema and run its handler.
   *
   * Never throws: every failure comes back as a failure outcome.
   */
  async dispatch(name: string, data: ActionData, context: ActionContext): Promise<ActionOutcome> {
    const definition = isActionName(name) ? this.actions.get(name) : undefined;
    if (!definition) {
      this.logger.warn({ action: name }, 'Rejected unknown action');
      return failureOutcome('Unknown action', new UnknownActionError(name));
    }

    const parsed = definition.schema.safeParse(data);
    if (!parsed.success) {
      const error = new ValidationError(formatValidationIssues(parsed.error.issues));
      this.logger.debug({ action: name, error: error.message }, 'Rejected invalid input');
      return failureOutcome('Invalid request data', error);
    }

    const startTime = Date.now();
    try {
      const result = await definition.handler(parsed.data, context);
      this.logger.debug({ action: name, durationMs: Date.now() - startTime }, 'Action completed');
      return successOutcome(result.message, result.data);
    } catch (error) {
      const durationMs = Date.now() - startTime;

      if (error instanceof GatewayError) {
        this.logger.warn(
          { action: name, code: error.code, error: error.message, durationMs },
          'Action failed'
        );
        return failureOutcome(definition.failureMessage, error);
      }

      const detail = error instanceof Error ? (error.stack ?? error.message) : String(error);
      this.logger.error({ action: name, error: detail, durationMs }, 'Action crashed');
      return failureOutcome(
        definition.failureMessage,
        new GatewayError(`internal error while handling ${name}`, 'INTERNAL_ERROR')
      );
    }
  }
}

/**
 * Build and freeze a registry from a complete set of definitions.
 */
export function createActionRegistry(logger: Logger, definitions: ActionDefinitions): ActionRegistry {
  const registry = new ActionRegistry(logger);
  for (const name of Object.keys(definitions)) {
    if (isActionName(name)) {
      registry.register(name, definitions[name]);
    }
  }
  registry.freeze();
  return registry;
}
