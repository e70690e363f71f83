/**
 * AI Collaborator
 *
 * Opaque text-in/text-out call to an AI backend through the Vercel AI SDK
 * (ai package v5). The gateway relays whatever comes back; it never retries
 * or inspects the content. SDK retries are disabled and every call is bounded
 * by an abort timeout.
 */

import { createOpenAI } from '@ai-sdk/openai';
import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import type { Logger } from '../types/logger.js';
import { ExternalServiceError, TimeoutError } from '../gateway/errors.js';
import { buildPrompt, type CollaboratorRequest } from './prompts.js';

export type CollaboratorProvider = 'openai' | 'openrouter';

export interface CollaboratorConfig {
  provider: CollaboratorProvider;
  /** null leaves the collaborator unconfigured */
  apiKey: string | null;
  /** OpenAI-compatible endpoint override */
  baseUrl: string | null;
  model: string;
  temperature: number;
  timeoutMs: number;
}

export interface Collaborator {
  isConfigured(): boolean;
  /**
   * @throws ExternalServiceError when unconfigured, on upstream failure or empty output
   * @throws TimeoutError when the call exceeds the configured timeout
   */
  invoke(request: CollaboratorRequest): Promise<string>;
}

function createModel(config: CollaboratorConfig): LanguageModel | null {
  if (!config.apiKey) return null;

  if (config.provider === 'openrouter') {
    const openrouter = createOpenRouter({
      apiKey: config.apiKey,
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
    });
    return openrouter(config.model);
  }

  const openai = createOpenAI({
    apiKey: config.apiKey,
    ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
  });
  return openai.chat(config.model);
}

export class AiSdkCollaborator implements Collaborator {
  private readonly config: CollaboratorConfig;
  private readonly model: LanguageModel | null;
  private readonly logger: Logger;

  constructor(config: CollaboratorConfig, logger: Logger) {
    this.config = config;
    this.model = createModel(config);
    this.logger = logger.child({ component: 'collaborator' });

    this.logger.info(
      { provider: config.provider, model: config.model, configured: this.model !== null },
      'Collaborator initialized'
    );
  }

  isConfigured(): boolean {
    return this.model !== null;
  }

  async invoke(request: CollaboratorRequest): Promise<string> {
    if (!this.model) {
      throw new ExternalServiceError('collaborator unavailable: missing API key');
    }

    const prompt = buildPrompt(request);
    const signal = AbortSignal.timeout(this.config.timeoutMs);
    const startTime = Date.now();

    this.logger.debug(
      { capability: request.capability, model: this.config.model },
      'Collaborator request'
    );

    let text: string;
    try {
      const result = await generateText({
        model: this.model,
        system: prompt.system,
        prompt: prompt.user,
        temperature: this.config.temperature,
        maxRetries: 0,
        abortSignal: signal,
      });
      text = result.text;
    } catch (error) {
      const durationMs = Date.now() - startTime;
      if (signal.aborted) {
        this.logger.warn({ capability: request.capability, durationMs }, 'Collaborator timed out');
        throw new TimeoutError('collaborator request', this.config.timeoutMs);
      }
      throw this.mapError(error, request.capability, durationMs);
    }

    this.logger.debug(
      { capability: request.capability, durationMs: Date.now() - startTime, chars: text.length },
      'Collaborator response'
    );

    if (!text.trim()) {
      throw new ExternalServiceError('collaborator returned an empty response');
    }
    return text;
  }

  private mapError(error: unknown, capability: string, durationMs: number): ExternalServiceError {
    const message = error instanceof Error ? error.message : String(error);
    // AI SDK's APICallError carries the upstream HTTP status
    const statusCode =
      error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number'
        ? error.statusCode
        : undefined;

    this.logger.warn({ capability, statusCode, error: message, durationMs }, 'Collaborator failed');

    return statusCode !== undefined
      ? new ExternalServiceError(`collaborator error (HTTP ${String(statusCode)}): ${message}`, statusCode)
      : new ExternalServiceError(`collaborator error: ${message}`);
  }
}
