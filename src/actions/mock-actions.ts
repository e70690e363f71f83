/**
 * Mock action: create_mock.
 */

import { z } from 'zod';
import { defineAction, type ActionDefinition } from '../gateway/action-registry.js';
import { generateMock, type JsonValue } from '../runtime/mock/mock-generator.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const createMockSchema = z.object({
  mock_type: z.enum(['object', 'list', 'api_response']),
  mock_data: z.record(jsonValueSchema),
  count: z.number().int().min(0).max(1000).default(3),
  status_code: z.number().int().min(100).max(599).default(200),
});

export function createMockActions(): Record<'create_mock', ActionDefinition> {
  return {
    create_mock: defineAction({
      description: 'Generate mock data from a placeholder template',
      failureMessage: 'Failed to create mock',
      schema: createMockSchema,
      handler: async (input) => {
        const mock = generateMock(input.mock_type, input.mock_data, {
          count: input.count,
          statusCode: input.status_code,
        });
        return { message: 'Mock data created', data: { mock_type: input.mock_type, mock } };
      },
    }),
  };
}
