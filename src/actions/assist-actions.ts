/**
 * Code-assist actions backed by the AI collaborator.
 *
 * Each handler validates its input, forwards it to the collaborator and
 * relays the text verbatim.
 */

import { z } from 'zod';
import { defineAction, type ActionDefinition } from '../gateway/action-registry.js';
import { defaultTestFramework } from '../llm/prompts.js';
import type { ActionServices } from './shared.js';

type AssistAction =
  | 'analyze_code'
  | 'generate_code'
  | 'generate_tests'
  | 'refactor_code'
  | 'plan_task';

const analyzeCodeSchema = z.object({
  code: z.string().min(1),
  language: z.string().min(1),
  context: z.string().optional(),
});

const generateCodeSchema = z.object({
  description: z.string().min(1),
  language: z.string().min(1),
  context: z.string().optional(),
  existing_code: z.string().optional(),
});

const generateTestsSchema = z.object({
  code: z.string().min(1),
  language: z.string().min(1),
  test_framework: z.string().min(1).optional(),
});

const refactorCodeSchema = z.object({
  code: z.string().min(1),
  language: z.string().min(1),
  refactoring_type: z.string().min(1),
});

const planTaskSchema = z.object({
  task: z.string().min(1),
  context: z.union([z.string(), z.record(z.unknown())]).optional(),
  constraints: z.array(z.string()).optional(),
});

export function createAssistActions(services: ActionServices): Record<AssistAction, ActionDefinition> {
  const { collaborator } = services;

  return {
    analyze_code: defineAction({
      description: 'Review code for quality, bugs, performance and security',
      failureMessage: 'Failed to analyze code',
      schema: analyzeCodeSchema,
      handler: async (input) => {
        const analysis = await collaborator.invoke({
          capability: 'analyze_code',
          code: input.code,
          language: input.language,
          context: input.context,
        });
        return { message: 'Code analysis completed', data: { analysis } };
      },
    }),

    generate_code: defineAction({
      description: 'Generate code from a description',
      failureMessage: 'Failed to generate code',
      schema: generateCodeSchema,
      handler: async (input) => {
        const generatedCode = await collaborator.invoke({
          capability: 'generate_code',
          description: input.description,
          language: input.language,
          context: input.context,
          existingCode: input.existing_code,
        });
        return { message: 'Code generated successfully', data: { generated_code: generatedCode } };
      },
    }),

    generate_tests: defineAction({
      description: 'Generate unit tests for code',
      failureMessage: 'Failed to generate tests',
      schema: generateTestsSchema,
      handler: async (input) => {
        const testFramework = input.test_framework ?? defaultTestFramework(input.language);
        const testCode = await collaborator.invoke({
          capability: 'generate_tests',
          code: input.code,
          language: input.language,
          testFramework,
        });
        return {
          message: 'Tests generated successfully',
          data: { test_code: testCode, test_framework: testFramework },
        };
      },
    }),

    refactor_code: defineAction({
      description: 'Refactor code for a stated goal',
      failureMessage: 'Failed to refactor code',
      schema: refactorCodeSchema,
      handler: async (input) => {
        const refactoredCode = await collaborator.invoke({
          capability: 'refactor_code',
          code: input.code,
          language: input.language,
          refactoringType: input.refactoring_type,
        });
        return {
          message: 'Code refactored successfully',
          data: { refactored_code: refactoredCode, refactoring_type: input.refactoring_type },
        };
      },
    }),

    plan_task: defineAction({
      description: 'Break a task into an ordered plan',
      failureMessage: 'Failed to plan task',
      schema: planTaskSchema,
      handler: async (input) => {
        const plan = await collaborator.invoke({
          capability: 'plan_task',
          task: input.task,
          context: input.context,
          constraints: input.constraints,
        });
        return { message: 'Task plan created', data: { plan } };
      },
    }),
  };
}
