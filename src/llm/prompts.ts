/**
 * Prompt templates for the collaborator capabilities.
 */

export type Capability =
  | 'analyze_code'
  | 'generate_code'
  | 'generate_tests'
  | 'refactor_code'
  | 'plan_task';

export type CollaboratorRequest =
  | {
      capability: 'analyze_code';
      code: string;
      language: string;
      context?: string | undefined;
    }
  | {
      capability: 'generate_code';
      description: string;
      language: string;
      context?: string | undefined;
      existingCode?: string | undefined;
    }
  | {
      capability: 'generate_tests';
      code: string;
      language: string;
      testFramework: string;
    }
  | {
      capability: 'refactor_code';
      code: string;
      language: string;
      refactoringType: string;
    }
  | {
      capability: 'plan_task';
      task: string;
      context?: string | Record<string, unknown> | undefined;
      constraints?: string[] | undefined;
    };

export interface Prompt {
  system: string;
  user: string;
}

const DEFAULT_TEST_FRAMEWORKS: Record<string, string> = {
  python: 'pytest',
  javascript: 'jest',
  typescript: 'jest',
  java: 'junit',
  csharp: 'nunit',
  go: 'testing',
};

const FALLBACK_TEST_FRAMEWORK = 'pytest';

export function defaultTestFramework(language: string): string {
  return DEFAULT_TEST_FRAMEWORKS[language.trim().toLowerCase()] ?? FALLBACK_TEST_FRAMEWORK;
}

function fence(language: string, code: string): string {
  return `\`\`\`${language}\n${code}\n\`\`\``;
}

function renderContext(context: string | Record<string, unknown> | undefined, fallback: string): string {
  if (context === undefined || context === '') return fallback;
  return typeof context === 'string' ? context : JSON.stringify(context, null, 2);
}

/**
 * Build the system and user messages for a collaborator request.
 */
export function buildPrompt(request: CollaboratorRequest): Prompt {
  switch (request.capability) {
    case 'analyze_code':
      return {
        system: [
          `You are an expert code analyzer. Analyze the following ${request.language} code and provide:`,
          '1. Code quality assessment',
          '2. Potential bugs or issues',
          '3. Performance improvements',
          '4. Best practices recommendations',
          '5. Security concerns',
          '',
          'Code to analyze:',
          fence(request.language, request.code),
          '',
          `Context: ${renderContext(request.context, 'No additional context provided')}`,
          '',
          'Provide a detailed analysis in JSON format with sections for quality, bugs, performance, best_practices, and security.',
        ].join('\n'),
        user: 'Please analyze this code thoroughly.',
      };

    case 'generate_code': {
      const lines = [
        `You are an expert ${request.language} developer. Generate clean, efficient, and well-documented code based on the description.`,
        '',
        'Requirements:',
        `- Language: ${request.language}`,
        `- Description: ${request.description}`,
        `- Context: ${renderContext(request.context, 'No additional context')}`,
      ];
      if (request.existingCode) {
        lines.push('', 'Existing code to extend/modify:', fence(request.language, request.existingCode));
      }
      lines.push('', 'Provide only the code without explanations, wrapped in code blocks.');
      return { system: lines.join('\n'), user: 'Generate the requested code.' };
    }

    case 'generate_tests':
      return {
        system: [
          `You are an expert in writing unit tests. Generate comprehensive unit tests for the following ${request.language} code.`,
          '',
          'Code to test:',
          fence(request.language, request.code),
          '',
          `Test framework: ${request.testFramework}`,
          '',
          'Requirements:',
          '- Cover all functions/methods',
          '- Test edge cases',
          '- Test error conditions',
          '- Use descriptive test names',
          '- Include setup and teardown if needed',
          '',
          'Provide only the test code without explanations.',
        ].join('\n'),
        user: 'Generate comprehensive unit tests.',
      };

    case 'refactor_code':
      return {
        system: [
          `You are an expert code refactoring specialist. Refactor the following ${request.language} code for: ${request.refactoringType}`,
          '',
          'Original code:',
          fence(request.language, request.code),
          '',
          'Requirements:',
          '- Maintain functionality',
          '- Improve code quality',
          '- Follow best practices',
          '- Add proper documentation',
          '',
          'Provide the refactored code with a brief explanation of changes made.',
        ].join('\n'),
        user: 'Refactor this code according to the specified type.',
      };

    case 'plan_task': {
      const lines = [
        'You are a senior software engineer. Break the following task into an ordered, actionable plan.',
        '',
        `Task: ${request.task}`,
        `Context: ${renderContext(request.context, 'No additional context')}`,
      ];
      if (request.constraints && request.constraints.length > 0) {
        lines.push('', 'Constraints:', ...request.constraints.map((c) => `- ${c}`));
      }
      lines.push(
        '',
        'For each step give a short title, what to do, and how to verify it. Call out risks and open questions at the end.'
      );
      return { system: lines.join('\n'), user: 'Produce the plan.' };
    }
  }
}
