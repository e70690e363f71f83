/**
 * Search actions: search_text, replace_text.
 */

import { z } from 'zod';
import { defineAction, type ActionDefinition } from '../gateway/action-registry.js';
import { replaceText, searchText } from '../runtime/search/search-engine.js';
import { resolveWorkspacePath, type ActionServices } from './shared.js';

const searchTextSchema = z
  .object({
    pattern: z.string().min(1),
    file_path: z.string().min(1).optional(),
    directory: z.string().min(1).optional(),
    case_sensitive: z.boolean().default(false),
    regex: z.boolean().default(false),
    max_results: z.number().int().positive().optional(),
  })
  .refine((input) => (input.file_path === undefined) !== (input.directory === undefined), {
    message: 'exactly one of file_path or directory is required',
  });

const replaceTextSchema = z.object({
  file_path: z.string().min(1),
  old_text: z.string().min(1),
  new_text: z.string(),
  count: z.number().int().min(-1).default(-1),
  backup: z.boolean().default(true),
});

export function createSearchActions(
  services: ActionServices
): Record<'search_text' | 'replace_text', ActionDefinition> {
  const root = services.config.workspace.root;
  const maxResultsCap = services.config.search.maxResults;

  return {
    search_text: defineAction({
      description: 'Search a file or directory tree for text or a regular expression',
      failureMessage: 'Failed to search text',
      schema: searchTextSchema,
      handler: async (input) => {
        const scope = resolveWorkspacePath(root, input.file_path ?? input.directory ?? '.');
        const result = await searchText({
          pattern: input.pattern,
          scope,
          caseSensitive: input.case_sensitive,
          regex: input.regex,
          maxResults: Math.min(input.max_results ?? maxResultsCap, maxResultsCap),
        });
        return {
          message: `Found ${String(result.total_matches)} matches`,
          data: { ...result },
        };
      },
    }),

    replace_text: defineAction({
      description: 'Replace literal text in a file, keeping a .bak of the previous content',
      failureMessage: 'Failed to replace text',
      schema: replaceTextSchema,
      handler: async (input, context) => {
        const result = await replaceText(
          resolveWorkspacePath(root, input.file_path),
          input.old_text,
          input.new_text,
          input.count,
          input.backup
        );
        if (result.replacements > 0) {
          context.logger.info(
            { filePath: result.file_path, replacements: result.replacements },
            'Text replaced'
          );
        }
        return {
          message: `Replaced ${String(result.replacements)} occurrences`,
          data: { ...result },
        };
      },
    }),
  };
}
