/**
 * File actions: read_file, write_file, list_directory.
 */

import { z } from 'zod';
import { defineAction, type ActionDefinition } from '../gateway/action-registry.js';
import { listDirectory, readFile, writeFile } from '../runtime/files/file-mutator.js';
import { resolveWorkspacePath, type ActionServices } from './shared.js';

const readFileSchema = z.object({
  file_path: z.string().min(1),
  encoding: z.string().min(1).default('utf-8'),
});

const writeFileSchema = z.object({
  file_path: z.string().min(1),
  content: z.string(),
  encoding: z.string().min(1).default('utf-8'),
  backup: z.boolean().default(true),
});

const listDirectorySchema = z.object({
  directory: z.string().min(1).optional(),
});

export function createFileActions(
  services: ActionServices
): Record<'read_file' | 'write_file' | 'list_directory', ActionDefinition> {
  const root = services.config.workspace.root;

  return {
    read_file: defineAction({
      description: 'Read a text file',
      failureMessage: 'Failed to read file',
      schema: readFileSchema,
      handler: async (input) => {
        const result = await readFile(resolveWorkspacePath(root, input.file_path), input.encoding);
        return { message: 'File read successfully', data: { ...result } };
      },
    }),

    write_file: defineAction({
      description: 'Create or overwrite a file, keeping a .bak of the previous content',
      failureMessage: 'Failed to write file',
      schema: writeFileSchema,
      handler: async (input, context) => {
        const result = await writeFile(resolveWorkspacePath(root, input.file_path), input.content, {
          encoding: input.encoding,
          backup: input.backup,
        });
        context.logger.info(
          { filePath: result.file_path, bytes: result.bytes_written, backup: result.backup_path },
          'File written'
        );
        return { message: 'File written successfully', data: { ...result } };
      },
    }),

    list_directory: defineAction({
      description: 'List the immediate entries of a directory',
      failureMessage: 'Failed to list directory',
      schema: listDirectorySchema,
      handler: async (input) => {
        const directory = resolveWorkspacePath(root, input.directory ?? '.');
        const result = await listDirectory(directory);
        return { message: 'Directory listed successfully', data: { ...result } };
      },
    }),
  };
}
