import { z } from 'zod';

export const listPdfsInDirectoryToolInputSchema = z.object({
  directory_path: z.string().describe('Absolute path of the directory to search recursively.'),
});

export type ListPdfsInDirectoryToolInput = z.input<typeof listPdfsInDirectoryToolInputSchema>;
