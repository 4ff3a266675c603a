import {
  BaseContextSchema,
  type Logger,
  type Part,
  type Result,
  createLogger,
  defineTool,
  err,
  jsonPart,
  ok,
} from '@pdf-inspector/tools-core';
import { z } from 'zod';
import { envelopeSchema, errorEnvelope, toEnvelope } from '../envelope.js';
import { type ToolErrorInfo, describeFailure, invalidArgumentsFrom } from '../errors.js';
import { validatePath } from '../validation.js';
import { type WalkResult, walkPdfFiles } from '../walk.js';
import { listPdfsInDirectoryToolInputSchema } from './listPdfsInDirectoryTool.schema.js';

export const LIST_PDFS_IN_DIRECTORY_TOOL_NAME = 'list_pdfs_in_directory';

// Exactly one of size+modified, permission_error or error accompanies the location.
const PdfFileEntrySchema = z.object({
  filename: z.string(),
  full_path: z.string(),
  relative_path: z.string(),
  directory: z.string(),
  size: z.number().int().nonnegative().optional(),
  modified: z.number().optional(),
  permission_error: z.string().optional(),
  error: z.string().optional(),
});

const PdfListingSchema = z.object({
  search_directory: z.string(),
  pdf_count: z.number().int().nonnegative(),
  pdf_files: z.array(PdfFileEntrySchema),
});

export type PdfFileEntry = z.infer<typeof PdfFileEntrySchema>;
export type PdfListing = z.infer<typeof PdfListingSchema>;

export const ListPdfsInDirectoryToolOutputSchema = envelopeSchema(PdfListingSchema.shape);

function toPdfFileEntry(result: WalkResult): PdfFileEntry {
  switch (result.kind) {
    case 'ok':
      return { ...result.location, size: result.size, modified: result.modified };
    case 'permission-denied':
      return { ...result.location, permission_error: result.message };
    case 'error':
      return { ...result.location, error: result.message };
  }
}

/**
 * Lists every `.pdf` file (any case) below a directory. Files that cannot be
 * stat-ed are still listed, with the reason in place of size and time.
 */
export async function listPdfsInDirectory(
  directoryPath: string,
  logger: Logger = createLogger(LIST_PDFS_IN_DIRECTORY_TOOL_NAME),
): Promise<Result<PdfListing, ToolErrorInfo>> {
  const validation = await validatePath(directoryPath, 'directory');
  if (!validation.ok) {
    return validation;
  }

  try {
    const pdfFiles: PdfFileEntry[] = [];
    for await (const result of walkPdfFiles(directoryPath, logger)) {
      pdfFiles.push(toPdfFileEntry(result));
    }
    logger.debug(`Found ${pdfFiles.length} PDF file(s) under ${directoryPath}`);
    return ok({ search_directory: directoryPath, pdf_count: pdfFiles.length, pdf_files: pdfFiles });
  } catch (e: unknown) {
    return err(describeFailure(e, directoryPath, 'directory', 'Error listing PDFs'));
  }
}

export const listPdfsInDirectoryTool = defineTool({
  name: LIST_PDFS_IN_DIRECTORY_TOOL_NAME,
  description: 'Recursively lists the PDF files under a directory with their size and modification time.',
  inputSchema: listPdfsInDirectoryToolInputSchema,
  contextSchema: BaseContextSchema,
  execute: async ({ context, args }): Promise<Part[]> => {
    const parsed = listPdfsInDirectoryToolInputSchema.safeParse(args);
    if (!parsed.success) {
      return [
        jsonPart(errorEnvelope(invalidArgumentsFrom(parsed.error)), ListPdfsInDirectoryToolOutputSchema),
      ];
    }

    const logger = createLogger(LIST_PDFS_IN_DIRECTORY_TOOL_NAME, context.logLevel);
    const result = await listPdfsInDirectory(parsed.data.directory_path, logger);
    if (!result.ok) {
      logger.debug(`${result.error.code}: ${result.error.message}`);
    }
    return [jsonPart(toEnvelope(result), ListPdfsInDirectoryToolOutputSchema)];
  },
});
