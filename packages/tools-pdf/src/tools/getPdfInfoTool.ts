import { readFile, stat } from 'node:fs/promises';
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
import type * as mupdf from 'mupdf';
import { z } from 'zod';
import { readInfoField, withPdfDocument } from '../engine.js';
import { envelopeSchema, errorEnvelope, toEnvelope } from '../envelope.js';
import { type ToolErrorInfo, describeFailure, invalidArgumentsFrom } from '../errors.js';
import { validatePath } from '../validation.js';
import { getPdfInfoToolInputSchema } from './getPdfInfoTool.schema.js';

export const GET_PDF_INFO_TOOL_NAME = 'get_pdf_info';

// Missing entries read as empty strings. Dates are the raw PDF strings.
const PdfMetadataSchema = z.object({
  title: z.string(),
  author: z.string(),
  subject: z.string(),
  creator: z.string(),
  producer: z.string(),
  creation_date: z.string(),
  modification_date: z.string(),
});

const PdfInfoSchema = z.object({
  file_path: z.string(),
  page_count: z.number().int().nonnegative(),
  metadata: PdfMetadataSchema,
  file_size: z.number().int().nonnegative(),
});

export type PdfMetadata = z.infer<typeof PdfMetadataSchema>;
export type PdfInfo = z.infer<typeof PdfInfoSchema>;

export const GetPdfInfoToolOutputSchema = envelopeSchema(PdfInfoSchema.shape);

function readMetadata(doc: mupdf.Document): PdfMetadata {
  return {
    title: readInfoField(doc, 'Title'),
    author: readInfoField(doc, 'Author'),
    subject: readInfoField(doc, 'Subject'),
    creator: readInfoField(doc, 'Creator'),
    producer: readInfoField(doc, 'Producer'),
    creation_date: readInfoField(doc, 'CreationDate'),
    modification_date: readInfoField(doc, 'ModDate'),
  };
}

/**
 * Reads the page count and info dictionary of a PDF, plus its size on disk.
 * The file name is not checked for a `.pdf` suffix; the content decides.
 */
export async function getPdfInfo(
  filePath: string,
  logger: Logger = createLogger(GET_PDF_INFO_TOOL_NAME),
): Promise<Result<PdfInfo, ToolErrorInfo>> {
  const validation = await validatePath(filePath, 'file');
  if (!validation.ok) {
    return validation;
  }

  try {
    const data = await readFile(filePath);
    const { pageCount, metadata } = withPdfDocument(data, (doc) => ({
      pageCount: doc.countPages(),
      metadata: readMetadata(doc),
    }));
    const { size } = await stat(filePath);
    logger.debug(`${filePath}: ${pageCount} page(s), ${size} byte(s)`);
    return ok({ file_path: filePath, page_count: pageCount, metadata, file_size: size });
  } catch (e: unknown) {
    return err(describeFailure(e, filePath, 'file', 'Error getting PDF info'));
  }
}

export const getPdfInfoTool = defineTool({
  name: GET_PDF_INFO_TOOL_NAME,
  description: 'Returns the page count, document metadata and file size of a PDF file.',
  inputSchema: getPdfInfoToolInputSchema,
  contextSchema: BaseContextSchema,
  execute: async ({ context, args }): Promise<Part[]> => {
    const parsed = getPdfInfoToolInputSchema.safeParse(args);
    if (!parsed.success) {
      return [jsonPart(errorEnvelope(invalidArgumentsFrom(parsed.error)), GetPdfInfoToolOutputSchema)];
    }

    const logger = createLogger(GET_PDF_INFO_TOOL_NAME, context.logLevel);
    const result = await getPdfInfo(parsed.data.file_path, logger);
    if (!result.ok) {
      logger.debug(`${result.error.code}: ${result.error.message}`);
    }
    return [jsonPart(toEnvelope(result), GetPdfInfoToolOutputSchema)];
  },
});
