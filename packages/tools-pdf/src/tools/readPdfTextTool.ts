import { readFile } from 'node:fs/promises';
import {
  BaseContextSchema,
  type Logger,
  type Part,
  type Result,
  createLogger,
  defineTool,
  err,
  errorMessageOf,
  jsonPart,
  ok,
} from '@pdf-inspector/tools-core';
import type * as mupdf from 'mupdf';
import { z } from 'zod';
import { withPdfDocument, withStructuredText } from '../engine.js';
import { envelopeSchema, errorEnvelope, toEnvelope } from '../envelope.js';
import { type ToolErrorInfo, describeFailure, invalidArgumentsFrom } from '../errors.js';
import { detectTables, parseLayoutLines } from '../tables.js';
import { validatePath } from '../validation.js';
import { readPdfTextToolInputSchema } from './readPdfTextTool.schema.js';

export const READ_PDF_TEXT_TOOL_NAME = 'read_pdf_text';

const PageResultSchema = z.object({
  page_number: z.number().int().positive(),
  text: z.string(),
  tables: z.array(z.array(z.array(z.string().nullable()))).optional(),
  table_extraction_error: z.string().optional(),
});

const PdfTextSchema = z.object({
  file_path: z.string(),
  total_pages: z.number().int().nonnegative(),
  pages: z.array(PageResultSchema),
  full_text: z.string(),
});

export type PageResult = z.infer<typeof PageResultSchema>;
export type PdfText = z.infer<typeof PdfTextSchema>;

export const ReadPdfTextToolOutputSchema = envelopeSchema(PdfTextSchema.shape);

export interface ReadPdfTextOptions {
  /** 1-based page numbers; `null` or omitted selects every page. */
  pageNumbers?: number[] | null;
  extractTables?: boolean;
}

/**
 * Maps requested 1-based page numbers to 0-based indices, keeping caller order
 * and duplicates and silently dropping anything outside `1..totalPages`.
 */
export function selectPageIndices(totalPages: number, pageNumbers?: number[] | null): number[] {
  if (pageNumbers == null) {
    return Array.from({ length: totalPages }, (_, index) => index);
  }
  return pageNumbers
    .filter((page) => Number.isInteger(page) && page >= 1 && page <= totalPages)
    .map((page) => page - 1);
}

function readPage(doc: mupdf.Document, index: number, extractTables: boolean): PageResult {
  return withStructuredText(doc, index, (stext) => {
    const page: PageResult = { page_number: index + 1, text: stext.asText().trimEnd() };
    if (extractTables) {
      // A page whose layout cannot be analysed still returns its text.
      try {
        page.tables = detectTables(parseLayoutLines(stext.asJSON()));
      } catch (e: unknown) {
        page.tables = [];
        page.table_extraction_error = errorMessageOf(e);
      }
    }
    return page;
  });
}

/**
 * Extracts the text of a PDF, page by page, optionally with the tables found on each page.
 * Pages are returned in the order requested; `full_text` joins them with a blank line.
 */
export async function readPdfText(
  filePath: string,
  options: ReadPdfTextOptions = {},
  logger: Logger = createLogger(READ_PDF_TEXT_TOOL_NAME),
): Promise<Result<PdfText, ToolErrorInfo>> {
  const validation = await validatePath(filePath, 'pdf-file');
  if (!validation.ok) {
    return validation;
  }

  try {
    const data = await readFile(filePath);
    const text = withPdfDocument(data, (doc) => {
      const totalPages = doc.countPages();
      const indices = selectPageIndices(totalPages, options.pageNumbers);
      logger.debug(`Reading ${indices.length} of ${totalPages} page(s) from ${filePath}`);
      const pages = indices.map((index) => readPage(doc, index, options.extractTables ?? false));
      return {
        file_path: filePath,
        total_pages: totalPages,
        pages,
        full_text: pages.map((page) => page.text).join('\n\n'),
      };
    });
    return ok(text);
  } catch (e: unknown) {
    return err(describeFailure(e, filePath, 'file', 'Error reading PDF'));
  }
}

export const readPdfTextTool = defineTool({
  name: READ_PDF_TEXT_TOOL_NAME,
  description:
    'Extracts text from a PDF file, optionally limited to some pages and with table detection.',
  inputSchema: readPdfTextToolInputSchema,
  contextSchema: BaseContextSchema,
  execute: async ({ context, args }): Promise<Part[]> => {
    const parsed = readPdfTextToolInputSchema.safeParse(args);
    if (!parsed.success) {
      return [jsonPart(errorEnvelope(invalidArgumentsFrom(parsed.error)), ReadPdfTextToolOutputSchema)];
    }

    const logger = createLogger(READ_PDF_TEXT_TOOL_NAME, context.logLevel);
    const { file_path, page_numbers, extract_tables } = parsed.data;
    const result = await readPdfText(
      file_path,
      { pageNumbers: page_numbers, extractTables: extract_tables },
      logger,
    );
    if (!result.ok) {
      logger.debug(`${result.error.code}: ${result.error.message}`);
    }
    return [jsonPart(toEnvelope(result), ReadPdfTextToolOutputSchema)];
  },
});
