// src/index.ts for @pdf-inspector/tools-pdf

export {
  readPdfTextTool,
  readPdfText,
  selectPageIndices,
  ReadPdfTextToolOutputSchema,
  READ_PDF_TEXT_TOOL_NAME,
  type ReadPdfTextOptions,
  type PdfText,
  type PageResult,
} from './tools/readPdfTextTool.js';
export { readPdfTextToolInputSchema, type ReadPdfTextToolInput } from './tools/readPdfTextTool.schema.js';

export {
  getPdfInfoTool,
  getPdfInfo,
  GetPdfInfoToolOutputSchema,
  GET_PDF_INFO_TOOL_NAME,
  type PdfInfo,
  type PdfMetadata,
} from './tools/getPdfInfoTool.js';
export { getPdfInfoToolInputSchema, type GetPdfInfoToolInput } from './tools/getPdfInfoTool.schema.js';

export {
  listPdfsInDirectoryTool,
  listPdfsInDirectory,
  ListPdfsInDirectoryToolOutputSchema,
  LIST_PDFS_IN_DIRECTORY_TOOL_NAME,
  type PdfFileEntry,
  type PdfListing,
} from './tools/listPdfsInDirectoryTool.js';
export {
  listPdfsInDirectoryToolInputSchema,
  type ListPdfsInDirectoryToolInput,
} from './tools/listPdfsInDirectoryTool.schema.js';

export * from './errors.js';
export * from './envelope.js';
export * from './validation.js';
export * from './tables.js';
export * from './walk.js';
export { withPdfDocument, withStructuredText, readInfoField, type InfoKey } from './engine.js';
