import { z } from 'zod';

export const readPdfTextToolInputSchema = z.object({
  file_path: z.string().describe('Absolute path to the PDF file.'),
  // 1-based. Numbers outside the document are ignored; order and duplicates are kept.
  page_numbers: z
    .array(z.number().int())
    .nullish()
    .describe('Pages to read, 1-based and in the order given. Omit to read every page.'),
  extract_tables: z
    .boolean()
    .default(false)
    .describe('Also detect tables on each selected page.'),
});

export type ReadPdfTextToolInput = z.input<typeof readPdfTextToolInputSchema>;
