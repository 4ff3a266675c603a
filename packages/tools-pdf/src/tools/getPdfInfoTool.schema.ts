import { z } from 'zod';

export const getPdfInfoToolInputSchema = z.object({
  file_path: z.string().describe('Absolute path to the PDF file.'),
});

export type GetPdfInfoToolInput = z.input<typeof getPdfInfoToolInputSchema>;
