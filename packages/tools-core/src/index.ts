// src/index.ts for @pdf-inspector/tools-core
import { type ZodTypeAny, z } from 'zod';
import { LogLevelSchema } from './logger.js';

export type TextPart = { type: 'text'; value: string };

/** A structured value together with the zod schema it conforms to. */
export type JsonPart<T extends ZodTypeAny = ZodTypeAny> = {
  type: 'json';
  value: z.infer<T>;
  schema: T;
};

export type Part = TextPart | JsonPart;

/**
 * Context handed to every tool by the adaptor layer.
 * Server configuration ends up here after validation.
 */
export const BaseContextSchema = z.object({
  logLevel: LogLevelSchema.default('info'),
});
/** Options as supplied by the server, before defaults are applied. */
export type ToolExecuteOptions = z.input<typeof BaseContextSchema>;
/** The validated context a tool receives. */
export type ToolContext = z.infer<typeof BaseContextSchema>;

// --- Part Helper Functions ---

export function jsonPart<T extends ZodTypeAny>(value: z.infer<T>, schema: T): JsonPart<T> {
  return { type: 'json', value, schema };
}

export * from './defineTool.js';
export * from './typeGuards.js';
export * from './result.js';
export * from './logger.js';
