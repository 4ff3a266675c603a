import type { Result } from '@pdf-inspector/tools-core';
import { type ZodRawShape, z } from 'zod';
import type { ToolErrorInfo } from './errors.js';

export type SuccessEnvelope<T extends object> = { success: true } & T;
export type ErrorEnvelope = { success: false; error: string };
/** The `{ success, ... }` wrapper every tool answers with. */
export type Envelope<T extends object> = SuccessEnvelope<T> | ErrorEnvelope;

export const ErrorEnvelopeSchema = z.object({
  success: z.literal(false),
  error: z.string(),
});

/** Output schema of a tool: its payload under `success: true`, or the error form. */
export function envelopeSchema<T extends ZodRawShape>(payload: T) {
  return z.union([z.object({ success: z.literal(true) }).extend(payload), ErrorEnvelopeSchema]);
}

export function errorEnvelope(error: ToolErrorInfo): ErrorEnvelope {
  return { success: false, error: error.message };
}

export function toEnvelope<T extends object>(result: Result<T, ToolErrorInfo>): Envelope<T> {
  if (!result.ok) {
    return errorEnvelope(result.error);
  }
  return { success: true as const, ...result.value };
}
