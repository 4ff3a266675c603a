import type { AnyZodObject, ZodTypeAny, z } from 'zod';
import type { BaseContextSchema, Part } from './index.js';

/**
 * Defines the structure required to define a tool using the defineTool helper.
 * The context type is inferred from the provided contextSchema.
 * @template TInputSchema Zod object schema for input validation.
 * @template TContextSchema Zod schema for context validation. Defaults to BaseContextSchema.
 */
export interface ToolDefinition<
  TInputSchema extends AnyZodObject = AnyZodObject,
  TContextSchema extends ZodTypeAny = typeof BaseContextSchema,
> {
  /** Unique name of the tool, as seen by the calling host. */
  name: string;
  /** Description of what the tool does. */
  description: string;
  /** Zod schema the server uses to validate input arguments. */
  inputSchema: TInputSchema;
  /** Zod schema used to validate the context object. */
  contextSchema: TContextSchema;
  /**
   * The core execution logic for the tool.
   * Receives validated arguments and a context object validated against contextSchema.
   */
  execute(params: {
    context: z.infer<TContextSchema>;
    args: z.infer<TInputSchema>;
  }): Promise<Part[]>;
}

/**
 * A helper function to define a Tool with standardized wrapping logic.
 * The context type is inferred from the provided contextSchema.
 *
 * @param definition An object containing the tool's core properties and execute logic.
 * @returns A fully formed ToolDefinition object with wrapped execution logic.
 */
export function defineTool<
  TInputSchema extends AnyZodObject = AnyZodObject,
  TContextSchema extends ZodTypeAny = typeof BaseContextSchema,
>(
  definition: ToolDefinition<TInputSchema, TContextSchema>,
): ToolDefinition<TInputSchema, TContextSchema> {
  // Errors are not caught here; the adapter layer is responsible for anything a tool throws.
  const wrappedExecute = async (params: {
    context: z.infer<TContextSchema>;
    args: z.infer<TInputSchema>;
  }): Promise<Part[]> => {
    return definition.execute({ context: params.context, args: params.args });
  };

  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    contextSchema: definition.contextSchema,
    execute: wrappedExecute,
  };
}
