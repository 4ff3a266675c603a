import { BaseContextSchema, LogLevelSchema, type ToolContext } from '@pdf-inspector/tools-core';
import yargs from 'yargs';
import { z } from 'zod';

/** Environment variables `PDF_INSPECTOR_<OPTION>` stand in for missing flags. */
export const ENV_PREFIX = 'PDF_INSPECTOR';

export const PackageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().default(''),
});
export type PackageInfo = z.infer<typeof PackageInfoSchema>;

/**
 * Parses the command line (without the node and script entries) into the
 * context every tool receives. Flags win over the environment.
 */
export async function loadToolContext(argv: string[], version: string): Promise<ToolContext> {
  const args = await yargs(argv)
    .scriptName('pdf-inspector-mcp')
    .env(ENV_PREFIX)
    .option('log-level', {
      choices: LogLevelSchema.options,
      default: 'info',
      description: 'Least severe level written to stderr',
    })
    .strict()
    .version(version)
    .help()
    .alias('h', 'help')
    .parseAsync();

  return BaseContextSchema.parse({ logLevel: args.logLevel });
}
