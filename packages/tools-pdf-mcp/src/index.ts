#!/usr/bin/env node
import { createRequire } from 'node:module';
import process from 'node:process';
import { startMcpServer } from '@pdf-inspector/tools-adaptor-mcp';
import { createLogger, errorMessageOf } from '@pdf-inspector/tools-core';
import { getPdfInfoTool, listPdfsInDirectoryTool, readPdfTextTool } from '@pdf-inspector/tools-pdf';
import { hideBin } from 'yargs/helpers';
import { PackageInfoSchema, loadToolContext } from './config.js';

const require = createRequire(import.meta.url);
const { name, version, description } = PackageInfoSchema.parse(require('../package.json'));

async function main(): Promise<void> {
  const context = await loadToolContext(hideBin(process.argv), version);
  await startMcpServer(
    {
      name,
      version,
      description,
      tools: [readPdfTextTool, getPdfInfoTool, listPdfsInDirectoryTool],
    },
    context,
  );
}

main().catch((error: unknown) => {
  createLogger(name, 'error').error(`Failed to start: ${errorMessageOf(error)}`);
  process.exit(1);
});
