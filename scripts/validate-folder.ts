/**
 * Validate a folder of patient PDFs against a master spreadsheet.
 *
 *   npm run validate-folder -- <master.xlsx> <pdf-folder> [output.csv]
 */

import logger from 'jet-logger';
import dotenv from 'dotenv';
import path from 'path';

import { readEnv } from '../src/common/constants/ENV';
import { createLlmClient } from '../src/config/openai';
import { ConfigurationError } from '../src/services/errors';
import { DiscrepancyComparator } from '../src/services/discrepancyComparator';
import { pdfTextExtractor } from '../src/services/textExtractor';
import { parseCliArgs, validateFolder } from '../src/services/folderValidation';

// Load environment variables
dotenv.config({ path: path.join(__dirname, '../.env') });

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const env = readEnv();
  const client = createLlmClient(env);

  const comparator = new DiscrepancyComparator(client, {
    model: env.OPENAI_MODEL,
    timeoutMs: env.COMPARATOR_TIMEOUT_MS,
    promptTextLimit: env.PROMPT_TEXT_LIMIT,
  });

  const { summary, reportPath } = await validateFolder(
    args,
    { extractor: pdfTextExtractor, comparator },
    {
      concurrency: env.COMPARATOR_CONCURRENCY,
      onProgress: ({ completed, total, filename }) => {
        logger.info(`Processing ${filename} (${completed}/${total})`);
      },
    },
  );

  logger.info('================================================================================');
  logger.info(`📊 Total: ${summary.total}`);
  logger.info(`✅ Clean: ${summary.clean}`);
  logger.info(`⚠️ With data errors: ${summary.withDiscrepancies}`);
  logger.info(`❓ Unmatched: ${summary.unmatched}`);
  logger.info(`❌ Failed: ${summary.errored}`);
  logger.info(`📄 Report: ${reportPath}`);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.err(`❌ ${error.message}`);
    error.issues.forEach((issue) => logger.err(`   - ${issue}`));
  } else {
    logger.err(error, true);
  }
  process.exit(1);
});
