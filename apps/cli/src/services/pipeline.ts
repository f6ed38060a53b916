import type { SymbolRecord } from '@mib2template/shared';
import { EmptyMibError } from '../errors';
import { silentLogger, type Logger } from '../utils/logger';
import { classifySymbols } from './symbolClassifier';
import { buildTemplate, type TemplateBuildOptions, type TemplateBuildResult } from './templateBuilder';
import type { MibTranslator } from './translator';

export interface GenerateTemplateResult extends TemplateBuildResult {
  symbols: readonly string[];
  records: readonly SymbolRecord[];
}

/**
 * Load the module, classify every enumerated symbol and build the template.
 * Nothing is written here; the caller decides where the document goes.
 */
export async function generateTemplate(
  options: TemplateBuildOptions,
  translator: MibTranslator,
  logger: Logger = silentLogger
): Promise<GenerateTemplateResult> {
  await translator.loadModule();

  logger.info(`Processing MIB: ${options.module}`);
  const symbols = await translator.enumerateSymbols();
  if (symbols.length === 0) {
    throw new EmptyMibError('No symbols found to process.');
  }

  const records = await classifySymbols(symbols, translator, logger);
  logger.info(`Processing complete. ${records.length} valid symbols.`);
  if (records.length === 0) {
    throw new EmptyMibError('No valid symbols were processed from the MIB.');
  }

  const { document, summary } = buildTemplate(records, options);
  logger.info(`Scalar items found: ${summary.scalarItems}`);
  logger.info(`Table columns found: ${summary.tableColumns}`);
  for (const ruleName of summary.truncatedRules) {
    logger.warn(`Discovery expression too long for ${ruleName}; truncated.`);
  }

  return { document, summary, symbols, records };
}
