import { Command, CommanderError } from 'commander';
import { generatorOptionsSchema, type GeneratorOptions } from '@mib2template/shared';
import { loadEnvConfig } from './config/validate';
import { ConfigValidationError, Mib2TemplateError } from './errors';
import { generateTemplate } from './services/pipeline';
import { writeTemplate } from './services/templateSerializer';
import {
  createSnmpTranslator,
  snmpTranslatorOptionsFromEnv,
  type MibTranslator,
  type SnmpTranslatorOptions
} from './services/translator';
import { createLogger, type Logger } from './utils/logger';

type CliFlags = {
  mibFile?: string;
  module?: string;
  output?: string;
  templateName?: string;
  group?: string;
  checkDelay?: string;
  discDelay?: string;
  history?: string;
  trends?: string;
  verbose?: boolean;
};

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  createTranslator?: (options: SnmpTranslatorOptions) => MibTranslator;
  /** Builds the logger once verbosity is known. */
  createLogger?: (verbose: boolean) => Logger;
}

export function createProgram(): Command {
  return new Command()
    .name('mib2template')
    .description('Generate a Zabbix 6.0 SNMP template (YAML) from a MIB file using snmptranslate.')
    .option('-f, --mib-file <path>', 'path to the MIB file')
    .option('-m, --module <name>', 'MIB module name, e.g. IF-MIB')
    .option('-o, --output <path>', 'output YAML file', 'template.yaml')
    .option('-N, --template-name <name>', 'template name (default: "<module> SNMP")')
    .option('-G, --group <name>', 'template group', 'Templates')
    .option('--check-delay <interval>', 'item polling interval', '1h')
    .option('--disc-delay <interval>', 'discovery rule interval', '1h')
    .option('--history <period>', 'history retention', '30d')
    .option('--trends <period>', 'trend retention for numeric items', '0')
    .option('-v, --verbose', 'print debug output', false)
    .exitOverride();
}

function parseOptions(flags: CliFlags): GeneratorOptions {
  const result = generatorOptionsSchema.safeParse({
    mibFile: flags.mibFile,
    module: flags.module,
    output: flags.output,
    templateName: flags.templateName,
    group: flags.group,
    checkDelay: flags.checkDelay,
    discoveryDelay: flags.discDelay,
    history: flags.history,
    trends: flags.trends,
    verbose: flags.verbose
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('\n');
    throw new ConfigValidationError(`Invalid options:\n${details}`);
  }
  return result.data;
}

/**
 * Parse argv, generate the template and write it. Resolves to the process exit
 * code; only unexpected errors reject.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const makeLogger = deps.createLogger ?? ((verbose: boolean) => createLogger({ verbose }));
  let logger = makeLogger(false);

  const program = createProgram().configureOutput({
    writeErr: (text) => logger.error(text.trim())
  });

  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  try {
    const env = loadEnvConfig(deps.env ?? process.env);
    const options = parseOptions(program.opts<CliFlags>());
    logger = makeLogger(options.verbose || env.MIB2TEMPLATE_VERBOSE);

    const translatorOptions = snmpTranslatorOptionsFromEnv(env, options, logger);
    const translator = (deps.createTranslator ?? createSnmpTranslator)(translatorOptions);

    const { document, summary } = await generateTemplate(options, translator, logger);
    await writeTemplate(document, options.output);

    logger.info(`Template YAML generated: ${options.output}`);
    logger.info(`Discovery rules: ${summary.discoveryRules}`);
    if (summary.valueMaps > 0) {
      logger.info(`Generated ${summary.valueMaps} value maps.`);
    }
    return 0;
  } catch (error) {
    if (error instanceof Mib2TemplateError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
}
