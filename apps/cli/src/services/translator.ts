/**
 * MIB translator adapter
 *
 * Wraps the net-snmp `snmptranslate` utility behind a capability interface so the
 * classifier and builder never see process handling. Module load and symbol
 * enumeration failures are fatal; per-symbol lookups degrade to `null`.
 */

import type { EnvConfig } from '../config/validate';
import { MibLoadError, SymbolEnumerationError, TranslatorNotFoundError } from '../errors';
import type { Logger } from '../utils/logger';
import { CommandNotFoundError, CommandTimeoutError, runCommand, type CommandResult } from '../utils/runCommand';

export interface MibTranslator {
  /** Verify the module loads; throws when it does not. */
  loadModule(): Promise<void>;
  /** Raw symbol list for the module; throws on failure. */
  enumerateSymbols(): Promise<string[]>;
  /** Numeric OID, e.g. `.1.3.6.1.2.1.1.3`. */
  resolveOid(symbol: string): Promise<string | null>;
  /** Fully qualified name, e.g. `SNMPv2-MIB::sysUpTime`. */
  resolveName(symbol: string): Promise<string | null>;
  /** Detailed definition block with SYNTAX and DESCRIPTION clauses. */
  resolveDescription(symbol: string): Promise<string | null>;
}

export type SnmpTranslatorOptions = {
  mibFile: string;
  module: string;
  command: string;
  loadTimeoutMs: number;
  enumerateTimeoutMs: number;
  symbolTimeoutMs: number;
  logger: Logger;
};

export function snmpTranslatorOptionsFromEnv(
  config: EnvConfig,
  target: { mibFile: string; module: string },
  logger: Logger
): SnmpTranslatorOptions {
  return {
    mibFile: target.mibFile,
    module: target.module,
    command: config.SNMPTRANSLATE_BIN,
    loadTimeoutMs: config.MIB_LOAD_TIMEOUT_MS,
    enumerateTimeoutMs: config.MIB_ENUM_TIMEOUT_MS,
    symbolTimeoutMs: config.MIB_SYMBOL_TIMEOUT_MS,
    logger
  };
}

export function parseSymbolList(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export function createSnmpTranslator(options: SnmpTranslatorOptions): MibTranslator {
  const { mibFile, module, command, logger } = options;

  async function translateSymbol(args: string[], symbol: string): Promise<string | null> {
    try {
      const result = await runCommand(command, [...args, '-m', mibFile, symbol], {
        timeoutMs: options.symbolTimeoutMs
      });
      if (result.code !== 0) {
        logger.debug(`${command} ${args.join(' ')} ${symbol} exited with ${result.code}: ${result.stderr.trim()}`);
        return null;
      }
      return result.stdout;
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        throw new TranslatorNotFoundError(command);
      }
      if (error instanceof CommandTimeoutError) {
        logger.warn(`Timed out processing symbol: ${symbol}`);
        return null;
      }
      logger.debug(`Failed to translate ${symbol}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  function trimmedOrNull(output: string | null): string | null {
    const value = output?.trim() ?? '';
    return value.length > 0 ? value : null;
  }

  return {
    async loadModule() {
      let result: CommandResult;
      try {
        result = await runCommand(command, ['-T', 'o', '-m', mibFile, module], {
          timeoutMs: options.loadTimeoutMs
        });
      } catch (error) {
        if (error instanceof CommandNotFoundError) {
          throw new TranslatorNotFoundError(command);
        }
        if (error instanceof CommandTimeoutError) {
          throw new MibLoadError(`Timed out loading MIB '${module}' from '${mibFile}'.`);
        }
        throw error;
      }

      if (result.code !== 0) {
        throw new MibLoadError(`Error loading MIB: ${result.stderr.trim()}`);
      }
      logger.info(`MIB '${module}' loaded from '${mibFile}'`);
    },

    async enumerateSymbols() {
      let result: CommandResult;
      try {
        result = await runCommand(command, ['-T', 'l', '-m', mibFile, module], {
          timeoutMs: options.enumerateTimeoutMs
        });
      } catch (error) {
        if (error instanceof CommandNotFoundError) {
          throw new TranslatorNotFoundError(command);
        }
        if (error instanceof CommandTimeoutError) {
          throw new SymbolEnumerationError(`Timed out listing symbols of MIB '${module}'.`);
        }
        throw error;
      }

      if (result.code !== 0) {
        throw new SymbolEnumerationError(`Error listing MIB symbols: ${result.stderr.trim()}`);
      }

      const symbols = parseSymbolList(result.stdout);
      logger.info(`Found ${symbols.length} symbols in the MIB.`);
      return symbols;
    },

    async resolveOid(symbol) {
      return trimmedOrNull(await translateSymbol(['-On'], symbol));
    },

    async resolveName(symbol) {
      return trimmedOrNull(await translateSymbol([], symbol));
    },

    async resolveDescription(symbol) {
      return translateSymbol(['-Td'], symbol);
    }
  };
}
