/**
 * Symbol classifier
 *
 * Turns the text `snmptranslate -Td` prints for one symbol into a SymbolRecord.
 * Each extraction pass is independent and total: on a mismatch it returns an
 * empty value instead of throwing.
 */

import { UNIT_HINTS, type EnumMapping, type SymbolRecord, type ValueTypeInfo } from '@mib2template/shared';
import type { MibTranslator } from './translator';
import { silentLogger, type Logger } from '../utils/logger';

// Ordered: substring matching takes the first hit.
const SNMP_TYPE_MAP: ReadonlyArray<readonly [string, ValueTypeInfo]> = [
  ['INTEGER', { type: 'FLOAT', units: '' }],
  ['Integer32', { type: 'FLOAT', units: '' }],
  ['Unsigned32', { type: 'FLOAT', units: '' }],
  ['Counter32', { type: 'FLOAT', units: '' }],
  ['Counter64', { type: 'FLOAT', units: '' }],
  ['Gauge32', { type: 'FLOAT', units: '' }],
  ['TimeTicks', { type: 'FLOAT', units: 's' }],
  ['OCTET STRING', { type: 'CHAR', units: '' }],
  ['OBJECT IDENTIFIER', { type: 'CHAR', units: '' }],
  ['IpAddress', { type: 'TEXT', units: '' }],
  ['BITS', { type: 'TEXT', units: '' }],
  ['Opaque', { type: 'TEXT', units: '' }],
  ['DisplayString', { type: 'CHAR', units: '' }],
  ['MacAddress', { type: 'CHAR', units: '' }],
  ['PhysAddress', { type: 'CHAR', units: '' }]
];

const SYNTAX_PATTERN = /SYNTAX\s+([^{\n]*?)\s*(?:\{|$)/m;
const DESCRIPTION_PATTERN = /DESCRIPTION\s+"([^"]*)"/;
const UNIT_HINT_PATTERN = /\(([^)]*(?:seconds|bytes|bits|percent)[^)]*)\)/i;
const ENUM_BLOCK_PATTERN = /SYNTAX\s+INTEGER\s*\{([^}]+)\}/;
const ENUM_PAIR_PATTERN = /^([^(]+)\(([^)]+)\)/;

export function extractSyntax(detail: string): string {
  const match = detail.match(SYNTAX_PATTERN);
  return match ? match[1].trim() : '';
}

export function extractDescription(detail: string): string {
  const match = detail.match(DESCRIPTION_PATTERN);
  if (!match) return '';
  return match[1].replace(/\n/g, ' ').replace(/\s+/g, ' ').trim();
}

function detectUnitHint(text: string): string | null {
  const match = text.match(UNIT_HINT_PATTERN);
  if (!match) return null;
  const hint = match[1].toLowerCase();
  const found = UNIT_HINTS.find(({ keyword }) => hint.includes(keyword));
  return found ? found.unit : null;
}

/**
 * Map an SNMP syntax to a Zabbix value type and default unit.
 * Exact lookup, then substring lookup, then keyword fallback; a parenthesised
 * unit hint in the syntax or the definition text overrides the unit.
 */
export function inferValueType(syntax: string, detail = ''): ValueTypeInfo {
  const entry =
    SNMP_TYPE_MAP.find(([snmpType]) => snmpType === syntax) ??
    SNMP_TYPE_MAP.find(([snmpType]) => syntax.includes(snmpType));

  let base: ValueTypeInfo;
  if (entry) {
    base = entry[1];
  } else if (['INTEGER', 'Counter', 'Gauge', 'Enum'].some((keyword) => syntax.includes(keyword))) {
    base = { type: 'FLOAT', units: '' };
  } else if (syntax.includes('STRING')) {
    base = { type: 'CHAR', units: '' };
  } else {
    base = { type: 'TEXT', units: '' };
  }

  const hinted = detectUnitHint(`${syntax} ${detail}`);
  return { type: base.type, units: hinted ?? base.units };
}

/**
 * Parent node from the `::= { ... parent(n) child }` line, e.g. `ifXEntry(1)`.
 * Empty when the line is missing.
 */
export function extractParentNode(detail: string): string {
  const assignment = detail.match(/::=\s*\{([^}]*)\}/);
  if (!assignment) return '';
  const nodes = assignment[1].trim().split(/\s+/);
  return nodes.length >= 2 ? nodes[nodes.length - 2] : '';
}

/**
 * Union of table heuristics. False positives and negatives are expected on
 * unusually authored MIBs.
 */
export function isTableColumn(symbol: string, oid: string, syntax: string, detail: string): boolean {
  const parts = oid.split('.');
  // <table>.1.<column>; a run of .1.1 is a scalar group such as system.sysDescr
  if (parts.length > 2 && parts[parts.length - 2] === '1' && parts[parts.length - 3] !== '1') {
    return true;
  }
  // Columns of a table at .1 in its group (ifXTable) only show through their entry parent.
  if (/Entry(?:\(\d+\))?$/.test(extractParentNode(detail))) {
    return true;
  }
  if (symbol.includes('Table') || symbol.includes('Entry')) {
    return true;
  }
  if (syntax.toUpperCase().includes('TABLE')) {
    return true;
  }
  return /[Aa] list of/.test(detail) || detail.toLowerCase().includes('table contains');
}

export function extractEnumMappings(detail: string): EnumMapping[] | null {
  const block = detail.match(ENUM_BLOCK_PATTERN);
  if (!block) return null;

  const mappings: EnumMapping[] = [];
  for (const part of block[1].split(',')) {
    const pair = part.trim().match(ENUM_PAIR_PATTERN);
    if (pair) {
      mappings.push({ value: pair[2].trim(), newvalue: pair[1].trim() });
    }
  }
  return mappings.length > 0 ? mappings : null;
}

/**
 * Classify one raw symbol. Returns null for symbols that are not
 * `MODULE::name` references or whose OID cannot be resolved.
 */
export async function classifySymbol(
  symbol: string,
  translator: MibTranslator,
  logger: Logger = silentLogger
): Promise<SymbolRecord | null> {
  if (!symbol.includes('::')) return null;

  const oid = await translator.resolveOid(symbol);
  if (!oid) return null;

  const fullName = (await translator.resolveName(symbol)) ?? symbol;
  const detail = (await translator.resolveDescription(symbol)) ?? '';

  const syntax = extractSyntax(detail);
  const { type, units } = inferValueType(syntax, detail);
  const enumMappings = extractEnumMappings(detail);
  if (enumMappings) {
    logger.info(`Value map found for ${symbol}`);
  }

  return {
    symbol,
    oid,
    fullName,
    description: extractDescription(detail),
    syntax,
    valueType: type,
    units,
    isTable: isTableColumn(symbol, oid, syntax, detail),
    enumMappings
  };
}

export async function classifySymbols(
  symbols: readonly string[],
  translator: MibTranslator,
  logger: Logger = silentLogger
): Promise<SymbolRecord[]> {
  const records: SymbolRecord[] = [];
  for (const symbol of symbols) {
    const record = await classifySymbol(symbol, translator, logger);
    if (record) {
      records.push(record);
    } else {
      logger.debug(`Skipped symbol ${symbol}`);
    }
  }
  return records;
}
