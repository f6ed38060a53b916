/**
 * Template builder
 *
 * Maps classified MIB symbols onto a Zabbix template export: scalars become
 * items, table columns are grouped by their table OID into discovery rules.
 * Pure; every identifier is derived from a stable seed.
 */

import {
  DISCOVERY_EXPRESSION_MAX_LENGTH,
  DISCOVERY_EXPRESSION_TRUNCATED_LENGTH,
  DISCOVERY_EXPRESSION_TRUNCATION_MARKER,
  SNMP_AGENT_ITEM_TYPE,
  SNMP_INDEX_MACRO,
  TREND_VALUE_TYPES,
  ZABBIX_EXPORT_VERSION,
  deterministicId,
  sanitizeName,
  type DiscoveryRule,
  type GeneratorOptions,
  type ItemPrototype,
  type SymbolRecord,
  type Template,
  type TemplateExport,
  type TemplateItem,
  type ValueMap
} from '@mib2template/shared';

export type TemplateBuildOptions = Pick<
  GeneratorOptions,
  'module' | 'templateName' | 'group' | 'checkDelay' | 'discoveryDelay' | 'history' | 'trends'
>;

export interface TableGroup {
  name: string;
  oid: string;
  columns: SymbolRecord[];
}

export interface TemplateBuildSummary {
  scalarItems: number;
  tableColumns: number;
  discoveryRules: number;
  valueMaps: number;
  truncatedRules: string[];
}

export interface TemplateBuildResult {
  document: TemplateExport;
  summary: TemplateBuildSummary;
}

const TREND_TYPES: ReadonlySet<string> = new Set(TREND_VALUE_TYPES);

// ============================================
// Naming
// ============================================

/** Part after the last `::`, e.g. `ifDescr` for `IF-MIB::ifDescr`. */
export function symbolLeafName(fullName: string): string {
  const parts = fullName.split('::');
  return parts[parts.length - 1];
}

/** Leaf name without any instance suffix. */
export function columnName(fullName: string): string {
  return symbolLeafName(fullName).split('.')[0];
}

export function valueMapName(fullName: string): string {
  return `SNMP ${columnName(fullName)} (from MIB)`;
}

function itemKey(fullName: string, suffix = ''): string {
  return sanitizeName(`${fullName.replaceAll('::', '.')}${suffix}`);
}

// ============================================
// Value maps
// ============================================

/**
 * One value map per distinct name. A later symbol with the same name replaces
 * the mappings of an earlier one but keeps its position.
 */
export function collectValueMaps(records: readonly SymbolRecord[]): ValueMap[] {
  const valueMaps = new Map<string, ValueMap>();

  for (const record of records) {
    if (!record.enumMappings) continue;
    const name = valueMapName(record.fullName);
    valueMaps.set(name, {
      uuid: deterministicId(`valuemap_${record.oid}_${symbolLeafName(record.fullName)}`),
      name,
      mappings: record.enumMappings.map((mapping) => ({ ...mapping }))
    });
  }

  return [...valueMaps.values()];
}

// ============================================
// Items
// ============================================

function applyValueSettings(item: TemplateItem, record: SymbolRecord, options: TemplateBuildOptions): TemplateItem {
  item.value_type = record.valueType;
  if (TREND_TYPES.has(record.valueType)) {
    item.trends = options.trends;
  }
  if (record.units) {
    item.units = record.units;
  }
  if (record.enumMappings) {
    item.valuemap = { name: valueMapName(record.fullName) };
  }
  return item;
}

export function createItem(record: SymbolRecord, options: TemplateBuildOptions): TemplateItem {
  const name = symbolLeafName(record.fullName);

  return applyValueSettings(
    {
      uuid: deterministicId(`item_${record.oid}_${name}`),
      name,
      type: SNMP_AGENT_ITEM_TYPE,
      snmp_oid: record.oid,
      key: itemKey(record.fullName),
      delay: options.checkDelay,
      history: options.history,
      description: record.description || 'No description available from MIB'
    },
    record,
    options
  );
}

export function createItemPrototype(
  record: SymbolRecord,
  tableName: string,
  options: TemplateBuildOptions
): ItemPrototype {
  const column = columnName(record.fullName);

  return applyValueSettings(
    {
      uuid: deterministicId(`prototype_${record.oid}_${column}`),
      name: `${column}.${SNMP_INDEX_MACRO}`,
      type: SNMP_AGENT_ITEM_TYPE,
      snmp_oid: `${record.oid}.${SNMP_INDEX_MACRO}`,
      key: itemKey(record.fullName, `[${SNMP_INDEX_MACRO}]`),
      delay: options.checkDelay,
      history: options.history,
      description: record.description || `Column ${column} from table ${tableName}`
    },
    record,
    options
  );
}

// ============================================
// Discovery rules
// ============================================

/** Group columns by table OID (column OID minus `.1.<column>`), first-seen order. */
export function groupColumnsByTable(columns: readonly SymbolRecord[]): TableGroup[] {
  const tables = new Map<string, TableGroup>();

  for (const column of columns) {
    const parts = column.oid.split('.');
    if (parts.length <= 2) continue;

    const tableParts = parts.slice(0, -2);
    const tableOid = tableParts.join('.');
    let table = tables.get(tableOid);
    if (!table) {
      table = { name: `Table_${tableParts.slice(-2).join('_')}`, oid: tableOid, columns: [] };
      tables.set(tableOid, table);
    }
    table.columns.push(column);
  }

  return [...tables.values()];
}

export function buildDiscoveryExpression(columns: readonly SymbolRecord[]): { expression: string; truncated: boolean } {
  const macros = columns.map(
    (column) => `{#${sanitizeName(columnName(column.fullName)).toUpperCase()}},${column.oid}`
  );
  const expression = `discovery[${macros.join(',')}]`;

  if (expression.length > DISCOVERY_EXPRESSION_MAX_LENGTH) {
    return {
      expression: expression.slice(0, DISCOVERY_EXPRESSION_TRUNCATED_LENGTH) + DISCOVERY_EXPRESSION_TRUNCATION_MARKER,
      truncated: true
    };
  }
  return { expression, truncated: false };
}

export function createDiscoveryRule(
  table: TableGroup,
  options: TemplateBuildOptions
): { rule: DiscoveryRule; truncated: boolean } | null {
  const prototypes = table.columns.map((column) => createItemPrototype(column, table.name, options));
  if (prototypes.length === 0) return null;

  const { expression, truncated } = buildDiscoveryExpression(table.columns);

  return {
    rule: {
      uuid: deterministicId(`discovery_${table.oid}_${table.name}`),
      name: table.name,
      delay: options.discoveryDelay,
      key: sanitizeName(`discovery.${table.name.replace(/ /g, '_')}`),
      type: SNMP_AGENT_ITEM_TYPE,
      snmp_oid: expression,
      item_prototypes: prototypes
    },
    truncated
  };
}

// ============================================
// Template
// ============================================

export function buildTemplate(records: readonly SymbolRecord[], options: TemplateBuildOptions): TemplateBuildResult {
  const scalars = records.filter((record) => !record.isTable);
  const columns = records.filter((record) => record.isTable);

  const discoveryRules: DiscoveryRule[] = [];
  const truncatedRules: string[] = [];
  for (const table of groupColumnsByTable(columns)) {
    const built = createDiscoveryRule(table, options);
    if (!built) continue;
    discoveryRules.push(built.rule);
    if (built.truncated) {
      truncatedRules.push(built.rule.name);
    }
  }

  const template: Template = {
    uuid: deterministicId(`template_${options.templateName}`),
    template: options.templateName,
    name: options.templateName,
    description: `Template generated from MIB ${options.module} by mib2template`,
    groups: [{ name: options.group }],
    items: scalars.map((scalar) => createItem(scalar, options)),
    discovery_rules: discoveryRules,
    graphs: [],
    triggers: [],
    dashboards: []
  };

  const valueMaps = collectValueMaps(records);
  const document: TemplateExport = {
    zabbix_export: {
      version: ZABBIX_EXPORT_VERSION,
      templates: [template],
      ...(valueMaps.length > 0 ? { valuemaps: valueMaps } : {})
    }
  };

  return {
    document,
    summary: {
      scalarItems: template.items.length,
      tableColumns: columns.length,
      discoveryRules: discoveryRules.length,
      valueMaps: valueMaps.length,
      truncatedRules
    }
  };
}
