// Zabbix export
export const ZABBIX_EXPORT_VERSION = '6.0';
export const SNMP_AGENT_ITEM_TYPE = 'SNMP_AGENT';
export const SNMP_INDEX_MACRO = '{#SNMPINDEX}';

// Value types emitted for SNMP objects (numeric, short text, unstructured text)
export const ZABBIX_VALUE_TYPES = ['FLOAT', 'CHAR', 'TEXT'] as const;

// Value types that accept a trends setting
export const TREND_VALUE_TYPES = ['FLOAT'] as const;

// Unit hints recognised inside parentheses, checked in order
export const UNIT_HINTS = [
  { keyword: 'seconds', unit: 's' },
  { keyword: 'second', unit: 's' },
  { keyword: 'bytes', unit: 'B' },
  { keyword: 'bits', unit: 'b' },
  { keyword: 'percent', unit: '%' }
] as const;

// Discovery rule snmp_oid ceiling
export const DISCOVERY_EXPRESSION_MAX_LENGTH = 2000;
export const DISCOVERY_EXPRESSION_TRUNCATED_LENGTH = 1995;
export const DISCOVERY_EXPRESSION_TRUNCATION_MARKER = '...]';

// Namespace for name-based identifiers
export const TEMPLATE_UUID_NAMESPACE = '6ba7b810-9dad-11d1-80b4-00c04fd430c8';

// Generator defaults
export const DEFAULT_OUTPUT_PATH = 'template.yaml';
export const DEFAULT_TEMPLATE_GROUP = 'Templates';
export const DEFAULT_CHECK_DELAY = '1h';
export const DEFAULT_DISCOVERY_DELAY = '1h';
export const DEFAULT_HISTORY = '30d';
export const DEFAULT_TRENDS = '0';
