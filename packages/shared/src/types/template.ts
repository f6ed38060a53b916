import type { ZABBIX_VALUE_TYPES } from '../constants';

// ============================================
// MIB Symbol Types
// ============================================

export type ZabbixValueType = typeof ZABBIX_VALUE_TYPES[number];

export interface EnumMapping {
  value: string;
  newvalue: string;
}

export interface ValueTypeInfo {
  type: ZabbixValueType;
  units: string;
}

export interface SymbolRecord {
  readonly symbol: string;
  readonly oid: string;
  readonly fullName: string;
  readonly description: string;
  readonly syntax: string;
  readonly valueType: ZabbixValueType;
  readonly units: string;
  readonly isTable: boolean;
  readonly enumMappings: readonly EnumMapping[] | null;
}

// ============================================
// Zabbix Export Types
// ============================================

export interface ValueMapRef {
  name: string;
}

export interface ValueMap {
  uuid: string;
  name: string;
  mappings: EnumMapping[];
}

export interface TemplateItem {
  uuid: string;
  name: string;
  type: 'SNMP_AGENT';
  snmp_oid: string;
  key: string;
  delay: string;
  history: string;
  description: string;
  value_type?: ZabbixValueType;
  trends?: string;
  units?: string;
  valuemap?: ValueMapRef;
}

export type ItemPrototype = TemplateItem;

export interface DiscoveryRule {
  uuid: string;
  name: string;
  delay: string;
  key: string;
  type: 'SNMP_AGENT';
  snmp_oid: string;
  item_prototypes: ItemPrototype[];
}

export interface TemplateGroupRef {
  name: string;
}

export interface Template {
  uuid: string;
  template: string;
  name: string;
  description: string;
  groups: TemplateGroupRef[];
  items: TemplateItem[];
  discovery_rules: DiscoveryRule[];
  graphs: unknown[];
  triggers: unknown[];
  dashboards: unknown[];
}

export interface TemplateExport {
  zabbix_export: {
    version: string;
    templates: Template[];
    valuemaps?: ValueMap[];
  };
}
