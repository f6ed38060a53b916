import type { MibTranslator } from '../services/translator';

/**
 * In-process stand-in for snmptranslate. Each entry answers the three
 * per-symbol lookups; `null` simulates a failed lookup.
 */
export interface FakeSymbolDefinition {
  oid: string | null;
  name?: string | null;
  detail?: string | null;
}

type FakeTranslatorOptions = {
  symbols?: string[];
  loadError?: Error;
  enumerateError?: Error;
};

export type FakeTranslator = MibTranslator & {
  calls: string[];
};

export function createFakeTranslator(
  definitions: Record<string, FakeSymbolDefinition>,
  options: FakeTranslatorOptions = {}
): FakeTranslator {
  const calls: string[] = [];

  const lookup = (symbol: string): FakeSymbolDefinition | undefined => definitions[symbol];

  return {
    calls,
    async loadModule() {
      calls.push('loadModule');
      if (options.loadError) throw options.loadError;
    },
    async enumerateSymbols() {
      calls.push('enumerateSymbols');
      if (options.enumerateError) throw options.enumerateError;
      return options.symbols ?? Object.keys(definitions);
    },
    async resolveOid(symbol) {
      calls.push(`resolveOid ${symbol}`);
      return lookup(symbol)?.oid ?? null;
    },
    async resolveName(symbol) {
      calls.push(`resolveName ${symbol}`);
      const definition = lookup(symbol);
      return definition?.name === undefined ? symbol : definition.name;
    },
    async resolveDescription(symbol) {
      calls.push(`resolveDescription ${symbol}`);
      return lookup(symbol)?.detail ?? null;
    }
  };
}

// ============================================
// Sample definitions
// ============================================

export const SYS_DESCR_DETAIL = `SNMPv2-MIB::sysDescr
sysDescr OBJECT-TYPE
  -- FROM\tSNMPv2-MIB
  -- TEXTUAL CONVENTION DisplayString
  SYNTAX\tOCTET STRING (0..255)
  DISPLAY-HINT\t"255a"
  MAX-ACCESS\tread-only
  STATUS\tcurrent
  DESCRIPTION\t"A textual description of the entity.  This value
            should include the full name and version
            identification of the system's hardware type."
::= { iso(1) org(3) dod(6) internet(1) mgmt(2) mib-2(1) system(1) 1 }
`;

export const SYS_UPTIME_DETAIL = `SNMPv2-MIB::sysUpTime
sysUpTime OBJECT-TYPE
  -- FROM\tSNMPv2-MIB
  SYNTAX\tTimeTicks
  MAX-ACCESS\tread-only
  STATUS\tcurrent
  DESCRIPTION\t"The time (in hundredths of a second) since the
            network management portion of the system was last
            re-initialized."
::= { iso(1) org(3) dod(6) internet(1) mgmt(2) mib-2(1) system(1) 3 }
`;

export const IF_DESCR_DETAIL = `IF-MIB::ifDescr
ifDescr OBJECT-TYPE
  -- FROM\tIF-MIB
  SYNTAX\tOCTET STRING (0..255)
  MAX-ACCESS\tread-only
  STATUS\tcurrent
  DESCRIPTION\t"A textual string containing information about the
            interface."
::= { iso(1) org(3) dod(6) internet(1) mgmt(2) mib-2(1) interfaces(2) ifTable(2) ifEntry(1) 2 }
`;

export const IF_OPER_STATUS_DETAIL = `IF-MIB::ifOperStatus
ifOperStatus OBJECT-TYPE
  -- FROM\tIF-MIB
  SYNTAX\tINTEGER {up(1), down(2)}
  MAX-ACCESS\tread-only
  STATUS\tcurrent
  DESCRIPTION\t"The current operational state of the interface."
::= { iso(1) org(3) dod(6) internet(1) mgmt(2) mib-2(1) interfaces(2) ifTable(2) ifEntry(1) 8 }
`;

export const IF_IN_OCTETS_DETAIL = `IF-MIB::ifInOctets
ifInOctets OBJECT-TYPE
  -- FROM\tIF-MIB
  SYNTAX\tCounter32
  MAX-ACCESS\tread-only
  STATUS\tcurrent
  DESCRIPTION\t"The total number of octets received on the
            interface (in bytes), including framing characters."
::= { iso(1) org(3) dod(6) internet(1) mgmt(2) mib-2(1) interfaces(2) ifTable(2) ifEntry(1) 10 }
`;

export const IF_NAME_DETAIL = `IF-MIB::ifName
ifName OBJECT-TYPE
  -- FROM\tIF-MIB
  -- TEXTUAL CONVENTION DisplayString
  SYNTAX\tOCTET STRING (0..255)
  MAX-ACCESS\tread-only
  STATUS\tcurrent
  DESCRIPTION\t"The textual name of the interface."
::= { iso(1) org(3) dod(6) internet(1) mgmt(2) mib-2(1) ifMIB(31) ifMIBObjects(1) ifXTable(1) ifXEntry(1) 1 }
`;

export const IF_HC_IN_OCTETS_DETAIL = `IF-MIB::ifHCInOctets
ifHCInOctets OBJECT-TYPE
  -- FROM\tIF-MIB
  SYNTAX\tCounter64
  MAX-ACCESS\tread-only
  STATUS\tcurrent
  DESCRIPTION\t"The total number of octets received on the interface,
            including framing characters."
::= { iso(1) org(3) dod(6) internet(1) mgmt(2) mib-2(1) ifMIB(31) ifMIBObjects(1) ifXTable(1) ifXEntry(1) 6 }
`;
