const UNSAFE_KEY_CHARS = /[^a-zA-Z0-9_\-.{}#[\]]/g;

/**
 * Replace every character Zabbix does not accept in an item key with `_`.
 * Macro braces, `#` and square brackets survive so `{#SNMPINDEX}` keys stay intact.
 */
export function sanitizeName(name: string): string {
  return name.replace(UNSAFE_KEY_CHARS, '_');
}
