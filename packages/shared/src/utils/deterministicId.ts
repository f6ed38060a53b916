import { v5 as uuidv5 } from 'uuid';
import { TEMPLATE_UUID_NAMESPACE } from '../constants';

/**
 * Name-based UUID for export entities. The same seed always yields the same id,
 * rendered without dashes as the Zabbix importer expects.
 */
export function deterministicId(seed: string): string {
  return uuidv5(seed, TEMPLATE_UUID_NAMESPACE).replace(/-/g, '');
}
