import { z } from 'zod';
import {
  DEFAULT_CHECK_DELAY,
  DEFAULT_DISCOVERY_DELAY,
  DEFAULT_HISTORY,
  DEFAULT_OUTPUT_PATH,
  DEFAULT_TEMPLATE_GROUP,
  DEFAULT_TRENDS
} from '../constants';

// ============================================
// Common Validators
// ============================================

const ZABBIX_TIME_PATTERN = /^(?:\d+[smhdw]?|\{\$[A-Z0-9_.]+\})$/;

export const zabbixTimeSchema = z
  .string()
  .trim()
  .regex(ZABBIX_TIME_PATTERN, 'must be a Zabbix time period such as 30s, 1h, 30d or {$MACRO}');

const requiredText = (label: string) =>
  z.string({ required_error: `${label} is required` }).trim().min(1, `${label} must not be empty`);

// ============================================
// Generator Validators
// ============================================

export const generatorOptionsSchema = z
  .object({
    mibFile: requiredText('mibFile'),
    module: requiredText('module'),
    output: z.string().trim().min(1).default(DEFAULT_OUTPUT_PATH),
    templateName: z.string().trim().min(1).optional(),
    group: z.string().trim().min(1).default(DEFAULT_TEMPLATE_GROUP),
    checkDelay: zabbixTimeSchema.default(DEFAULT_CHECK_DELAY),
    discoveryDelay: zabbixTimeSchema.default(DEFAULT_DISCOVERY_DELAY),
    history: zabbixTimeSchema.default(DEFAULT_HISTORY),
    trends: zabbixTimeSchema.default(DEFAULT_TRENDS),
    verbose: z.boolean().default(false)
  })
  .transform((options) => ({
    ...options,
    templateName: options.templateName ?? `${options.module} SNMP`
  }));

export type GeneratorOptions = z.output<typeof generatorOptionsSchema>;
