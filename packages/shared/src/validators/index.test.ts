import { describe, it, expect } from 'vitest';
import { generatorOptionsSchema, zabbixTimeSchema } from './index';

describe('validators', () => {
  describe('zabbixTimeSchema', () => {
    it('should accept suffixed periods', () => {
      for (const value of ['30s', '1h', '30d', '2w', '5m']) {
        expect(zabbixTimeSchema.safeParse(value).success).toBe(true);
      }
    });

    it('should accept bare numbers and user macros', () => {
      expect(zabbixTimeSchema.safeParse('0').success).toBe(true);
      expect(zabbixTimeSchema.safeParse('{$SNMP.INTERVAL}').success).toBe(true);
    });

    it('should reject unknown suffixes', () => {
      expect(zabbixTimeSchema.safeParse('1y').success).toBe(false);
      expect(zabbixTimeSchema.safeParse('hourly').success).toBe(false);
    });
  });

  describe('generatorOptionsSchema', () => {
    it('should apply defaults', () => {
      const result = generatorOptionsSchema.safeParse({
        mibFile: './IF-MIB.txt',
        module: 'IF-MIB'
      });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({
          mibFile: './IF-MIB.txt',
          module: 'IF-MIB',
          output: 'template.yaml',
          templateName: 'IF-MIB SNMP',
          group: 'Templates',
          checkDelay: '1h',
          discoveryDelay: '1h',
          history: '30d',
          trends: '0',
          verbose: false
        });
      }
    });

    it('should keep an explicit template name', () => {
      const result = generatorOptionsSchema.safeParse({
        mibFile: './IF-MIB.txt',
        module: 'IF-MIB',
        templateName: 'Network interfaces'
      });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.templateName).toBe('Network interfaces');
      }
    });

    it('should reject a missing module', () => {
      const result = generatorOptionsSchema.safeParse({ mibFile: './IF-MIB.txt' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].path).toEqual(['module']);
        expect(result.error.issues[0].message).toBe('module is required');
      }
    });

    it('should reject a blank mib file', () => {
      const result = generatorOptionsSchema.safeParse({ mibFile: '  ', module: 'IF-MIB' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].message).toBe('mibFile must not be empty');
      }
    });

    it('should reject an invalid history period', () => {
      const result = generatorOptionsSchema.safeParse({
        mibFile: './IF-MIB.txt',
        module: 'IF-MIB',
        history: 'forever'
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].path).toEqual(['history']);
      }
    });
  });
});
