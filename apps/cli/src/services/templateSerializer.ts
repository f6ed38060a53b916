import { writeFile } from 'node:fs/promises';
import { stringify } from 'yaml';
import type { TemplateExport } from '@mib2template/shared';
import { TemplateWriteError } from '../errors';

/**
 * Render the export as YAML in declaration order. Line folding is disabled so
 * discovery expressions stay on one line.
 */
export function serializeTemplate(document: TemplateExport): string {
  return stringify(document, {
    indent: 2,
    lineWidth: 0,
    sortMapEntries: false
  });
}

export async function writeTemplate(document: TemplateExport, outputPath: string): Promise<void> {
  const content = serializeTemplate(document);
  try {
    await writeFile(outputPath, content, 'utf-8');
  } catch (error) {
    throw new TemplateWriteError(outputPath, error);
  }
}
