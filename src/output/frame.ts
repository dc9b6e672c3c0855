import type { OutputFormat } from '../types/config.js';

/**
 * Frame one document for a shared destination: YAML documents are closed by
 * a `---` separator, every document ends with a newline.
 */
export function frameDocument(content: string, format: OutputFormat): string {
  return `${content}${format === 'yaml' ? '---' : ''}\n`;
}
