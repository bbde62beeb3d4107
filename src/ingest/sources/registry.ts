import * as fs from 'fs';
import type { SourceConfig } from '../../pipeline/types';
import { createLogger, errorMessage, type Logger } from '../../utils/logger';

export function parseSourceRegistry(text: string): SourceConfig[] {
  const sources = new Map<string, string>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const separator = line.indexOf(';');
    if (separator === -1) continue;
    const name = line.slice(0, separator).trim();
    const url = line.slice(separator + 1).trim();
    if (name && url) {
      sources.set(name, url);
    }
  }
  return Array.from(sources, ([name, url]) => ({ name, url }));
}

/**
 * Reads the `name;url` registry. A missing or unreadable file means no
 * sources are configured.
 */
export function loadSourceRegistry(
  filePath: string,
  logger: Logger = createLogger('SourceRegistry')
): SourceConfig[] {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      logger.warn(`Research sources file not found: ${filePath}`);
    } else {
      logger.error(`Error loading research sources from ${filePath}`, { error: errorMessage(error) });
    }
    return [];
  }

  const sources = parseSourceRegistry(text);
  logger.info(`Loaded ${sources.length} research sources`, {
    sources: sources.map((s) => s.name),
  });
  return sources;
}
