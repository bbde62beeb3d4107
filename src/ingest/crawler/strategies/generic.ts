import { pdfLinksFromAnchors } from '../pageScanner';
import type { DiscoveredLink, SourceSearchContext, SourceStrategy } from '../types';

/** Unknown sources: relevant PDF links of the landing page, nothing followed. */
export class GenericStrategy implements SourceStrategy {
  readonly name = 'generic';

  async search(context: SourceSearchContext): Promise<DiscoveredLink[]> {
    const page = await context.scanner.fetchPage(context.source.url);
    if (!page) return [];
    return pdfLinksFromAnchors(page.anchors, page.url, context.substanceName);
  }
}
