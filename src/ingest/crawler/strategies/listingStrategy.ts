import type { Anchor } from '../pageScanner';
import type { DiscoveredLink, SourceSearchContext, SourceStrategy } from '../types';

function containsAny(text: string, needles: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return needles.some((needle) => needle.length > 0 && lower.includes(needle.toLowerCase()));
}

/**
 * A source whose landing page lists documents or document pages. Subclasses
 * decide which URL to open and which anchors are worth following.
 */
export abstract class ListingStrategy implements SourceStrategy {
  abstract readonly name: string;

  /** Keywords that make an anchor worth following besides the substance name. */
  protected abstract readonly followKeywords: readonly string[];

  protected landingUrl(context: SourceSearchContext): string {
    return context.source.url;
  }

  protected follows(anchor: Anchor, substanceName: string): boolean {
    return containsAny(anchor.text, [substanceName, ...this.followKeywords]);
  }

  async search(context: SourceSearchContext): Promise<DiscoveredLink[]> {
    const page = await context.scanner.fetchPage(this.landingUrl(context));
    if (!page) return [];

    const matched = page.anchors.filter((anchor) => this.follows(anchor, context.substanceName));
    return context.scanner.collectFromAnchors(
      page,
      matched,
      context.substanceName,
      context.maxCandidates
    );
  }
}
