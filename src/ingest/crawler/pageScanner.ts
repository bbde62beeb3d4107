import * as cheerio from 'cheerio';
import type { HttpClient } from '../../utils/http';
import { createLogger, errorMessage, type Logger } from '../../utils/logger';
import { PAGE_TIMEOUT_MS } from '../../config/pipelineConfig';
import type { DiscoveredLink } from './types';

export const PHARMA_KEYWORDS = [
  'approval',
  'assessment',
  'authorization',
  'summary',
  'product',
  'clinical',
  'safety',
  'efficacy',
  'medicine',
  'drug',
  'therapeutic',
  'indication',
  'dosage',
  'prescribing',
  'regulatory',
  'guidance',
] as const;

export interface Anchor {
  /** Absolute http(s) URL. */
  href: string;
  text: string;
}

export interface ScannedPage {
  url: string;
  anchors: Anchor[];
}

export function resolveHref(href: string, pageUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#')) return null;
  try {
    const resolved = new URL(trimmed, pageUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
    resolved.hash = '';
    return resolved.toString();
  } catch {
    return null;
  }
}

export function isPdfLink(href: string): boolean {
  const lower = href.toLowerCase();
  if (lower.includes('filetype=pdf')) return true;
  const path = lower.split(/[?#]/)[0] ?? '';
  return path.endsWith('.pdf');
}

export function isPotentiallyRelevant(text: string, substanceName: string): boolean {
  const haystack = text.toLowerCase();
  const needle = substanceName.trim().toLowerCase();
  if (needle && haystack.includes(needle)) return true;
  return PHARMA_KEYWORDS.some((keyword) => haystack.includes(keyword));
}

export function sameNetworkLocation(a: string, b: string): boolean {
  try {
    return new URL(a).host === new URL(b).host;
  } catch {
    return false;
  }
}

export function extractAnchors(html: string, pageUrl: string): Anchor[] {
  const $ = cheerio.load(html);
  const anchors: Anchor[] = [];
  $('a[href]').each((_, el) => {
    const href = resolveHref($(el).attr('href') ?? '', pageUrl);
    if (!href) return;
    anchors.push({ href, text: $(el).text().replace(/\s+/g, ' ').trim() });
  });
  return anchors;
}

export function pdfLinksFromAnchors(
  anchors: Anchor[],
  pageUrl: string,
  substanceName: string
): DiscoveredLink[] {
  const links: DiscoveredLink[] = [];
  for (const anchor of anchors) {
    if (!isPdfLink(anchor.href)) continue;
    const title = anchor.text || 'Document';
    if (!isPotentiallyRelevant(`${title} ${anchor.href}`, substanceName)) continue;
    links.push({ url: anchor.href, title, found_on: pageUrl });
  }
  return links;
}

/**
 * Page-level primitives shared by every source strategy.
 */
export class PageScanner {
  constructor(
    private readonly http: HttpClient,
    private readonly logger: Logger = createLogger('PageScanner'),
    private readonly timeoutMs: number = PAGE_TIMEOUT_MS
  ) {}

  /** Returns null for any non-200 response. Network errors propagate. */
  async fetchPage(url: string): Promise<ScannedPage | null> {
    const res = await this.http.getText(url, { timeoutMs: this.timeoutMs });
    if (res.status !== 200) {
      this.logger.warn(`GET ${url} returned ${res.status}`);
      return null;
    }
    return { url: res.url, anchors: extractAnchors(res.body, res.url) };
  }

  /** Relevant PDF links of one page; failures yield an empty list. */
  async extractPdfLinks(url: string, substanceName: string): Promise<DiscoveredLink[]> {
    try {
      const page = await this.fetchPage(url);
      return page ? pdfLinksFromAnchors(page.anchors, page.url, substanceName) : [];
    } catch (error) {
      this.logger.warn(`Error extracting PDFs from ${url}`, { error: errorMessage(error) });
      return [];
    }
  }

  /**
   * Takes matched anchors of a listing page: PDFs are kept as they are, other
   * pages on the same host are followed once and their PDF links collected.
   * Stops as soon as `cap` distinct links are known.
   */
  async collectFromAnchors(
    page: ScannedPage,
    matched: Anchor[],
    substanceName: string,
    cap: number
  ): Promise<DiscoveredLink[]> {
    const found = new Map<string, DiscoveredLink>();
    const visited = new Set<string>([page.url]);

    const add = (link: DiscoveredLink) => {
      if (found.size < cap && !found.has(link.url)) {
        found.set(link.url, link);
      }
    };

    for (const anchor of matched) {
      if (found.size >= cap) break;

      if (isPdfLink(anchor.href)) {
        add({ url: anchor.href, title: anchor.text || 'Document', found_on: page.url });
        continue;
      }

      if (!sameNetworkLocation(anchor.href, page.url) || visited.has(anchor.href)) {
        continue;
      }
      visited.add(anchor.href);

      for (const link of await this.extractPdfLinks(anchor.href, substanceName)) {
        add(link);
      }
    }

    return Array.from(found.values());
  }
}
