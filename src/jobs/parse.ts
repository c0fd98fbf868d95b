import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import { MalformedEntryError } from "../lib/errors";
import type { EventImage, EventRecord, FeedEntry } from "../types/feed";

/** The few tree operations the parser needs, kept independent of cheerio's API */
export interface MarkupNode {
  findAll(selector: string): MarkupNode[];
  attr(name: string): string | null;
  text(): string;
  remove(): void;
}

function wrap($: cheerio.CheerioAPI, node: cheerio.Cheerio<Element>): MarkupNode {
  return {
    findAll: (selector) =>
      node
        .find(selector)
        .toArray()
        .map((el) => wrap($, $(el))),
    attr: (name) => node.attr(name) ?? null,
    text: () => node.text(),
    remove: () => {
      node.remove();
    },
  };
}

/** Parse an html fragment and return its <li> nodes in document order */
export function listItems(html: string): MarkupNode[] {
  const $ = cheerio.load(html, null, false);
  return $("li")
    .toArray()
    .map((el) => wrap($, $(el)));
}

const SOFT_HYPHEN = /\u00ad/g;
const LEADING_YEAR = /^(\d+)/;
const YEAR_ARTICLE = /\/wiki\/\d+$/;

// Years with fewer than 4 digits are padded with zeros in a span styled
// visibility:hidden. The span still has text, so it has to go before .text().
function isHidden(style: string): boolean {
  const s = style.replace(/\s+/g, "").toLowerCase();
  return s.includes("visibility:hidden") || s.includes("display:none");
}

function resolve(href: string, baseUrl?: string): string {
  if (!baseUrl) return href;
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
}

type SizeCandidate = { url: string; size: number };

/**
 * Pick the largest image out of `src` (counted as 1x) and a `srcset` of
 * "<url> <n>x" candidates. Ties go to the last listed candidate.
 */
export function pickLargestCandidate(
  src: string | null,
  srcset: string | null
): string | null {
  const candidates: SizeCandidate[] = [];
  if (src) candidates.push({ url: src, size: 1 });

  for (const part of (srcset ?? "").split(",")) {
    const [url, descriptor] = part.trim().split(/\s+/);
    if (!url) continue;
    if (!descriptor) {
      candidates.push({ url, size: 1 });
      continue;
    }
    const m = descriptor.match(/^(\d*\.?\d+)x$/);
    if (m) candidates.push({ url, size: parseFloat(m[1]) });
  }

  let best: SizeCandidate | null = null;
  for (const c of candidates) {
    if (!best || c.size >= best.size) best = c;
  }
  return best?.url ?? null;
}

function readImage(img: MarkupNode, baseUrl?: string): EventImage | null {
  const url = pickLargestCandidate(img.attr("src"), img.attr("srcset"));
  if (!url) return null;
  return { url: resolve(url, baseUrl), altText: img.attr("alt") };
}

/** Turn one <li> into an event record */
export function parseListItem(li: MarkupNode, baseUrl?: string): EventRecord {
  for (const span of li.findAll("span[style]")) {
    if (isHidden(span.attr("style") ?? "")) span.remove();
  }

  const text = li.text().replace(SOFT_HYPHEN, "").trim();
  const m = text.match(LEADING_YEAR);
  if (!m) throw new MalformedEntryError("Text does not start with a year", text);

  const record: EventRecord = {
    text,
    year: parseInt(m[1], 10),
    links: [],
    yearLink: null,
    image: null,
  };

  let firstRegularLinkFound = false;
  let imageLinkSeen = false;
  for (const a of li.findAll("a")) {
    const images = a.findAll("img");
    if (images.length > 0) {
      // only the first image link counts; later ones are neither image nor link
      if (!imageLinkSeen) record.image = readImage(images[0], baseUrl);
      imageLinkSeen = true;
      continue;
    }

    const href = a.attr("href");
    if (!href) continue;

    // a year link only counts if it comes before any other link
    if (!firstRegularLinkFound && !record.yearLink && YEAR_ARTICLE.test(href)) {
      record.yearLink = resolve(href, baseUrl);
      continue;
    }
    record.links.push(resolve(href, baseUrl));
    firstRegularLinkFound = true;
  }

  return record;
}

/**
 * Split a feed entry's summary into its events, one per <li>, in document
 * order. Schedule indices point into this list, so one bad item fails the
 * whole entry.
 */
export function parseFeedEntry(
  entry: FeedEntry,
  opts: { baseUrl?: string } = {}
): EventRecord[] {
  return listItems(entry.summary).map((li) => parseListItem(li, opts.baseUrl));
}
