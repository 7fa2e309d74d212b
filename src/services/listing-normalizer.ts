import sanitizeHtml from 'sanitize-html';
import { IncomingListing, NormalizedListing } from '../types/listing';

export const LISTING_SOURCE = 'drivehr';

/**
 * Tags allowed in listing descriptions
 */
const RICH_TEXT_OPTIONS: sanitizeHtml.IOptions = {
  allowedTags: [...sanitizeHtml.defaults.allowedTags, 'img', 'h1', 'h2'],
  allowedAttributes: {
    a: ['href', 'name', 'target', 'rel'],
    img: ['src', 'alt', 'title', 'width', 'height'],
  },
  allowedSchemes: ['http', 'https', 'mailto'],
};

const STRIP_ALL_OPTIONS: sanitizeHtml.IOptions = {
  allowedTags: [],
  allowedAttributes: {},
};

export interface NormalizeOptions {
  syncVersion: string;
  now: Date;
}

export function isListingObject(value: unknown): value is IncomingListing {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the first present field among `keys` as a string.
 * Earlier keys win even when their value is empty.
 */
export function pickField(job: IncomingListing, ...keys: string[]): string {
  for (const key of keys) {
    const value = job[key];
    if (value === undefined || value === null) continue;
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return '';
  }
  return '';
}

/**
 * sanitize-html escapes text nodes; plain-text fields store the decoded text
 */
function decodeBasicEntities(value: string): string {
  return value
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&amp;/g, '&');
}

/**
 * Single-line plain text: tags removed, whitespace collapsed
 */
export function sanitizeText(value: string): string {
  return decodeBasicEntities(sanitizeHtml(value, STRIP_ALL_OPTIONS))
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Multi-line plain text: tags removed, line breaks kept
 */
export function sanitizeTextarea(value: string): string {
  return decodeBasicEntities(sanitizeHtml(value, STRIP_ALL_OPTIONS))
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(line => line.replace(/[ \t]+/g, ' ').trim())
    .join('\n')
    .trim();
}

export function sanitizeRichText(value: string): string {
  return sanitizeHtml(value, RICH_TEXT_OPTIONS).trim();
}

/**
 * Absolute http(s) URL, or empty string
 */
export function sanitizeUrl(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) return '';
  try {
    const url = new URL(trimmed);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.href : '';
  } catch {
    return '';
  }
}

/**
 * Lenient date parsing; absent or unparseable dates fall back to `fallback`
 */
export function parseListingDate(value: string, fallback: Date): Date {
  if (!value.trim()) return fallback;
  const parsed = new Date(value.trim());
  return isNaN(parsed.getTime()) ? fallback : parsed;
}

/**
 * External job ID, or undefined when missing or empty
 */
export function readExternalId(job: IncomingListing): string | undefined {
  const id = job.id;
  if (typeof id === 'number' && Number.isFinite(id)) return String(id);
  if (typeof id === 'string' && id.trim()) return sanitizeText(id) || undefined;
  return undefined;
}

export function readTitle(job: IncomingListing): string | undefined {
  const title = job.title;
  if (typeof title !== 'string') return undefined;
  return sanitizeText(title) || undefined;
}

/**
 * Converts a validated incoming job into the field set written to the store
 */
export function normalizeListing(
  job: IncomingListing,
  externalId: string,
  title: string,
  options: NormalizeOptions
): NormalizedListing {
  const rawData: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(job)) {
    // Description is stored as content already
    if (key !== 'description') rawData[key] = value;
  }

  const postedDate = sanitizeText(pickField(job, 'postedDate', 'posted_date'));

  return {
    externalId,
    title,
    content: sanitizeRichText(pickField(job, 'description')),
    excerpt: sanitizeTextarea(pickField(job, 'summary')),
    department: sanitizeText(pickField(job, 'department')),
    location: sanitizeText(pickField(job, 'location')),
    jobType: sanitizeText(pickField(job, 'type', 'jobType')),
    employmentType: sanitizeText(pickField(job, 'employmentType')),
    salaryRange: sanitizeText(pickField(job, 'salaryRange', 'salary_range')),
    applyUrl: sanitizeUrl(pickField(job, 'applyUrl', 'apply_url')),
    postedDate,
    expiryDate: sanitizeText(pickField(job, 'expiryDate', 'expiry_date')),
    sourceUrl: sanitizeUrl(pickField(job, 'sourceUrl')),
    publishedAt: parseListingDate(postedDate, options.now),
    source: LISTING_SOURCE,
    rawData,
    syncVersion: options.syncVersion,
    lastUpdated: options.now,
  };
}
