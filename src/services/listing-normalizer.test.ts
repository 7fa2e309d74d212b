import { describe, it, expect } from 'vitest';
import {
  normalizeListing,
  parseListingDate,
  pickField,
  readExternalId,
  readTitle,
  sanitizeRichText,
  sanitizeText,
  sanitizeTextarea,
  sanitizeUrl,
} from './listing-normalizer';

const now = new Date('2024-05-01T12:00:00.000Z');

describe('pickField', () => {
  it('should prefer the first present key', () => {
    expect(pickField({ type: 'Full-time', jobType: 'Contract' }, 'type', 'jobType')).toBe('Full-time');
    expect(pickField({ jobType: 'Contract' }, 'type', 'jobType')).toBe('Contract');
  });

  it('should keep an empty value of an earlier key', () => {
    expect(pickField({ salaryRange: '', salary_range: '$100k' }, 'salaryRange', 'salary_range')).toBe('');
  });

  it('should skip null values', () => {
    expect(pickField({ applyUrl: null, apply_url: 'https://example.com' }, 'applyUrl', 'apply_url')).toBe(
      'https://example.com'
    );
  });

  it('should stringify scalars and drop structured values', () => {
    expect(pickField({ department: 42 }, 'department')).toBe('42');
    expect(pickField({ department: { name: 'Ops' } }, 'department')).toBe('');
    expect(pickField({}, 'department')).toBe('');
  });
});

describe('sanitizers', () => {
  it('should strip tags and collapse whitespace in plain text', () => {
    expect(sanitizeText('  <b>Senior</b>\n  Engineer ')).toBe('Senior Engineer');
  });

  it('should keep ampersands as text', () => {
    expect(sanitizeText('R&D Team')).toBe('R&D Team');
  });

  it('should keep line breaks in multi-line text', () => {
    expect(sanitizeTextarea('Line one\n<i>Line</i>   two')).toBe('Line one\nLine two');
  });

  it('should remove scripts from rich text and keep formatting', () => {
    expect(sanitizeRichText('<p>Hello <strong>team</strong></p><script>alert(1)</script>')).toBe(
      '<p>Hello <strong>team</strong></p>'
    );
  });

  it('should drop javascript: links from rich text', () => {
    expect(sanitizeRichText('<a href="javascript:alert(1)">apply</a>')).toBe('<a>apply</a>');
  });

  it('should allow only absolute http(s) URLs', () => {
    expect(sanitizeUrl(' https://example.com/jobs/1 ')).toBe('https://example.com/jobs/1');
    expect(sanitizeUrl('javascript:alert(1)')).toBe('');
    expect(sanitizeUrl('/relative/path')).toBe('');
    expect(sanitizeUrl('')).toBe('');
  });
});

describe('parseListingDate', () => {
  it('should parse ISO dates', () => {
    expect(parseListingDate('2024-03-01T09:30:00Z', now)).toEqual(new Date('2024-03-01T09:30:00.000Z'));
  });

  it('should fall back for empty or unparseable values', () => {
    expect(parseListingDate('', now)).toBe(now);
    expect(parseListingDate('next tuesday', now)).toBe(now);
  });
});

describe('readExternalId and readTitle', () => {
  it('should accept string and numeric IDs', () => {
    expect(readExternalId({ id: 'job-1' })).toBe('job-1');
    expect(readExternalId({ id: 42 })).toBe('42');
  });

  it('should reject missing or blank IDs', () => {
    expect(readExternalId({})).toBeUndefined();
    expect(readExternalId({ id: '   ' })).toBeUndefined();
    expect(readExternalId({ id: '<b></b>' })).toBeUndefined();
    expect(readExternalId({ id: true })).toBeUndefined();
  });

  it('should sanitize titles and reject blank ones', () => {
    expect(readTitle({ title: '<em>Data</em> Analyst' })).toBe('Data Analyst');
    expect(readTitle({ title: '' })).toBeUndefined();
    expect(readTitle({ title: 7 })).toBeUndefined();
  });
});

describe('normalizeListing', () => {
  it('should map aliased fields and keep raw data without the description', () => {
    const job = {
      id: 'job-1',
      title: 'Engineer',
      description: '<p>Build</p>',
      summary: 'Short summary',
      department: 'Engineering',
      location: 'Remote',
      jobType: 'Full-time',
      salary_range: '$100k - $120k',
      apply_url: 'https://example.com/apply/1',
      posted_date: '2024-04-15T00:00:00Z',
      expiry_date: '2024-06-15',
    };

    expect(normalizeListing(job, 'job-1', 'Engineer', { syncVersion: '1.0.0', now })).toEqual({
      externalId: 'job-1',
      title: 'Engineer',
      content: '<p>Build</p>',
      excerpt: 'Short summary',
      department: 'Engineering',
      location: 'Remote',
      jobType: 'Full-time',
      employmentType: '',
      salaryRange: '$100k - $120k',
      applyUrl: 'https://example.com/apply/1',
      postedDate: '2024-04-15T00:00:00Z',
      expiryDate: '2024-06-15',
      sourceUrl: '',
      publishedAt: new Date('2024-04-15T00:00:00.000Z'),
      source: 'drivehr',
      rawData: {
        id: 'job-1',
        title: 'Engineer',
        summary: 'Short summary',
        department: 'Engineering',
        location: 'Remote',
        jobType: 'Full-time',
        salary_range: '$100k - $120k',
        apply_url: 'https://example.com/apply/1',
        posted_date: '2024-04-15T00:00:00Z',
        expiry_date: '2024-06-15',
      },
      syncVersion: '1.0.0',
      lastUpdated: now,
    });
  });

  it('should publish at the sync time when no posted date is given', () => {
    const listing = normalizeListing({ id: '1', title: 'T' }, '1', 'T', { syncVersion: '1.0.0', now });
    expect(listing.publishedAt).toBe(now);
  });
});
