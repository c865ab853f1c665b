import { describe, it, expect } from 'vitest';
import {
  resolveCollection,
  tryResolveCollection,
  baseName,
  stripExtension,
  type ResolverEntry,
} from '../identifierResolver';
import { IdentifierNotFound } from '../errors';

const entries: ResolverEntry[] = [
  { path: 'pdfs/Policy.pdf', collectionName: 'doc_Policy_ab12cd34' },
  { path: '/data/docs/Claims Guide.docx', collectionName: 'doc_Claims_Guide_0f0f0f0f' },
];

/* ============= resolveCollection ============= */

describe('resolveCollection', () => {
  it('resolves every identifier form to the same collection', () => {
    for (const id of ['pdfs/Policy.pdf', 'Policy.pdf', 'policy.pdf', 'Policy', 'doc_Policy_ab12cd34']) {
      expect(resolveCollection(id, entries)).toBe('doc_Policy_ab12cd34');
    }
  });

  it('matches the stored path case-insensitively', () => {
    expect(resolveCollection('PDFS/POLICY.PDF', entries)).toBe('doc_Policy_ab12cd34');
  });

  it('matches collection names case-insensitively', () => {
    expect(resolveCollection('DOC_CLAIMS_GUIDE_0F0F0F0F', entries)).toBe(
      'doc_Claims_Guide_0f0f0f0f'
    );
  });

  it('trims surrounding whitespace', () => {
    expect(resolveCollection('  claims guide  ', entries)).toBe('doc_Claims_Guide_0f0f0f0f');
  });

  it('prefers an earlier rule over a later one', () => {
    const tricky: ResolverEntry[] = [
      { path: 'a/report.txt', collectionName: 'doc_report_11111111' },
      { path: 'b/other.txt', collectionName: 'report' },
    ];
    // "report" is a collection name (rule 2) and a stem (rule 4); rule 2 wins.
    expect(resolveCollection('report', tricky)).toBe('report');
  });

  it('throws IdentifierNotFound when nothing matches', () => {
    expect(() => resolveCollection('nonexistent', entries)).toThrow(IdentifierNotFound);
  });

  it('throws IdentifierNotFound for a blank identifier', () => {
    expect(() => resolveCollection('   ', entries)).toThrow(IdentifierNotFound);
  });
});

describe('tryResolveCollection', () => {
  it('returns null instead of throwing', () => {
    expect(tryResolveCollection('nonexistent', entries)).toBeNull();
  });
});

/* ============= helpers ============= */

describe('path helpers', () => {
  it('takes basenames across separators', () => {
    expect(baseName('C:\\docs\\Policy.pdf')).toBe('Policy.pdf');
    expect(baseName('pdfs/Policy.pdf')).toBe('Policy.pdf');
  });

  it('strips the last extension only', () => {
    expect(stripExtension('data.v2.json')).toBe('data.v2');
    expect(stripExtension('.env')).toBe('.env');
  });
});
