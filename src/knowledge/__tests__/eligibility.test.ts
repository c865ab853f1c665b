import { describe, it, expect } from 'vitest';
import { promises as fs } from 'node:fs';
import type { TextExtractor } from '../../extraction/textExtractor';
import {
  EligibilityCache,
  EligibilityChecker,
  buildEligibilityQuestion,
  isEligibleAnswer,
  normalizeAnswer,
  normalizeQuery,
  parseAmount,
  parseBillItems,
  type EligibilitySearch,
} from '../eligibility';
import { UnsupportedFileType } from '../errors';
import type { ChangeListener, KnowledgeBaseChange, SearchResult } from '../types';

/** Answers from a lookup keyed on the quoted item; emits changes on demand. */
class FakeSearch implements EligibilitySearch {
  readonly questions: string[] = [];
  private readonly listeners = new Set<ChangeListener>();

  constructor(private readonly answers: Record<string, string | 'FAIL'>) {}

  async searchAll(question: string): Promise<SearchResult> {
    this.questions.push(question);
    const item = /'(.*?)'/.exec(question)?.[1] ?? '';
    const answer = this.answers[item];
    const details = { sources: [], totalSourcesChecked: 1, failedCollections: [] };
    if (answer === 'FAIL') {
      return {
        status: 'failed',
        answer: '',
        source: 'multiple_documents',
        confidence: 0,
        details,
        error: { code: 'completion_failed', message: 'Completion failed: timeout' },
      };
    }
    return { status: 'answered', answer: answer ?? 'No', source: 'policy.pdf', confidence: 0.7, details };
  }

  onChange(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(change: KnowledgeBaseChange): void {
    for (const l of this.listeners) l(change);
  }
}

const noExtractor: TextExtractor = {
  async extract() {
    throw new Error('not used');
  },
};

function makeChecker(search: FakeSearch, extractor: TextExtractor = noExtractor) {
  const cache = new EligibilityCache({ maxEntries: 100 });
  const checker = new EligibilityChecker({
    search,
    cache,
    extractor,
    cleanup: { maxAttempts: 2, delayMs: 1 },
  });
  return { cache, checker };
}

/* ============= Normalization ============= */

describe('answer normalization', () => {
  it.each([
    ['Yes', true],
    ['Yes.', true],
    [' YES ', true],
    ['yes!', true],
    ['No', false],
    ['Yes, but only partially', false],
    ['', false],
  ])('%j → %s', (answer, expected) => {
    expect(isEligibleAnswer(answer)).toBe(expected);
  });

  it('strips trailing punctuation and whitespace', () => {
    expect(normalizeAnswer('  Yes!!  ')).toBe('yes');
  });
});

describe('normalizeQuery', () => {
  it('lower-cases and uses american spelling', () => {
    expect(normalizeQuery('Summarise THIS documents')).toBe('summarize these documents');
  });

  it('builds the strict yes/no question', () => {
    expect(buildEligibilityQuestion('MRI Scan')).toBe(
      "is 'mri scan' payable under my insurance policy? answer with only 'yes' or 'no'. do not provide any explanation."
    );
  });
});

/* ============= Cache ============= */

describe('EligibilityCache', () => {
  it('evicts the least recently used entry', () => {
    const cache = new EligibilityCache({ maxEntries: 2 });
    cache.set('a', true);
    cache.set('b', false);
    expect(cache.get('a')).toBe(true);
    cache.set('c', true);

    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
    expect(cache.has('c')).toBe(true);
    expect(cache.size).toBe(2);
  });

  it('expires entries after the ttl', () => {
    let now = 1_000;
    const cache = new EligibilityCache({ maxEntries: 10, ttlMs: 500, now: () => now });
    cache.set('a', true);

    now = 1_499;
    expect(cache.get('a')).toBe(true);
    now = 1_500;
    expect(cache.has('a')).toBe(false);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('invalidates and clears', () => {
    const cache = new EligibilityCache({ maxEntries: 10 });
    cache.set('a', true);
    cache.set('b', false);

    expect(cache.invalidate('a')).toBe(true);
    expect(cache.invalidate('a')).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});

/* ============= Bill parsing ============= */

describe('parseAmount', () => {
  it.each([
    ['1200', 1200],
    ['Rs. 1,200.50', 1200.5],
    ['$45.00', 45],
    ['1.2.3', NaN],
  ])('%s → %s', (cell, expected) => {
    expect(parseAmount(cell)).toBe(expected);
  });
});

describe('parseBillItems', () => {
  it('reads pipe, tab and wide-space tables', () => {
    const text = [
      'Item | Amount',
      'Consultation | 500',
      'X-ray\tRs. 1,200',
      'Room rent    2 days    3000',
      '| Pharmacy | n/a | 250.75 |',
    ].join('\n');

    expect(parseBillItems(text)).toEqual([
      { description: 'Consultation', amount: 500 },
      { description: 'X-ray', amount: 1200 },
      { description: 'Room rent', amount: 2 },
      { description: 'Pharmacy', amount: 250.75 },
    ]);
  });

  it('reads csv extraction output and "description amount" lines', () => {
    const text = ['Headers: Item, Amount', 'Row 1: MRI Scan | 4500', 'Sheet: Claims', 'Dental cleaning 80'].join('\n');

    expect(parseBillItems(text)).toEqual([
      { description: 'MRI Scan', amount: 4500 },
      { description: 'Dental cleaning', amount: 80 },
    ]);
  });

  it('skips rows without a description or an amount', () => {
    expect(parseBillItems('Total due\n42 | 10\n\nNotes | none')).toEqual([]);
  });
});

/* ============= Checker ============= */

describe('EligibilityChecker', () => {
  it('totals eligible amounts and asks each description once', async () => {
    const search = new FakeSearch({ consultation: 'Yes.', 'x-ray': 'No' });
    const { checker } = makeChecker(search);

    const report = await checker.checkItems([
      { description: 'Consultation', amount: 500 },
      { description: 'X-ray', amount: 1200 },
      { description: 'Consultation', amount: 250.1 },
    ]);

    expect(report).toEqual({
      items: [
        { description: 'Consultation', amount: 500, eligible: true, cached: false, status: 'answered' },
        { description: 'X-ray', amount: 1200, eligible: false, cached: false, status: 'answered' },
        { description: 'Consultation', amount: 250.1, eligible: true, cached: true },
      ],
      totalAmount: 1950.1,
      totalEligibleAmount: 750.1,
    });
    expect(search.questions).toHaveLength(2);
  });

  it('keys the cache on the exact description', async () => {
    const search = new FakeSearch({ consultation: 'Yes', 'consultation ': 'No' });
    const { checker, cache } = makeChecker(search);

    const plain = await checker.classify('Consultation');
    const padded = await checker.classify('Consultation ');

    expect(plain).toEqual({ eligible: true, cached: false, status: 'answered' });
    expect(padded).toEqual({ eligible: false, cached: false, status: 'answered' });
    expect(cache.size).toBe(2);
    expect(search.questions).toHaveLength(2);
  });

  it('does not cache failed searches', async () => {
    const search = new FakeSearch({ mri: 'FAIL' });
    const { checker, cache } = makeChecker(search);

    const first = await checker.classify('MRI');
    await checker.classify('MRI');

    expect(first).toEqual({ eligible: false, cached: false, status: 'failed' });
    expect(cache.size).toBe(0);
    expect(search.questions).toHaveLength(2);
  });

  it('clears the cache when the knowledge base changes', async () => {
    const search = new FakeSearch({ consultation: 'Yes' });
    const { checker, cache } = makeChecker(search);
    await checker.classify('Consultation');
    expect(cache.size).toBe(1);

    search.emit({ kind: 'indexed', name: 'policy.pdf' });

    expect(cache.size).toBe(0);
    checker.close();
  });

  it('checks bill text', async () => {
    const search = new FakeSearch({ consultation: 'Yes' });
    const { checker } = makeChecker(search);

    const report = await checker.checkBill('Consultation | 500\nParking | 20');

    expect(report.totalEligibleAmount).toBe(500);
    expect(report.totalAmount).toBe(520);
  });

  it('extracts an uploaded bill from a temporary file and deletes it', async () => {
    const seen: string[] = [];
    const extractor: TextExtractor = {
      async extract(p) {
        seen.push(p);
        return fs.readFile(p, 'utf8');
      },
    };
    const search = new FakeSearch({ consultation: 'Yes' });
    const { checker } = makeChecker(search, extractor);

    const report = await checker.checkBillFile(Buffer.from('Consultation | 500'), 'bill.txt');

    expect(report.totalEligibleAmount).toBe(500);
    expect(seen).toHaveLength(1);
    expect(seen[0].endsWith('.txt')).toBe(true);
    await expect(fs.access(seen[0])).rejects.toThrow();
  });

  it('rejects unsupported uploads before writing anything', async () => {
    const { checker } = makeChecker(new FakeSearch({}));

    await expect(checker.checkBillFile(Buffer.from('x'), 'bill.exe')).rejects.toBeInstanceOf(
      UnsupportedFileType
    );
  });
});

describe('EligibilityChecker.checkBillFile', () => {
  it('reports unreadable uploads as extraction failures', async () => {
    const extractor: TextExtractor = {
      async extract() {
        throw new Error('bad xref table');
      },
    };
    const { checker } = makeChecker(new FakeSearch({}), extractor);

    await expect(checker.checkBillFile(Buffer.from('%PDF-'), 'bill.pdf')).rejects.toMatchObject({
      code: 'extraction_failed',
      message: 'No text could be extracted from bill.pdf: bad xref table',
    });
  });
});
