import { acceptArticle, isRecent, isRelevant } from '@/modules/articleFilter';
import { ArticleFields, CandidateResult } from '@/interfaces/article';
import { RelevanceClassifier, RelevanceVerdict } from '@/interfaces/relevance';

jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const NOW = Date.parse('2026-10-19T12:00:00Z');

const fields: ArticleFields = {
  headline: 'State court blocks new map',
  source: 'Example Wire',
  summary: 'A judge paused the redistricting plan.',
  url: 'https://ground.news/article/court-map',
};

const candidate = (start: string | null): CandidateResult => ({
  type: 'event',
  start,
  slug: 'court-map',
  title: null,
});

const classifierReturning = (verdict: RelevanceVerdict): RelevanceClassifier => ({
  classify: jest.fn().mockResolvedValue(verdict),
});

describe('isRecent (unit)', () => {
  /**
   * Purpose:
   * Verifies the permissive policy for missing data:
   * - absent or unparseable timestamps are accepted
   */
  test.each([null, '', 'not a date', '2026-13-45T99:00:00'])(
    'treats %p as recent',
    (start) => {
      expect(isRecent(start, { now: NOW, windowDays: 2 })).toBe(true);
    }
  );

  /**
   * Purpose:
   * Verifies the trailing window boundary
   */
  test('accepts timestamps inside the window and rejects older ones', () => {
    expect(isRecent('2026-10-18T12:00:00Z', { now: NOW, windowDays: 2 })).toBe(true);
    expect(isRecent('2026-10-17T12:00:00Z', { now: NOW, windowDays: 2 })).toBe(true);
    expect(isRecent('2026-10-17T11:59:59Z', { now: NOW, windowDays: 2 })).toBe(false);
  });

  test('reads timestamps without a zone as UTC', () => {
    expect(isRecent('2026-10-17T12:00:00', { now: NOW, windowDays: 2 })).toBe(true);
    expect(isRecent('2026-10-17T11:00:00', { now: NOW, windowDays: 2 })).toBe(false);
  });

  test('honors a wider window', () => {
    expect(isRecent('2026-09-25T00:00:00Z', { now: NOW, windowDays: 30 })).toBe(true);
  });
});

describe('isRelevant (unit)', () => {
  test('accepts everything without a classifier', async () => {
    await expect(isRelevant(fields)).resolves.toBe(true);
  });

  /**
   * Purpose:
   * Verifies the soft gate: only an explicit "no" rejects
   */
  test.each<[RelevanceVerdict, boolean]>([
    ['yes', true],
    ['no', false],
    ['unclear', true],
  ])('verdict %p gives %p', async (verdict, expected) => {
    await expect(isRelevant(fields, classifierReturning(verdict))).resolves.toBe(expected);
  });

  /**
   * Purpose:
   * Verifies collaborator failure defaults to accept
   */
  test('accepts when the classifier throws', async () => {
    const classifier: RelevanceClassifier = {
      classify: jest.fn().mockRejectedValue(new Error('service unavailable')),
    };

    await expect(isRelevant(fields, classifier)).resolves.toBe(true);
  });
});

describe('acceptArticle (unit)', () => {
  test('rejects stale candidates without consulting the classifier', async () => {
    const classifier = classifierReturning('yes');

    await expect(
      acceptArticle(candidate('2026-09-01T00:00:00Z'), fields, { now: NOW, classifier })
    ).resolves.toBe(false);
    expect(classifier.classify).not.toHaveBeenCalled();
  });

  test('accepts a candidate with no timestamp that the classifier keeps', async () => {
    await expect(
      acceptArticle(candidate(null), fields, {
        now: NOW,
        classifier: classifierReturning('unclear'),
      })
    ).resolves.toBe(true);
  });

  test('rejects a recent candidate the classifier marks irrelevant', async () => {
    await expect(
      acceptArticle(candidate('2026-10-19T08:00:00Z'), fields, {
        now: NOW,
        classifier: classifierReturning('no'),
      })
    ).resolves.toBe(false);
  });
});
