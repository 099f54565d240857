import { AxiosInstance } from 'axios';
import Bottleneck from 'bottleneck';
import OpenAI from 'openai';
import { runHarvest } from '@/modules/harvest';
import { synthesizeDigests } from '@/modules/digestSynthesizer';
import { KeywordCache } from '@/modules/keywordCache';
import { LEDGER_HEADER, dailyLedgerName } from '@/constants/ledger';
import { Table, TableStore } from '@/interfaces/ledger';

jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = Date.parse('2026-10-19T12:00:00Z');

/**
 * In-process stand-ins for the news site, the table store and the
 * completion API; everything between them is the real pipeline.
 */
describe('harvest pipeline (integration)', () => {
  const tables = new Map<string, Table>();
  const store: TableStore = {
    readTable: async (name) => tables.get(name) ?? [],
    writeTable: async (name, table) => {
      tables.set(name, table);
    },
  };

  const page =
    '<html><head>' +
    '<meta name="description" content="Lawmakers debate the new oversight bill.">' +
    '</head><body><h1>Senate passes oversight bill</h1></body></html>';

  const axiosClient = {
    post: jest.fn(),
    get: jest.fn(),
  };

  beforeEach(() => {
    tables.clear();
    axiosClient.post.mockResolvedValue({
      data: {
        searchResults: [
          {
            type: 'event',
            start: new Date(NOW - 2 * DAY_MS).toISOString(),
            slug: 'abc',
            title: 'Senate passes oversight bill',
          },
        ],
      },
    });
    axiosClient.get.mockResolvedValue({ data: page });
  });

  /**
   * Purpose:
   * Walks one recent event from search hit to ledger row:
   * - headline from the primary heading
   * - summary from the meta description
   * - source left as the sentinel
   * - exactly one row appended to an empty ledger
   */
  test('records a heading-and-meta-only article as one ledger row', async () => {
    const summary = await runHarvest({
      axiosClient: axiosClient as unknown as AxiosInstance,
      store,
      keywords: new KeywordCache({
        load: async () => new Map([['Checks, Balances & Rule of Law', ['executive overreach']]]),
      }),
      limiter: new Bottleneck({ maxConcurrent: 1 }),
      sleep: jest.fn().mockResolvedValue(undefined),
      clock: () => NOW,
    });

    expect(summary.records).toEqual([
      {
        date: '2026-10-17',
        category: 'Checks, Balances & Rule of Law',
        keyword: 'executive overreach',
        headline: 'Senate passes oversight bill',
        source: 'N/A',
        url: 'https://ground.news/article/abc',
        summary: 'Lawmakers debate the new oversight bill.',
        extractedAt: '2026-10-19T12:00:00.000Z',
      },
    ]);
    expect(summary.inserted).toBe(1);
    expect(summary.skipped).toEqual([]);

    expect(tables.get(dailyLedgerName('2026-10-19'))).toEqual([
      [...LEDGER_HEADER],
      [
        '2026-10-17',
        'Checks, Balances & Rule of Law',
        'executive overreach',
        'Senate passes oversight bill',
        'N/A',
        'https://ground.news/article/abc',
        'Lawmakers debate the new oversight bill.',
        '2026-10-19T12:00:00.000Z',
      ],
    ]);
    expect(axiosClient.get).toHaveBeenCalledWith(
      'https://ground.news/article/abc',
      expect.objectContaining({ params: { _rsc: '19oxi' } })
    );
  });

  /**
   * Purpose:
   * A second identical run leaves the ledger unchanged and the
   * digests are produced from the stored rows.
   */
  test('is idempotent across runs and feeds the digests', async () => {
    const deps = {
      axiosClient: axiosClient as unknown as AxiosInstance,
      store,
      keywords: new KeywordCache({
        load: async () => new Map([['Checks, Balances & Rule of Law', ['executive overreach']]]),
      }),
      limiter: new Bottleneck({ maxConcurrent: 1 }),
      sleep: jest.fn().mockResolvedValue(undefined),
      clock: () => NOW,
    };

    await runHarvest(deps);
    const second = await runHarvest(deps);

    const ledgerName = dailyLedgerName('2026-10-19');
    expect(second.inserted).toBe(0);
    expect(second.skipped.map((s) => s.reason)).toEqual(['duplicate']);
    expect(tables.get(ledgerName)).toHaveLength(2);

    const create = jest.fn().mockResolvedValue({
      choices: [{ message: { content: '## Today\n**Oversight** bill passed.' } }],
    });
    const openai = { chat: { completions: { create } } } as unknown as OpenAI;

    const result = await synthesizeDigests({
      ledger: tables.get(ledgerName) ?? [],
      date: '2026-10-19',
      store,
      openai,
    });

    expect(result).toEqual({
      explainer: 'Today\nOversight bill passed.',
      'one-sheet': 'Today\nOversight bill passed.',
    });
    expect(tables.get('Explainer Script')).toEqual([
      ['Date', 'Explainer'],
      ['2026-10-19', 'Today\nOversight bill passed.'],
    ]);
  });
});
