import { DEFAULT_BIN_EDGES } from '@constants/distribution.const';
import { describe, expect, it } from 'vitest';
import { configurationSchema, distributionSchema, sourceSchema } from './configuration.schema';

describe('sourceSchema', () => {
  it('should apply defaults', () => {
    expect(sourceSchema.parse({ exchange: 'kraken' })).toEqual({
      exchange: 'kraken',
      symbol: 'BTC/USDT',
      historyDays: 3650,
    });
  });

  it.each`
    scenario                       | candidate
    ${'unknown exchange'}          | ${{ exchange: 'unknown' }}
    ${'zero history'}              | ${{ exchange: 'binance', historyDays: 0 }}
    ${'fractional history'}        | ${{ exchange: 'binance', historyDays: 1.5 }}
    ${'missing exchange'}          | ${{ symbol: 'ETH/USDT' }}
  `('should reject $scenario', ({ candidate }) => {
    expect(sourceSchema.safeParse(candidate).success).toBe(false);
  });
});

describe('distributionSchema', () => {
  it.each`
    scenario                       | binEdges           | expectSuccess
    ${'ascending edges from zero'} | ${[0, 30, 90]}     | ${true}
    ${'a single edge'}             | ${[0]}             | ${true}
    ${'empty edges'}               | ${[]}              | ${false}
    ${'first edge above zero'}     | ${[10, 20]}        | ${false}
    ${'duplicated edges'}          | ${[0, 50, 50]}     | ${false}
    ${'descending edges'}          | ${[0, 100, 50]}    | ${false}
    ${'fractional edges'}          | ${[0, 12.5]}       | ${false}
    ${'negative edges'}            | ${[-50, 0]}        | ${false}
  `('should validate $scenario', ({ binEdges, expectSuccess }) => {
    expect(distributionSchema.safeParse({ binEdges }).success).toBe(expectSuccess);
  });

  it('should default to the 50 days bins', () => {
    expect(distributionSchema.parse({}).binEdges).toEqual(DEFAULT_BIN_EDGES);
  });
});

describe('configurationSchema', () => {
  const base = {
    source: { exchange: 'binance' },
    storage: { type: 'sqlite', database: ':memory:' },
  };

  it('should fill every default', () => {
    expect(configurationSchema.parse(base)).toEqual({
      showReport: true,
      source: { exchange: 'binance', symbol: 'BTC/USDT', historyDays: 3650 },
      storage: { type: 'sqlite', database: ':memory:', includeRawTable: true },
      distribution: { binEdges: DEFAULT_BIN_EDGES },
    });
  });

  it.each`
    scenario                      | overrides
    ${'missing storage'}          | ${{ storage: undefined }}
    ${'unsupported storage type'} | ${{ storage: { type: 'postgres', database: 'db' } }}
    ${'non boolean report flag'}  | ${{ showReport: 'yes' }}
  `('should reject $scenario', ({ overrides }) => {
    expect(configurationSchema.safeParse({ ...base, ...overrides }).success).toBe(false);
  });
});
