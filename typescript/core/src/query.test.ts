import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { isWithinLimit, matchesWhere, projectEntity, selectEntries } from './query';

const tokens: Array<[string, unknown]> = [
  ['t1', { id: { symbol: 'AAA' }, state: { price: 5, status: 'live' } }],
  ['t2', { id: { symbol: 'BBB' }, state: { price: 15, status: 'live' } }],
  ['t3', { id: { symbol: 'CCC' }, state: { price: 25, status: 'closed' } }],
  ['t4', { id: {}, state: { price: 35, status: 'live' } }],
];

describe('matchesWhere', () => {
  it('matches exact values on dotted paths', () => {
    expect(matchesWhere(tokens[0]?.[1], { 'state.status': 'live' })).toBe(true);
    expect(matchesWhere(tokens[2]?.[1], { 'state.status': 'live' })).toBe(false);
  });

  it('requires every comparison operator to hold', () => {
    const where = { 'state.price': { gte: 10, lt: 30 } };
    expect(tokens.filter(([, token]) => matchesWhere(token, where)).map(([key]) => key)).toEqual(['t2', 't3']);
  });

  it('compares strings lexicographically', () => {
    expect(matchesWhere(tokens[1]?.[1], { 'id.symbol': { gt: 'AAA' } })).toBe(true);
    expect(matchesWhere(tokens[0]?.[1], { 'id.symbol': { gt: 'AAA' } })).toBe(false);
  });

  it('treats a null condition as matching absent fields', () => {
    expect(matchesWhere(tokens[3]?.[1], { 'id.symbol': null })).toBe(true);
    expect(matchesWhere(tokens[0]?.[1], { 'id.symbol': null })).toBe(false);
  });

  it('never matches a comparison against a missing or mistyped field', () => {
    expect(matchesWhere(tokens[3]?.[1], { 'id.symbol': { gte: 'A' } })).toBe(false);
    expect(matchesWhere(tokens[0]?.[1], { 'state.status': { gt: 1 } })).toBe(false);
  });
});

describe('projectEntity', () => {
  const LiveToken = z.object({
    id: z.object({ symbol: z.string() }),
    state: z.object({ price: z.number() }),
  });

  it('returns the schema output for passing entities', () => {
    expect(projectEntity(tokens[0]?.[1], { schema: LiveToken })).toEqual({
      matched: true,
      value: { id: { symbol: 'AAA' }, state: { price: 5 } },
    });
  });

  it('omits entities failing the schema', () => {
    expect(projectEntity(tokens[3]?.[1], { schema: LiveToken })).toEqual({ matched: false });
  });

  it('applies where before the schema', () => {
    expect(projectEntity(tokens[2]?.[1], { where: { 'state.status': 'live' }, schema: LiveToken })).toEqual({
      matched: false,
    });
  });
});

describe('selectEntries', () => {
  it('keeps the first limit matches in collection order', () => {
    const selected = selectEntries(tokens, { where: { 'state.status': 'live' }, limit: 2 });
    expect(selected.map(([key]) => key)).toEqual(['t1', 't2']);
  });

  it('knows whether a key is within the limit', () => {
    const query = { where: { 'state.status': 'live' }, limit: 2 };
    expect(isWithinLimit(tokens, 't2', query)).toBe(true);
    expect(isWithinLimit(tokens, 't4', query)).toBe(false);
    expect(isWithinLimit(tokens, 't4', {})).toBe(true);
  });
});
