import { describe, it, expect } from 'vitest';
import { matchesTable, parseRule, parseRules } from './rule-parser.js';

describe('parseRule', () => {
  it('should parse a pattern-only rule with all defaults', () => {
    expect(parseRule('Categories')).toEqual({
      source: 'Categories',
      tableNamePattern: 'Categories',
      enumName: '',
      isMulti: false,
      multiKeyColumn: '',
      idColumn: '',
      descriptionColumn: '',
      whereClause: '',
    });
  });

  it('should parse a MULTI rule', () => {
    const rule = parseRule('tbl:MULTI=LookupKey:LookupVal:LookupDescLong');

    expect(rule.tableNamePattern).toBe('tbl');
    expect(rule.isMulti).toBe(true);
    expect(rule.multiKeyColumn).toBe('LookupKey');
    expect(rule.enumName).toBe('');
    expect(rule.idColumn).toBe('LookupVal');
    expect(rule.descriptionColumn).toBe('LookupDescLong');
    expect(rule.whereClause).toBe('');
  });

  it('should trim fields and honour empty placeholders', () => {
    const rule = parseRule(' Orders : OrderStatus :: Name : WHERE Active = 1 ');

    expect(rule.tableNamePattern).toBe('Orders');
    expect(rule.enumName).toBe('OrderStatus');
    expect(rule.idColumn).toBe('');
    expect(rule.descriptionColumn).toBe('Name');
    expect(rule.whereClause).toBe('WHERE Active = 1');
    expect(rule.source).toBe(' Orders : OrderStatus :: Name : WHERE Active = 1 ');
  });

  it('should keep separators inside the where clause', () => {
    const rule = parseRule("Shifts:::: WHERE StartsAt > '10:30'");

    expect(rule.whereClause).toBe("WHERE StartsAt > '10:30'");
    expect(rule.descriptionColumn).toBe('');
  });

  it('should match the MULTI prefix case-insensitively', () => {
    const rule = parseRule('tbl:multi= LookupKey');

    expect(rule.isMulti).toBe(true);
    expect(rule.multiKeyColumn).toBe('LookupKey');
  });

  it('should accept a custom MULTI prefix', () => {
    const custom = parseRule('tbl:SPLIT/LookupKey', { multiPrefix: 'SPLIT/' });
    expect(custom.isMulti).toBe(true);
    expect(custom.multiKeyColumn).toBe('LookupKey');

    const literal = parseRule('tbl:MULTI=LookupKey', { multiPrefix: 'SPLIT/' });
    expect(literal.isMulti).toBe(false);
    expect(literal.enumName).toBe('MULTI=LookupKey');
  });

  it('should never fail on short or empty input', () => {
    for (const line of ['', ':', '::::', 'x:y']) {
      const rule = parseRule(line);
      expect(typeof rule.tableNamePattern).toBe('string');
      expect(rule.whereClause).toBe('');
    }
    expect(parseRule('x:y').enumName).toBe('y');
  });

  it('should parse rule lists in order', () => {
    const rules = parseRules(['a', 'b:BEnum']);
    expect(rules.map(r => r.tableNamePattern)).toEqual(['a', 'b']);
    expect(rules[1]?.enumName).toBe('BEnum');
  });
});

describe('matchesTable', () => {
  it('should match unanchored and case-insensitively', () => {
    expect(matchesTable(parseRule('categ'), 'Categories')).toEqual({ ok: true, matched: true });
    expect(matchesTable(parseRule('^Cat$'), 'Categories')).toEqual({ ok: true, matched: false });
    expect(matchesTable(parseRule('^(Order|Invoice)Status$'), 'invoicestatus')).toEqual({
      ok: true,
      matched: true,
    });
  });

  it('should report invalid patterns instead of throwing', () => {
    const result = matchesTable(parseRule('(unclosed'), 'Categories');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toContain('Invalid regular expression');
    }
  });
});
