import { describe, it, expect } from 'vitest';
import type { TableMetadata } from '@lookup-enums/shared';
import { resolveColumns } from './column-resolver.js';
import { parseRule } from './rule-parser.js';

const categories: TableMetadata = {
  name: 'Categories',
  cleanName: 'Categories',
  columns: [
    { name: 'CategoryID', sysType: 'number', isPrimaryKey: true, isForeignKey: false },
    { name: 'CategoryName', sysType: 'string', isPrimaryKey: false, isForeignKey: false },
    { name: 'Description', sysType: 'string', isPrimaryKey: false, isForeignKey: false },
    { name: 'Picture', sysType: 'binary', isPrimaryKey: false, isForeignKey: false },
  ],
};

const lookups: TableMetadata = {
  name: 'tbl',
  cleanName: 'tbl',
  columns: [
    { name: 'LookupID', sysType: 'number', isPrimaryKey: true, isForeignKey: false },
    { name: 'LookupKey', sysType: 'string', isPrimaryKey: false, isForeignKey: false },
    { name: 'LookupVal', sysType: 'string', isPrimaryKey: false, isForeignKey: false },
    { name: 'LookupDescLong', sysType: 'string', isPrimaryKey: false, isForeignKey: false },
  ],
};

describe('resolveColumns', () => {
  it('should apply primary key and first string column defaults', () => {
    const result = resolveColumns(categories, parseRule('Categories'));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.spec.idColumn).toBe('CategoryID');
      expect(result.spec.descriptionColumn).toBe('CategoryName');
      expect(result.spec.multiKeyColumn).toBe('');
      expect(result.spec.isMulti).toBe(false);
      expect(result.spec.idIsString).toBe(false);
      expect(result.spec.enumName).toBe('CategoriesEnum');
    }
  });

  it('should keep explicit column and enum names', () => {
    const result = resolveColumns(categories, parseRule('Categories:CategoryKind::Description'));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.spec.idColumn).toBe('CategoryID');
      expect(result.spec.descriptionColumn).toBe('Description');
      expect(result.spec.enumName).toBe('CategoryKind');
    }
  });

  it('should add the Str suffix for string ids', () => {
    const orderStatus: TableMetadata = {
      name: 'order_status',
      cleanName: 'order_status',
      columns: [
        { name: 'code', sysType: 'string', isPrimaryKey: true, isForeignKey: false },
        { name: 'label', sysType: 'string', isPrimaryKey: false, isForeignKey: false },
      ],
    };

    const result = resolveColumns(orderStatus, parseRule('order_status'));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.spec.idColumn).toBe('code');
      expect(result.spec.descriptionColumn).toBe('label');
      expect(result.spec.idIsString).toBe(true);
      expect(result.spec.enumName).toBe('order_statusEnumStr');
    }
  });

  it('should skip foreign key columns when choosing a description', () => {
    const products: TableMetadata = {
      name: 'Products',
      cleanName: 'Products',
      columns: [
        { name: 'ProductID', sysType: 'number', isPrimaryKey: true, isForeignKey: false },
        { name: 'SupplierCode', sysType: 'string', isPrimaryKey: false, isForeignKey: true },
        { name: 'ProductName', sysType: 'string', isPrimaryKey: false, isForeignKey: false },
      ],
    };

    const result = resolveColumns(products, parseRule('Products'));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.spec.descriptionColumn).toBe('ProductName');
    }
  });

  it('should report a misconfigured description column', () => {
    const result = resolveColumns(categories, parseRule('Categories:::Nope'));

    expect(result).toEqual({
      ok: false,
      missing: ['description'],
      idColumn: 'CategoryID',
      descriptionColumn: 'Nope',
      multiKeyColumn: '',
    });
  });

  it('should report a missing id when the table has no primary key', () => {
    const table: TableMetadata = {
      name: 'Colours',
      cleanName: 'Colours',
      columns: [{ name: 'Name', sysType: 'string', isPrimaryKey: false, isForeignKey: false }],
    };

    const result = resolveColumns(table, parseRule('Colours'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.missing).toEqual(['id']);
      expect(result.idColumn).toBe('');
    }
  });

  it('should resolve MULTI rules including the key column', () => {
    const result = resolveColumns(lookups, parseRule('tbl:MULTI=LookupKey:LookupVal:LookupDescLong'));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.spec.isMulti).toBe(true);
      expect(result.spec.multiKeyColumn).toBe('LookupKey');
      expect(result.spec.idColumn).toBe('LookupVal');
      expect(result.spec.idIsString).toBe(true);
      expect(result.spec.descriptionColumn).toBe('LookupDescLong');
      expect(result.spec.enumName).toBe('');
    }
  });

  it('should report a missing MULTI key column', () => {
    const result = resolveColumns(lookups, parseRule('tbl:MULTI=Category:LookupVal:LookupDescLong'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.missing).toEqual(['multiKey']);
      expect(result.multiKeyColumn).toBe('Category');
    }
  });

  it('should match column names exactly', () => {
    const result = resolveColumns(categories, parseRule('Categories::categoryid'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.missing).toEqual(['id']);
    }
  });
});
