import { NumberValueImpl } from '@aws-sdk/util-dynamodb';
import { describe, expect, it } from 'vitest';
import { fromStoredItem, toStoredItem } from './numbers';

describe('numeric normalization', () => {
  it('should write numbers as exact decimals from their shortest form', () => {
    const stored = toStoredItem({ price: 19.99, stock_quantity: 10, name: 'Widget', skip: undefined });

    expect(stored.price).toBeInstanceOf(NumberValueImpl);
    expect(String(stored.price)).toBe('19.99');
    expect(String(stored.stock_quantity)).toBe('10');
    expect(stored.name).toBe('Widget');
    expect('skip' in stored).toBe(false);
  });

  it('should read wrapped decimals back as plain numbers', () => {
    const item = fromStoredItem({
      price: NumberValueImpl.from('19.99'),
      stock_quantity: NumberValueImpl.from('7'),
      images: ['https://cdn.test/a.png'],
    });

    expect(item).toEqual({ price: 19.99, stock_quantity: 7, images: ['https://cdn.test/a.png'] });
    expect(Number.isInteger(item.stock_quantity)).toBe(true);
  });

  it('should pass items without numbers through unchanged', () => {
    expect(fromStoredItem({ PK: 'BRAND#b-1', SK: 'BRAND#b-1', name: 'Acme' })).toEqual({
      PK: 'BRAND#b-1',
      SK: 'BRAND#b-1',
      name: 'Acme',
    });
    expect(toStoredItem({ PK: 'BRAND#b-1', name: 'Acme' })).toEqual({ PK: 'BRAND#b-1', name: 'Acme' });
  });

  it('should render integral decimals as integers', () => {
    expect(fromStoredItem({ price: NumberValueImpl.from('5.00') }).price).toBe(5);
  });
});
