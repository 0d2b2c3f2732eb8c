import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { createTestServices, seedProducts } from '../helpers/store';
import { Services } from '../../src/services';
import { insertSalesRecord } from '../../src/modules/sales/sales.service';
import { NotFoundError, ValidationError } from '../../src/utils/errors';

describe('sales service', () => {
  let services: Services;

  beforeEach(async () => {
    services = await createTestServices();
  });

  afterEach(async () => {
    await services.store.close();
  });

  it('freezes the total at the price of the moment', async () => {
    const [filter] = await seedProducts(services, [{ name: 'Filter', price: '99.99' }]);

    const saleId = await services.sales.recordSale(filter, 2, 'Fleet account');
    const [sale] = await services.sales.listSales();

    expect(sale).toMatchObject({
      id: saleId,
      product_id: filter,
      product_name: 'Filter',
      quantity: 2,
      total_amount: '199.98',
      unit_price: '99.99',
      customer_info: 'Fleet account',
    });
  });

  it('keeps past totals when the price changes later', async () => {
    const [filter] = await seedProducts(services, [{ name: 'Filter', price: '99.99' }]);
    await services.sales.recordSale(filter, 2);

    await services.catalog.saveProduct({ id: filter, name: 'Filter', price: '150.00' });
    await services.sales.recordSale(filter, 1);

    const sales = await services.sales.listSales(filter);
    expect(sales.map((sale) => sale.total_amount).sort()).toEqual(['150.00', '199.98']);
  });

  it('records sales of inactive products', async () => {
    const [old] = await seedProducts(services, [{ name: 'Old stock', price: '10.00', is_active: false }]);

    await services.sales.recordSale(old, 3);

    const [sale] = await services.sales.listSales(old);
    expect(sale.total_amount).toBe('30.00');
  });

  it('fails for an unknown product and writes nothing', async () => {
    await expect(services.sales.recordSale(404, 1)).rejects.toBeInstanceOf(NotFoundError);
    expect(await services.sales.listSales()).toEqual([]);
  });

  it('rejects quantities that are not positive whole numbers', async () => {
    const [a] = await seedProducts(services, [{ name: 'A' }]);

    await expect(services.sales.recordSale(a, 0)).rejects.toBeInstanceOf(ZodError);
    await expect(services.sales.recordSale(a, -1)).rejects.toBeInstanceOf(ZodError);
    await expect(services.sales.recordSale(a, 1.5)).rejects.toBeInstanceOf(ZodError);
    expect(await services.sales.listSales()).toEqual([]);
  });

  it('rejects a quantity beyond the integer column', async () => {
    const [a] = await seedProducts(services, [{ name: 'A', price: '0.01' }]);

    await expect(services.sales.recordSale(a, 2147483648)).rejects.toBeInstanceOf(ZodError);
    await expect(services.sales.recordSale(a, 1e20)).rejects.toBeInstanceOf(ZodError);
    expect(await services.sales.listSales()).toEqual([]);
  });

  it('rejects a total that does not fit the ledger column', async () => {
    const [dear] = await seedProducts(services, [{ name: 'Dear', price: '99999999.99' }]);

    await expect(services.sales.recordSale(dear, 101)).rejects.toBeInstanceOf(ValidationError);
    expect(await services.sales.listSales()).toEqual([]);

    await services.sales.recordSale(dear, 100);
    const [sale] = await services.sales.listSales();
    expect(sale.total_amount).toBe('9999999999.00');
  });

  it('stores blank customer notes as null and trims the rest', async () => {
    const [a] = await seedProducts(services, [{ name: 'A' }]);

    const blank = await services.sales.recordSale(a, 1, '   ');
    const padded = await services.sales.recordSale(a, 1, '  Garage 7  ');

    const sales = await services.sales.listSales();
    const notes = Object.fromEntries(sales.map((sale) => [sale.id, sale.customer_info]));
    expect(notes).toEqual({ [blank]: null, [padded]: 'Garage 7' });
  });

  it('lists the most recent sale first and filters by product', async () => {
    const [a, b] = await seedProducts(services, [{ name: 'A' }, { name: 'B' }]);
    const oldest = await insertSalesRecord(services.store, {
      product_id: a,
      quantity: 1,
      total_amount: '100.00',
      customer_info: null,
      sale_date: new Date('2026-01-10T10:00:00Z'),
    });
    const newest = await insertSalesRecord(services.store, {
      product_id: b,
      quantity: 1,
      total_amount: '100.00',
      customer_info: null,
      sale_date: new Date('2026-03-01T10:00:00Z'),
    });
    const middle = await insertSalesRecord(services.store, {
      product_id: a,
      quantity: 2,
      total_amount: '200.00',
      customer_info: null,
      sale_date: new Date('2026-02-15T10:00:00Z'),
    });

    const all = await services.sales.listSales();
    const forA = await services.sales.listSales(a);

    expect(all.map((sale) => sale.id)).toEqual([newest, middle, oldest]);
    expect(forA.map((sale) => sale.id)).toEqual([middle, oldest]);
  });

  it('summarises the ledger overall and per product', async () => {
    const [a, b] = await seedProducts(services, [
      { name: 'A', price: '99.99' },
      { name: 'B', price: '0.01' },
    ]);
    await services.sales.recordSale(a, 2);
    await services.sales.recordSale(b, 1);

    expect(await services.sales.getStatistics()).toEqual({
      sales_count: 2,
      total_quantity: 3,
      total_revenue: '199.99',
      average_sale: '100.00',
      total_revenue_value: 199.99,
      average_sale_value: 100,
    });
    expect(await services.sales.getStatistics(b)).toEqual({
      sales_count: 1,
      total_quantity: 1,
      total_revenue: '0.01',
      average_sale: '0.01',
      total_revenue_value: 0.01,
      average_sale_value: 0.01,
    });
  });

  it('reports zeros for a product without sales', async () => {
    const [a] = await seedProducts(services, [{ name: 'A' }]);

    expect(await services.sales.getStatistics(a)).toEqual({
      sales_count: 0,
      total_quantity: 0,
      total_revenue: '0.00',
      average_sale: '0.00',
      total_revenue_value: 0,
      average_sale_value: 0,
    });
  });
});
