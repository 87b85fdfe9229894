import { INestApplication } from '@nestjs/common';
import { createTestingApp, http } from '../utils/app-bootstrap';
import { seedInventory, SeededInventory } from '../utils/seed';

function currentMonth(): string {
  const now = new Date();
  return `${now.getFullYear()}-${String(now.getMonth() + 1).padStart(2, '0')}`;
}

describe('Queries & analytics', () => {
  let app: INestApplication;
  let seeded: SeededInventory;

  beforeAll(async () => {
    const testing = await createTestingApp();
    app = testing.app;
    seeded = await seedInventory(testing.repository, 'north');
  });
  afterAll(async () => {
    await app.close();
  });

  describe('products', () => {
    it('search matches code or description', async () => {
      const res = await http(app).get('/inventories/north/products').query({ search: 'gea' }).expect(200);
      expect(res.body.map((p: { code: string }) => p.code)).toEqual(['3']);
    });

    it('group filter is a case-insensitive contains', async () => {
      const res = await http(app).get('/inventories/north/products').query({ group: 'hw' }).expect(200);
      expect(res.body.map((p: { code: string }) => p.code)).toEqual(['1', '2']);
    });

    it('unknown inventories have no products', async () => {
      await http(app).get('/inventories/nowhere/products').expect(200).expect([]);
    });
  });

  describe('records', () => {
    it('newest first with product code and description', async () => {
      const res = await http(app).get('/inventories/north/records').expect(200);
      expect(res.body.map((r: { date: string }) => r.date)).toEqual([
        '2024-06-01',
        '2024-03-10',
        '2024-01-05',
        '2023-11-02',
      ]);
      expect(res.body[0]).toMatchObject({
        batchId: seeded.batch.id,
        productCode: '3',
        productDescription: 'Gear',
        warehouse: 'Yard',
        documentType: 'EA',
        documentNumber: '13',
        quantity: 2,
        total: 6,
      });
    });

    it('filters by warehouse, category, dates and search', async () => {
      const byWarehouse = await http(app).get('/inventories/north/records').query({ warehouse: 'annex' }).expect(200);
      expect(byWarehouse.body.map((r: { productCode: string }) => r.productCode)).toEqual(['2']);

      const byCategory = await http(app).get('/inventories/north/records').query({ category: 'parts' }).expect(200);
      expect(byCategory.body.map((r: { productCode: string }) => r.productCode)).toEqual(['3']);

      const byDates = await http(app)
        .get('/inventories/north/records')
        .query({ dateFrom: '2024-01-01', dateTo: '2024-03-31' })
        .expect(200);
      expect(byDates.body.map((r: { date: string }) => r.date)).toEqual(['2024-03-10', '2024-01-05']);

      const bySearch = await http(app).get('/inventories/north/records').query({ search: 'bolt', limit: 1 }).expect(200);
      expect(bySearch.body).toHaveLength(1);
      expect(bySearch.body[0]).toMatchObject({ productCode: '1', date: '2024-03-10', quantity: -3 });

      await http(app).get('/inventories/north/records').query({ search: 'nothing-like-this' }).expect(200).expect([]);
    });

    it('validates query parameters', async () => {
      const badDate = await http(app).get('/inventories/north/records').query({ dateFrom: '2024/01/01' }).expect(400);
      expect(badDate.body.errors).toEqual(['dateFrom must be YYYY-MM-DD']);

      const badLimit = await http(app).get('/inventories/north/records').query({ limit: 0 }).expect(400);
      expect(badLimit.body.errors).toEqual(['limit must not be less than 1']);

      const unknown = await http(app).get('/inventories/north/records').query({ page: 2 }).expect(400);
      expect(unknown.body.errors).toEqual(['property page should not exist']);
    });
  });

  describe('product history', () => {
    it('movements in date order with a running balance from the opening stock', async () => {
      const res = await http(app).get('/inventories/north/products/1/history').expect(200);
      expect(res.body.map((m: { date: string; balance: number }) => [m.date, m.balance])).toEqual([
        ['2024-01-05', 15],
        ['2024-03-10', 12],
      ]);
      expect(res.body[1]).toMatchObject({ productCode: '1', documentType: 'SA', quantity: -3, total: 7.5 });
    });

    it('404 for an unknown code', async () => {
      const res = await http(app).get('/inventories/north/products/999/history').expect(404);
      expect(res.body).toMatchObject({ ok: false, status: 404, message: 'Product "999" not found' });
    });
  });

  describe('analysis', () => {
    it('current stock and valuation per product', async () => {
      const res = await http(app).get('/inventories/north/analysis').expect(200);
      expect(res.body).toHaveLength(3);
      expect(res.body[0]).toMatchObject({
        productId: seeded.bolt.id,
        code: '1',
        warehouses: ['Main'],
        initialBalance: 10,
        currentQuantity: 12,
        unitCost: 2.5,
        currentValue: 30,
        consumed: 'No',
        lastMovementDate: '2024-03-10',
      });
      expect(res.body[1]).toMatchObject({ code: '2', currentQuantity: 0, currentValue: 0, consumed: 'Sí' });
      expect(res.body[2]).toMatchObject({ code: '3', warehouses: ['Yard'], currentQuantity: 2, currentValue: 6 });
      expect(res.body[0].monthlyBalances).toHaveLength(12);
    });

    it('filters by warehouse, category and limit', async () => {
      const yard = await http(app).get('/inventories/north/analysis').query({ warehouse: 'yard' }).expect(200);
      expect(yard.body.map((r: { code: string }) => r.code)).toEqual(['3']);

      const hardware = await http(app).get('/inventories/north/analysis').query({ category: 'HW' }).expect(200);
      expect(hardware.body.map((r: { code: string }) => r.code)).toEqual(['1', '2']);

      const first = await http(app).get('/inventories/north/analysis').query({ limit: 1 }).expect(200);
      expect(first.body.map((r: { code: string }) => r.code)).toEqual(['1']);

      const march = await http(app)
        .get('/inventories/north/analysis')
        .query({ dateFrom: '2024-03-01', dateTo: '2024-03-31' })
        .expect(200);
      expect(march.body.map((r: { code: string }) => r.code)).toEqual(['1']);
    });

    it('rejects unknown rotation classes and flags', async () => {
      const rotation = await http(app).get('/inventories/north/analysis').query({ rotation: 'Fast' }).expect(400);
      expect(rotation.body.ok).toBe(false);
      expect(rotation.body.message).toContain('rotation must be one of the following values');

      await http(app).get('/inventories/north/analysis').query({ stagnant: 'maybe' }).expect(400);
    });
  });

  describe('monthly movements', () => {
    it('twelve months ending with the current one', async () => {
      const res = await http(app).get('/inventories/north/monthly-movements').expect(200);
      expect(res.body).toHaveLength(12);
      expect(res.body[11].month).toBe(currentMonth());
      expect(res.body[11].closingBalance).toBe(14);
    });

    it('warehouse filter starts from that warehouse opening stock', async () => {
      const res = await http(app).get('/inventories/north/monthly-movements').query({ warehouse: 'main' }).expect(200);
      expect(res.body[11].closingBalance).toBe(12);
    });
  });

  describe('summary & batches', () => {
    it('GET summary', async () => {
      await http(app).get('/inventories/north/summary').expect(200).expect({
        inventoryName: 'north',
        totalProducts: 3,
        totalRecords: 4,
        totalBatches: 1,
        totalQuantity: 14,
        totalValue: 36,
        lastUpdate: '2024-06-01T10:00:05.000Z',
      });
    });

    it('GET batches', async () => {
      await http(app).get('/inventories/north/batches').expect(200).expect([
        {
          id: seeded.batch.id,
          fileNames: ['moves.xlsx'],
          checksum: 'seed',
          startedAt: '2024-06-01T10:00:00.000Z',
          processedAt: '2024-06-01T10:00:05.000Z',
          rowsTotal: 4,
          rowsImported: 4,
        },
      ]);
    });

    it('GET last-update', async () => {
      await http(app).get('/inventories/north/last-update').expect(200).expect({
        inventoryName: 'north',
        lastUpdate: '2024-06-01T10:00:05.000Z',
        batchId: seeded.batch.id,
        fileNames: ['moves.xlsx'],
      });
      await http(app).get('/inventories/empty/last-update').expect(200).expect({
        inventoryName: 'empty',
        lastUpdate: null,
        batchId: null,
        fileNames: [],
      });
    });
  });
});
