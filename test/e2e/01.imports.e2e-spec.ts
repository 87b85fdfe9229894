import { INestApplication } from '@nestjs/common';
import { createTestingApp, http } from '../utils/app-bootstrap';
import { baseWorkbook, movementRow, movementWorkbook, workbookBuffer } from '../utils/workbooks';

const BASE = baseWorkbook([
  ['2024-01-31', 1, 'Main', 'HW', '0001', 'Bolt', 10, 'UN', 2, 20],
  ['2024-01-31', 1, 'Annex', 'HW', '0002', 'Nut', 4, 'UN', 1, 4],
]);

const JANUARY = movementWorkbook([
  movementRow({ item: '0001', location: 'Main', category: 'HW', date: '20240105', document: 'EA 10', entries: 5, unitCost: 2 }),
  movementRow({ item: '0002', location: 'Annex', date: '20240110', document: 'SA 11', exits: 1, unitCost: 1 }),
  movementRow({ item: '0055', description: 'Washer', date: '20240112', document: 'EA 12', entries: 3, unitCost: 0.5 }),
]);

describe('Imports', () => {
  let app: INestApplication;

  beforeAll(async () => {
    ({ app } = await createTestingApp());
  });
  afterAll(async () => {
    await app.close();
  });

  describe('base snapshot then updates', () => {
    let baseBatchId: string;
    let updateBatchId: string;

    it('POST /inventories/:name/imports with base_file', async () => {
      const res = await http(app)
        .post('/inventories/North/imports')
        .attach('base_file', BASE, 'base.xlsx')
        .expect(201);

      expect(res.body).toMatchObject({
        ok: true,
        inventoryName: 'north',
        replacedBatchId: null,
        baseRecordCount: 2,
        warehouseDetailCount: 2,
        updateRecordCount: 0,
        rowErrorCount: 0,
        files: [{ fileName: 'base.xlsx', role: 'base', strategy: 'synonyms@row1', rowsRead: 2, imported: 2 }],
        failures: [],
      });
      baseBatchId = res.body.batchId;
    });

    it('products come from the base snapshot', async () => {
      const res = await http(app).get('/inventories/north/products').expect(200);
      expect(res.body).toEqual([
        { id: expect.any(String), code: '1', description: 'Bolt', group: 'HW', initialBalance: 10, initialUnitCost: 2 },
        { id: expect.any(String), code: '2', description: 'Nut', group: 'HW', initialBalance: 4, initialUnitCost: 1 },
      ]);
    });

    it('refuses a second base file', async () => {
      const res = await http(app)
        .post('/inventories/north/imports')
        .attach('base_file', BASE, 'base-again.xlsx')
        .expect(400);
      expect(res.body).toMatchObject({
        ok: false,
        status: 400,
        message: 'The base file of inventory "north" is already loaded',
        path: '/inventories/north/imports',
      });
    });

    it('imports update_files and creates unknown products', async () => {
      const res = await http(app)
        .post('/inventories/north/imports')
        .attach('update_files', JANUARY, 'jan.xlsx')
        .expect(201);

      expect(res.body).toMatchObject({
        ok: true,
        updateRecordCount: 3,
        stubProductCount: 1,
        duplicateCount: 0,
        files: [{ fileName: 'jan.xlsx', role: 'update', strategy: 'synonyms@row4', headerRow: 4, imported: 3 }],
      });
      updateBatchId = res.body.batchId;
    });

    it('GET records lists the movements newest first', async () => {
      const res = await http(app).get('/inventories/north/records').expect(200);
      expect(res.body.map((r: { productCode: string }) => r.productCode)).toEqual(['55', '2', '1']);
      expect(res.body[0]).toEqual({
        id: expect.any(String),
        batchId: updateBatchId,
        productCode: '55',
        productDescription: 'Washer',
        warehouse: '',
        date: '2024-01-12',
        documentType: 'EA',
        documentNumber: '12',
        quantity: 3,
        unitCost: 0.5,
        total: 1.5,
        category: '',
        lot: '',
        finalQuantity: null,
        costCenter: null,
      });
      expect(res.body[1]).toMatchObject({ warehouse: 'Annex', documentType: 'SA', quantity: -1, total: 1 });
    });

    it('GET product history accepts codes with leading zeros', async () => {
      const res = await http(app).get('/inventories/north/products/0001/history').expect(200);
      expect(res.body).toHaveLength(1);
      expect(res.body[0]).toMatchObject({ productCode: '1', date: '2024-01-05', quantity: 5, balance: 15 });
    });

    it('re-uploading the same update replaces its batch', async () => {
      const res = await http(app)
        .post('/inventories/north/imports')
        .attach('update_files', JANUARY, 'jan-again.xlsx')
        .expect(201);
      expect(res.body.replacedBatchId).toBe(updateBatchId);
      expect(res.body.updateRecordCount).toBe(3);
      expect(res.body.stubProductCount).toBe(0);

      const records = await http(app).get('/inventories/north/records').expect(200);
      expect(records.body).toHaveLength(3);

      const batches = await http(app).get('/inventories/north/batches').expect(200);
      expect(batches.body.map((b: { id: string }) => b.id)).toEqual([res.body.batchId, baseBatchId]);
      expect(batches.body[0]).toMatchObject({ fileNames: ['jan-again.xlsx'], rowsTotal: 3, rowsImported: 3 });
      updateBatchId = res.body.batchId;
    });

    it('GET last-update points at the latest batch', async () => {
      const res = await http(app).get('/inventories/north/last-update').expect(200);
      expect(res.body).toEqual({
        inventoryName: 'north',
        lastUpdate: expect.any(String),
        batchId: updateBatchId,
        fileNames: ['jan-again.xlsx'],
      });
    });

    it('GET summary totals the imported stock', async () => {
      const res = await http(app).get('/inventories/north/summary').expect(200);
      expect(res.body).toMatchObject({
        inventoryName: 'north',
        totalProducts: 3,
        totalRecords: 3,
        totalBatches: 2,
        totalQuantity: 21,
        totalValue: 34.5,
      });
    });
  });

  describe('rejected uploads', () => {
    it('400 when no file is sent', async () => {
      const res = await http(app).post('/inventories/west/imports').expect(400);
      expect(res.body.message).toBe('No file supplied: send base_file and/or update_files');
    });

    it('400 for a file without an Excel extension', async () => {
      const res = await http(app)
        .post('/inventories/west/imports')
        .attach('base_file', BASE, 'base.csv')
        .expect(400);
      expect(res.body.message).toBe('base_file "base.csv" must be an Excel file (.xls, .xlsx)');
    });

    it('400 for an empty file', async () => {
      const res = await http(app)
        .post('/inventories/west/imports')
        .attach('base_file', Buffer.alloc(0), 'base.xlsx')
        .expect(400);
      expect(res.body.message).toBe('base_file "base.xlsx" is empty');
    });

    it('400 for an unexpected multipart field', async () => {
      const res = await http(app)
        .post('/inventories/west/imports')
        .attach('other_file', BASE, 'base.xlsx')
        .expect(400);
      expect(res.body.message).toBe('Unexpected field');
    });

    it('400 for updates before the base file', async () => {
      const res = await http(app)
        .post('/inventories/west/imports')
        .attach('update_files', JANUARY, 'jan.xlsx')
        .expect(400);
      expect(res.body.message).toBe(
        'Inventory "west" has no base file yet; upload the base file before updates',
      );
      await http(app).get('/inventories/west/batches').expect(200).expect([]);
    });

    it('400 with the attempts when the columns cannot be found', async () => {
      const res = await http(app)
        .post('/inventories/west/imports')
        .attach('base_file', workbookBuffer([['Report'], ['a', 'b']]), 'narrow.xlsx')
        .expect(400);
      expect(res.body.message).toBe('Could not read columns from "narrow.xlsx" as a base file');
      expect(res.body.errors).toContain('workbook/positions: no header row wide enough');
    });

    it('400 and nothing saved when no row is imported', async () => {
      await http(app).post('/inventories/east/imports').attach('base_file', BASE, 'base.xlsx').expect(201);
      const zero = movementWorkbook([movementRow({ item: '0001', date: '20240105', document: 'EA 10' })]);

      const res = await http(app)
        .post('/inventories/east/imports')
        .attach('update_files', zero, 'zero.xlsx')
        .expect(400);
      expect(res.body.message).toBe('No records were imported; nothing was saved');
      expect(res.body.errors.files).toEqual([
        expect.objectContaining({ fileName: 'zero.xlsx', rowsRead: 1, imported: 0, skipped: 1 }),
      ]);

      const batches = await http(app).get('/inventories/east/batches').expect(200);
      expect(batches.body).toHaveLength(1);
    });
  });
});
