import type {
  ImportBatchRow,
  NewLedgerEntry,
  ProductRow,
} from '../../src/core/persistence/inventory.repository';
import { InMemoryInventoryRepository } from './in-memory-inventory.repository';

export interface SeededInventory {
  batch: ImportBatchRow;
  bolt: ProductRow;
  nut: ProductRow;
  gear: ProductRow;
}

type Movement = Pick<NewLedgerEntry, 'date' | 'warehouse' | 'quantity' | 'unitCost'> &
  Partial<NewLedgerEntry>;

/**
 * Three products: a bolt that moved in January and March 2024, a nut used up
 * in November 2023 and a gear first received in June 2024.
 */
export async function seedInventory(
  repository: InMemoryInventoryRepository,
  inventoryName = 'north',
): Promise<SeededInventory> {
  const [bolt, nut, gear] = await repository.insertProducts([
    { inventoryName, code: '1', description: 'Bolt', group: 'HW', initialBalance: 10, initialUnitCost: 2 },
    { inventoryName, code: '2', description: 'Nut', group: 'HW', initialBalance: 4, initialUnitCost: 1 },
    { inventoryName, code: '3', description: 'Gear', group: 'Parts', initialBalance: 0, initialUnitCost: 0 },
  ]);
  await repository.insertWarehouseDetails([
    { inventoryName, productId: bolt.id, warehouse: 'Main', initialQuantity: 10, initialValue: 20 },
    { inventoryName, productId: nut.id, warehouse: 'Annex', initialQuantity: 4, initialValue: 4 },
  ]);
  const batch = await repository.createBatch({
    inventoryName,
    fileNames: ['moves.xlsx'],
    checksum: 'seed',
    startedAt: new Date('2024-06-01T10:00:00.000Z'),
    processedAt: new Date('2024-06-01T10:00:05.000Z'),
    rowsTotal: 4,
    rowsImported: 4,
  });

  const entry = (productId: string, documentNumber: string, m: Movement): NewLedgerEntry => ({
    inventoryName,
    batchId: batch.id,
    productId,
    documentType: m.quantity > 0 ? 'EA' : 'SA',
    documentNumber,
    total: Math.abs(m.quantity) * m.unitCost,
    category: '',
    lot: '',
    finalQuantity: null,
    costCenter: null,
    ...m,
  });

  await repository.insertLedgerEntries([
    entry(bolt.id, '10', { date: '2024-01-05', warehouse: 'Main', quantity: 5, unitCost: 2, category: 'HW' }),
    entry(bolt.id, '11', { date: '2024-03-10', warehouse: 'Main', quantity: -3, unitCost: 2.5, category: 'HW' }),
    entry(nut.id, '12', { date: '2023-11-02', warehouse: 'Annex', quantity: -4, unitCost: 1, category: 'HW' }),
    entry(gear.id, '13', { date: '2024-06-01', warehouse: 'Yard', quantity: 2, unitCost: 3, category: 'Parts' }),
  ]);

  return { batch, bolt, nut, gear };
}

/** Product "50" (Wire) received ten times 0.1 units in February 2024. */
export async function seedTenths(
  repository: InMemoryInventoryRepository,
  batchId: string,
): Promise<ProductRow> {
  const wire = await repository.insertProduct({
    inventoryName: 'north',
    code: '50',
    description: 'Wire',
    group: 'HW',
    initialBalance: 0,
    initialUnitCost: 0.3,
  });
  await repository.insertLedgerEntries(
    Array.from({ length: 10 }, (_, i) => ({
      inventoryName: 'north',
      batchId,
      productId: wire.id,
      warehouse: 'Main',
      date: `2024-02-${String(i + 10)}`,
      documentType: 'EA',
      documentNumber: String(100 + i),
      quantity: 0.1,
      unitCost: 0.3,
      total: 0.03,
      category: 'HW',
      lot: '',
      finalQuantity: null,
      costCenter: null,
    })),
  );
  return wire;
}
