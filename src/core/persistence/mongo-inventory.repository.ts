import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, Types } from 'mongoose';
import {
  fromDecimal128,
  MONEY_SCALE,
  QTY_SCALE,
  toDecimal128,
} from '../../common/decimal/decimal.util';
import { ImportBatch, ImportBatchDocument } from '../../batches/import-batch.schema';
import { Product, ProductDocument } from '../../products/product.schema';
import {
  WarehouseDetail,
  WarehouseDetailDocument,
} from '../../products/warehouse-detail.schema';
import {
  InventoryRecord,
  InventoryRecordDocument,
} from '../../ledger/inventory-record.schema';
import {
  BatchCompletion,
  ImportBatchRow,
  InventoryRepository,
  LedgerEntryRow,
  LedgerFilter,
  LedgerKey,
  LedgerQueryOptions,
  NewImportBatch,
  NewLedgerEntry,
  NewProduct,
  NewWarehouseDetail,
  ProductFilter,
  ProductRow,
  StoreSession,
  WarehouseDetailRow,
} from './inventory.repository';

type Stored<T> = T & { _id: Types.ObjectId };

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function contains(text: string) {
  return { $regex: escapeRegex(text), $options: 'i' };
}

function toDay(date: string): Date {
  return new Date(`${date}T00:00:00.000Z`);
}

function fromDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function objectIds(ids: string[]): Types.ObjectId[] {
  return ids.map((id) => new Types.ObjectId(id));
}

function toProductRow(doc: Stored<Product>): ProductRow {
  return {
    id: String(doc._id),
    inventoryName: doc.inventoryName,
    code: doc.code,
    description: doc.description,
    group: doc.group ?? '',
    initialBalance: fromDecimal128(doc.initialBalance),
    initialUnitCost: fromDecimal128(doc.initialUnitCost),
  };
}

function toWarehouseDetailRow(doc: Stored<WarehouseDetail>): WarehouseDetailRow {
  return {
    id: String(doc._id),
    inventoryName: doc.inventoryName,
    productId: String(doc.productId),
    warehouse: doc.warehouse,
    initialQuantity: fromDecimal128(doc.initialQuantity),
    initialValue: fromDecimal128(doc.initialValue),
  };
}

function toBatchRow(doc: Stored<ImportBatch>): ImportBatchRow {
  return {
    id: String(doc._id),
    inventoryName: doc.inventoryName,
    fileNames: [...(doc.fileNames ?? [])],
    checksum: doc.checksum,
    startedAt: doc.startedAt,
    processedAt: doc.processedAt ?? null,
    rowsTotal: doc.rowsTotal ?? 0,
    rowsImported: doc.rowsImported ?? 0,
  };
}

function toLedgerRow(doc: Stored<InventoryRecord>): LedgerEntryRow {
  return {
    id: String(doc._id),
    inventoryName: doc.inventoryName,
    batchId: String(doc.batchId),
    productId: String(doc.productId),
    warehouse: doc.warehouse ?? '',
    date: fromDay(doc.date),
    documentType: doc.documentType ?? null,
    documentNumber: doc.documentNumber ?? null,
    quantity: fromDecimal128(doc.quantity),
    unitCost: fromDecimal128(doc.unitCost),
    total: fromDecimal128(doc.total),
    category: doc.category ?? '',
    lot: doc.lot ?? '',
    finalQuantity: doc.finalQuantity == null ? null : fromDecimal128(doc.finalQuantity),
    costCenter: doc.costCenter ?? null,
  };
}

function productDoc(row: NewProduct): Product {
  return {
    inventoryName: row.inventoryName,
    code: row.code,
    description: row.description,
    group: row.group,
    initialBalance: toDecimal128(row.initialBalance, QTY_SCALE),
    initialUnitCost: toDecimal128(row.initialUnitCost, MONEY_SCALE),
  };
}

function warehouseDetailDoc(row: NewWarehouseDetail): WarehouseDetail {
  return {
    inventoryName: row.inventoryName,
    productId: new Types.ObjectId(row.productId),
    warehouse: row.warehouse,
    initialQuantity: toDecimal128(row.initialQuantity, QTY_SCALE),
    initialValue: toDecimal128(row.initialValue, MONEY_SCALE),
  };
}

function ledgerDoc(row: NewLedgerEntry): InventoryRecord {
  return {
    inventoryName: row.inventoryName,
    batchId: new Types.ObjectId(row.batchId),
    productId: new Types.ObjectId(row.productId),
    warehouse: row.warehouse,
    date: toDay(row.date),
    documentType: row.documentType,
    documentNumber: row.documentNumber,
    quantity: toDecimal128(row.quantity, QTY_SCALE),
    unitCost: toDecimal128(row.unitCost, MONEY_SCALE),
    total: toDecimal128(row.total, MONEY_SCALE),
    category: row.category,
    lot: row.lot,
    finalQuantity: row.finalQuantity == null ? null : toDecimal128(row.finalQuantity, QTY_SCALE),
    costCenter: row.costCenter,
  };
}

/**
 * Mongoose-backed repository. Requires a replica set for transactions.
 */
@Injectable()
export class MongoInventoryRepository extends InventoryRepository {
  constructor(
    @InjectModel(Product.name)
    private readonly productModel: Model<ProductDocument>,
    @InjectModel(WarehouseDetail.name)
    private readonly warehouseDetailModel: Model<WarehouseDetailDocument>,
    @InjectModel(ImportBatch.name)
    private readonly batchModel: Model<ImportBatchDocument>,
    @InjectModel(InventoryRecord.name)
    private readonly recordModel: Model<InventoryRecordDocument>,
  ) {
    super();
  }

  async withTransaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    const session = await this.productModel.db.startSession();
    try {
      // the driver may retry the callback on transient errors; keep the last result
      const results: T[] = [];
      await session.withTransaction(async () => {
        results.push(await work(session));
      });
      if (results.length === 0) {
        throw new Error('Transaction finished without running its work');
      }
      return results[results.length - 1];
    } finally {
      await session.endSession();
    }
  }

  async listPartitions(): Promise<string[]> {
    const [fromProducts, fromBatches] = await Promise.all([
      this.productModel.distinct('inventoryName').setOptions({ skipPartition: true }),
      this.batchModel.distinct('inventoryName').setOptions({ skipPartition: true }),
    ]);
    const names = new Set<string>([...fromProducts, ...fromBatches].map(String));
    return [...names].sort();
  }

  async hasProducts(inventoryName: string, session?: StoreSession): Promise<boolean> {
    const found = await this.productModel
      .exists({ inventoryName })
      .session(session ?? null);
    return found !== null;
  }

  async findProducts(
    inventoryName: string,
    filter: ProductFilter = {},
    session?: StoreSession,
  ): Promise<ProductRow[]> {
    const query: FilterQuery<ProductDocument> = { inventoryName };
    if (filter.ids) query._id = { $in: objectIds(filter.ids) };
    if (filter.codes) query.code = { $in: filter.codes };
    if (filter.group) query.group = contains(filter.group);
    if (filter.search) {
      query.$or = [{ code: contains(filter.search) }, { description: contains(filter.search) }];
    }
    const docs = await this.productModel
      .find(query)
      .sort({ code: 1 })
      .session(session ?? null)
      .lean<Stored<Product>[]>();
    return docs.map(toProductRow);
  }

  async findProductByCode(inventoryName: string, code: string): Promise<ProductRow | null> {
    const doc = await this.productModel
      .findOne({ inventoryName, code })
      .lean<Stored<Product>>();
    return doc ? toProductRow(doc) : null;
  }

  async insertProducts(rows: NewProduct[], session?: StoreSession): Promise<ProductRow[]> {
    if (rows.length === 0) return [];
    const docs = await this.productModel.insertMany(rows.map(productDoc), { session });
    return docs.map((d) => toProductRow(d.toObject()));
  }

  async insertProduct(row: NewProduct, session?: StoreSession): Promise<ProductRow> {
    const [doc] = await this.productModel.create([productDoc(row)], { session });
    return toProductRow(doc.toObject());
  }

  async insertWarehouseDetails(
    rows: NewWarehouseDetail[],
    session?: StoreSession,
  ): Promise<WarehouseDetailRow[]> {
    if (rows.length === 0) return [];
    const docs = await this.warehouseDetailModel.insertMany(rows.map(warehouseDetailDoc), {
      session,
    });
    return docs.map((d) => toWarehouseDetailRow(d.toObject()));
  }

  async insertWarehouseDetail(
    row: NewWarehouseDetail,
    session?: StoreSession,
  ): Promise<WarehouseDetailRow> {
    const [doc] = await this.warehouseDetailModel.create([warehouseDetailDoc(row)], { session });
    return toWarehouseDetailRow(doc.toObject());
  }

  async findWarehouseDetails(
    inventoryName: string,
    filter: { productIds?: string[]; warehouse?: string } = {},
  ): Promise<WarehouseDetailRow[]> {
    const query: FilterQuery<WarehouseDetailDocument> = { inventoryName };
    if (filter.productIds) query.productId = { $in: objectIds(filter.productIds) };
    if (filter.warehouse) query.warehouse = contains(filter.warehouse);
    const docs = await this.warehouseDetailModel.find(query).lean<Stored<WarehouseDetail>[]>();
    return docs.map(toWarehouseDetailRow);
  }

  async findBatchByChecksum(
    inventoryName: string,
    checksum: string,
    session?: StoreSession,
  ): Promise<ImportBatchRow | null> {
    const doc = await this.batchModel
      .findOne({ inventoryName, checksum })
      .session(session ?? null)
      .lean<Stored<ImportBatch>>();
    return doc ? toBatchRow(doc) : null;
  }

  async createBatch(row: NewImportBatch, session?: StoreSession): Promise<ImportBatchRow> {
    const [doc] = await this.batchModel.create([row], { session });
    return toBatchRow(doc.toObject());
  }

  async completeBatch(
    inventoryName: string,
    batchId: string,
    completion: BatchCompletion,
    session?: StoreSession,
  ): Promise<void> {
    await this.batchModel
      .updateOne({ inventoryName, _id: new Types.ObjectId(batchId) }, { $set: completion })
      .session(session ?? null);
  }

  async deleteBatch(
    inventoryName: string,
    batchId: string,
    session?: StoreSession,
  ): Promise<number> {
    const _id = new Types.ObjectId(batchId);
    const removed = await this.recordModel
      .deleteMany({ inventoryName, batchId: _id })
      .session(session ?? null);
    await this.batchModel.deleteOne({ inventoryName, _id }).session(session ?? null);
    return removed.deletedCount;
  }

  async listBatches(inventoryName: string): Promise<ImportBatchRow[]> {
    const docs = await this.batchModel
      .find({ inventoryName })
      .sort({ startedAt: -1, _id: -1 })
      .lean<Stored<ImportBatch>[]>();
    return docs.map(toBatchRow);
  }

  async findLedgerKeys(
    inventoryName: string,
    productIds: string[],
    session?: StoreSession,
  ): Promise<LedgerKey[]> {
    if (productIds.length === 0) return [];
    const docs = await this.recordModel
      .find(
        { inventoryName, productId: { $in: objectIds(productIds) } },
        {
          batchId: 1,
          productId: 1,
          documentType: 1,
          documentNumber: 1,
          costCenter: 1,
          date: 1,
          warehouse: 1,
        },
      )
      .session(session ?? null)
      .lean<Stored<InventoryRecord>[]>();
    return docs.map((d) => ({
      batchId: String(d.batchId),
      productId: String(d.productId),
      documentType: d.documentType ?? null,
      documentNumber: d.documentNumber ?? null,
      costCenter: d.costCenter ?? null,
      date: fromDay(d.date),
      warehouse: d.warehouse ?? '',
    }));
  }

  async insertLedgerEntries(
    rows: NewLedgerEntry[],
    session?: StoreSession,
  ): Promise<LedgerEntryRow[]> {
    if (rows.length === 0) return [];
    const docs = await this.recordModel.insertMany(rows.map(ledgerDoc), { session });
    return docs.map((d) => toLedgerRow(d.toObject()));
  }

  async insertLedgerEntry(row: NewLedgerEntry, session?: StoreSession): Promise<LedgerEntryRow> {
    const [doc] = await this.recordModel.create([ledgerDoc(row)], { session });
    return toLedgerRow(doc.toObject());
  }

  async findLedgerEntries(
    inventoryName: string,
    filter: LedgerFilter = {},
    options: LedgerQueryOptions = {},
  ): Promise<LedgerEntryRow[]> {
    const query: FilterQuery<InventoryRecordDocument> = { inventoryName };
    if (filter.productIds) query.productId = { $in: objectIds(filter.productIds) };
    if (filter.warehouse) query.warehouse = contains(filter.warehouse);
    if (filter.category) query.category = contains(filter.category);
    if (filter.dateFrom || filter.dateTo) {
      query.date = {
        ...(filter.dateFrom ? { $gte: toDay(filter.dateFrom) } : {}),
        ...(filter.dateTo ? { $lte: toDay(filter.dateTo) } : {}),
      };
    }
    const direction = options.order === 'desc' ? -1 : 1;
    let cursor = this.recordModel.find(query).sort({ date: direction, _id: direction });
    if (options.limit) cursor = cursor.limit(options.limit);
    const docs = await cursor.lean<Stored<InventoryRecord>[]>();
    return docs.map(toLedgerRow);
  }

  async countLedgerEntries(inventoryName: string): Promise<number> {
    return this.recordModel.countDocuments({ inventoryName });
  }
}
