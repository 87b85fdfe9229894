import { BadRequestException, Injectable } from '@nestjs/common';
import { InventoryRepository, ProductRow } from '../core/persistence/inventory.repository';
import { normalizeInventoryName } from '../common/pipes/parse-partition.pipe';
import { QueryProductsDto } from './dto/query-products.dto';

export interface ProductView {
  id: string;
  code: string;
  description: string;
  group: string;
  initialBalance: number;
  initialUnitCost: number;
}

export function toProductView(product: ProductRow): ProductView {
  return {
    id: product.id,
    code: product.code,
    description: product.description,
    group: product.group,
    initialBalance: product.initialBalance,
    initialUnitCost: product.initialUnitCost,
  };
}

@Injectable()
export class ProductsService {
  constructor(private readonly repository: InventoryRepository) {}

  async listProducts(inventoryName: string, query: QueryProductsDto = {}): Promise<ProductView[]> {
    const products = await this.repository.findProducts(inventoryName, {
      search: query.search?.trim() || undefined,
      group: query.group?.trim() || undefined,
    });
    return products.map(toProductView);
  }

  async listInventories(): Promise<string[]> {
    return this.repository.listPartitions();
  }

  /**
   * Partitions come into being with their first upload; this only checks
   * that the name is usable and not taken.
   */
  async createInventory(rawName: string): Promise<{ ok: true; inventoryName: string; message: string }> {
    const inventoryName = normalizeInventoryName(rawName);
    const existing = await this.repository.listPartitions();
    if (existing.includes(inventoryName)) {
      throw new BadRequestException(`Inventory "${inventoryName}" already exists`);
    }
    return {
      ok: true,
      inventoryName,
      message: `Inventory "${inventoryName}" is ready for its base file`,
    };
  }
}
