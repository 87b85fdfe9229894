import { BadRequestException } from '@nestjs/common';
import { ProductsService } from '../../src/products/products.service';
import { InMemoryInventoryRepository } from '../utils/in-memory-inventory.repository';
import { seedInventory } from '../utils/seed';

describe('ProductsService (unit)', () => {
  let repository: InMemoryInventoryRepository;
  let service: ProductsService;

  beforeEach(async () => {
    repository = new InMemoryInventoryRepository();
    service = new ProductsService(repository);
    await seedInventory(repository);
  });

  it('lists products by code, filtered by search and group', async () => {
    expect((await service.listProducts('north')).map((p) => p.code)).toEqual(['1', '2', '3']);
    expect((await service.listProducts('north', { search: 'GEA' })).map((p) => p.code)).toEqual(['3']);
    expect((await service.listProducts('north', { group: 'hw' })).map((p) => p.code)).toEqual(['1', '2']);
    await expect(service.listProducts('south')).resolves.toEqual([]);
  });

  it('lists partitions that hold data', async () => {
    await seedInventory(repository, 'east');
    await expect(service.listInventories()).resolves.toEqual(['east', 'north']);
  });

  it('accepts a new inventory name after normalizing it', async () => {
    await expect(service.createInventory('  South ')).resolves.toEqual({
      ok: true,
      inventoryName: 'south',
      message: 'Inventory "south" is ready for its base file',
    });
    await expect(service.createInventory('')).resolves.toMatchObject({ inventoryName: 'default' });
  });

  it('refuses a name already in use', async () => {
    await expect(service.createInventory('NORTH')).rejects.toThrow(
      new BadRequestException('Inventory "north" already exists'),
    );
  });
});
