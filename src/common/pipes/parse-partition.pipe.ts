import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { setInventoryName } from '../logger/request-context';

export const DEFAULT_INVENTORY = 'default';
export const MAX_INVENTORY_NAME_LENGTH = 128;

export function normalizeInventoryName(raw: unknown): string {
  const name = typeof raw === 'string' ? raw.trim().toLowerCase() : '';
  return name.length > 0 ? name : DEFAULT_INVENTORY;
}

/**
 * Normalizes the `:inventoryName` route parameter into a partition key and
 * records it on the request context for logging.
 */
@Injectable()
export class ParsePartitionPipe implements PipeTransform<unknown, string> {
  transform(value: unknown): string {
    const name = normalizeInventoryName(value);
    if (name.length > MAX_INVENTORY_NAME_LENGTH) {
      throw new BadRequestException(
        `Inventory name must be at most ${MAX_INVENTORY_NAME_LENGTH} characters`,
      );
    }
    setInventoryName(name);
    return name;
  }
}
