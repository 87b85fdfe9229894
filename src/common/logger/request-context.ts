import { AsyncLocalStorage } from 'node:async_hooks';

export interface RequestContextStore {
  requestId: string;
  inventoryName?: string;
}

export const requestContext = new AsyncLocalStorage<RequestContextStore>();

export function getRequestId(): string | undefined {
  return requestContext.getStore()?.requestId;
}

export function getInventoryName(): string | undefined {
  return requestContext.getStore()?.inventoryName;
}

export function setInventoryName(inventoryName: string): void {
  const store = requestContext.getStore();
  if (store) store.inventoryName = inventoryName;
}

const INVENTORY_PATH = /^\/inventories\/([^/?#]+)/;

/** Partition named by an `/inventories/:inventoryName/...` URL, for request logs. */
export function inventoryFromPath(url: string | undefined): string | undefined {
  const match = url ? INVENTORY_PATH.exec(url) : null;
  if (!match) return undefined;
  let segment = match[1];
  try {
    segment = decodeURIComponent(segment);
  } catch (err: unknown) {
    if (!(err instanceof URIError)) throw err;
  }
  return segment.trim().toLowerCase() || undefined;
}
