import type { Aggregate, Connection, PipelineStage, Query, Schema } from 'mongoose';

export const PARTITION_PATH = 'inventoryName';

export class UnscopedQueryError extends Error {
  constructor(model: string, operation: string) {
    super(`${operation} on ${model} without an ${PARTITION_PATH} predicate`);
    this.name = 'UnscopedQueryError';
  }
}

const SCOPED_QUERY_OPS = [
  'find',
  'findOne',
  'findOneAndUpdate',
  'findOneAndReplace',
  'findOneAndDelete',
  'countDocuments',
  'distinct',
  'updateOne',
  'updateMany',
  'replaceOne',
  'deleteOne',
  'deleteMany',
] as const;

function hasPartitionMatch(stage: PipelineStage | undefined): boolean {
  return !!stage && '$match' in stage && stage.$match[PARTITION_PATH] != null;
}

/**
 * Refuses queries on partition-scoped collections (schemas with an
 * `inventoryName` path) whose filter does not name the partition. A query
 * may opt out with `setOptions({ skipPartition: true })`.
 */
export function PartitionScopePlugin(schema: Schema) {
  if (!schema.path(PARTITION_PATH)) return;

  const assertScoped = (query: Query<unknown, unknown>, operation: string) => {
    if (query.getOptions().skipPartition === true) return;
    const scoped = Object.entries(query.getFilter()).some(
      ([key, value]) => key === PARTITION_PATH && value != null,
    );
    if (!scoped) {
      throw new UnscopedQueryError(query.model.modelName, operation);
    }
  };

  for (const operation of SCOPED_QUERY_OPS) {
    schema.pre(operation, function (this: Query<unknown, unknown>) {
      assertScoped(this, operation);
    });
  }

  schema.pre(
    'aggregate',
    function (this: Aggregate<unknown> & { options?: { skipPartition?: boolean } }) {
      if (this.options?.skipPartition === true) return;
      if (!hasPartitionMatch(this.pipeline()[0])) {
        throw new UnscopedQueryError('aggregate', 'aggregate');
      }
    },
  );
}

// Must run before any model is compiled on the connection.
export function applyPartitionScopePlugin(conn: Connection) {
  conn.plugin(PartitionScopePlugin);
}
