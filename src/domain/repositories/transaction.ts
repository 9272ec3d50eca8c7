// ============================================================================
// src/domain/repositories/transaction.ts
// ============================================================================

/**
 * Opaque handle of an open transaction. Only the infrastructure that created
 * it knows its shape; repositories validate it in `withTransaction`.
 */
export type TransactionContext = unknown;

export interface Transactional<T> {
  withTransaction(context: TransactionContext): T;
}

export interface TransactionManager {
  /** Runs `work` inside one transaction. Commits when it resolves, rolls back when it throws. */
  run<T>(work: (context: TransactionContext) => Promise<T>): Promise<T>;
}
