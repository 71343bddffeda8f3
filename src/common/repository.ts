// Result of an insert-or-fetch write against a uniquely keyed entity.
export interface InsertResult<T> {
  record: T;
  created: boolean;
}

// Result of a write guarded by a state precondition (compare-and-set).
export interface ConditionalWriteResult<T> {
  record: T;
  applied: boolean;
}
