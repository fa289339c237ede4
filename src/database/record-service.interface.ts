/**
 * Capability set shared by the three table services.
 *
 * `update` is part of the contract but every current implementation rejects
 * it with UnsupportedOperationError; table-specific mutators
 * (attachInference, markComplete) carry the supported changes.
 */
export interface RecordService<TCreate, TRow, TQuery> {
  create(fields: TCreate): Promise<number>;
  retrieve(query?: TQuery): Promise<TRow[]>;
  update(id: number, changes: Partial<TCreate>): Promise<boolean>;
  delete(id: number): Promise<boolean>;
}
