import type { ColumnType } from '../model/ColumnType.js';
import type { Dataset } from '../model/Dataset.js';

/** Source type → type it is stored as, for types a format cannot represent exactly. */
export type TypeCoercions = Readonly<Partial<Record<ColumnType, ColumnType>>>;

/**
 * Port for persisting a dataset into one physical representation.
 *
 * Implementations are stateless between calls: everything they need to read a
 * copy back is found at the destination. The meaning of `destination` is up to
 * the adapter (a file path, a table name).
 */
export interface FormatAdapter {
  /** Unique format name, used as the key in load inputs and efficiency records. */
  readonly name: string;
  /**
   * Types this format stores differently from the source. The verifier reports
   * these as soft `TYPE_COERCION` findings rather than type mismatches.
   */
  readonly declaredCoercions?: TypeCoercions;
  /** Persist the dataset, replacing any previous copy. Resolves to the number of bytes the copy occupies. */
  write(dataset: Dataset, destination: string): Promise<number>;
  /** Read a previously written copy. */
  read(destination: string): Promise<Dataset>;
}
