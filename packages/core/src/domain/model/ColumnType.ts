/**
 * Physical column types a dataset can carry.
 *
 * Integer and floating-point types carry their bit width so that a copy stored
 * with a narrower or wider representation can be told apart from an exact match.
 */
export const ColumnType = {
  TEXT: 'text',
  INT32: 'int32',
  INT64: 'int64',
  FLOAT32: 'float32',
  FLOAT64: 'float64',
  DATETIME: 'datetime',
} as const;

export type ColumnType = (typeof ColumnType)[keyof typeof ColumnType];

/** Logical category used to decide whether two column types are compatible. */
export type ColumnCategory = 'numeric' | 'text' | 'temporal';

const CATEGORIES: Record<ColumnType, ColumnCategory> = {
  [ColumnType.TEXT]: 'text',
  [ColumnType.INT32]: 'numeric',
  [ColumnType.INT64]: 'numeric',
  [ColumnType.FLOAT32]: 'numeric',
  [ColumnType.FLOAT64]: 'numeric',
  [ColumnType.DATETIME]: 'temporal',
};

const ALL_TYPES: ReadonlySet<string> = new Set(Object.values(ColumnType));

/** Logical category of a column type. */
export function columnCategory(type: ColumnType): ColumnCategory {
  return CATEGORIES[type];
}

/** `true` when both types belong to the same logical category. */
export function isCompatibleType(source: ColumnType, target: ColumnType): boolean {
  return CATEGORIES[source] === CATEGORIES[target];
}

export function isIntegerType(type: ColumnType): boolean {
  return type === ColumnType.INT32 || type === ColumnType.INT64;
}

export function isColumnType(value: unknown): value is ColumnType {
  return typeof value === 'string' && ALL_TYPES.has(value);
}
