// values/arrayCodec.ts

import type { Column } from "../model-types.js";
import {
  encodeArray,
  isZero,
  toStorageValue,
  zeroValue,
  type ScalarValue,
  type StorageValue,
} from "./valueParser.js";

export { encodeArray };

export function slotName(column: Column, index: number): string {
  return `${column.name}_${index}`;
}

function arrayLength(column: Column): number {
  if (!column.type.isArray) {
    throw new TypeError(`column ${column.name} is not an array column`);
  }
  return column.arrayLength ?? 0;
}

/**
 * Spread values over `Name_0 … Name_(N-1)` and the aggregate. Slots past the
 * end of `values` are written as NULL.
 */
export function packArray(
  column: Column,
  values: readonly ScalarValue[]
): Record<string, StorageValue> {
  const length = arrayLength(column);
  if (values.length > length) {
    throw new RangeError(
      `column ${column.name} holds at most ${length} values, got ${values.length}`
    );
  }

  const out: Record<string, StorageValue> = {
    [column.name]: encodeArray(values.filter((v) => !isZero(v))),
  };

  for (let i = 0; i < length; i++) {
    const v = values[i];
    out[slotName(column, i)] = v ? toStorageValue(v) : null;
  }
  return out;
}

function isZeroStored(column: Column, stored: unknown): boolean {
  if (stored === null || stored === undefined) return true;
  if (!column.type.isArray) return false;

  if (stored instanceof Uint8Array) return stored.length === 0;

  const zero = toStorageValue(zeroValue(column.type.baseType.kind));
  return stored === zero || stored === 0 || stored === 0n;
}

/** Read slots back in order; the first missing or zero slot ends the array */
export function unpackArray(
  column: Column,
  record: Readonly<Record<string, unknown>>
): unknown[] {
  const length = arrayLength(column);
  const out: unknown[] = [];

  for (let i = 0; i < length; i++) {
    const stored = record[slotName(column, i)];
    if (isZeroStored(column, stored)) break;
    out.push(stored);
  }
  return out;
}
