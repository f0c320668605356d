import { z } from 'zod';

/** Stringification contract shared by every labelled entity. */
export interface Labelled {
  toString: () => string;
}

/** A decoded, frozen record. */
export type Entity<T> = Readonly<T & Labelled>;

/** Optional string; absent and `null` read as `null`. */
export function text() {
  return z
    .string()
    .nullish()
    .transform((value) => value ?? null);
}

/** Optional boolean; absent and `null` read as `null`. */
export function flag() {
  return z
    .boolean()
    .nullish()
    .transform((value) => value ?? null);
}

/** Optional number; absent and `null` read as `null`. */
export function count() {
  return z
    .number()
    .nullish()
    .transform((value) => value ?? null);
}

/** Optional ISO timestamp decoded to a `Date`. */
export function timestamp() {
  return z
    .string()
    .nullish()
    .transform((value, ctx) => {
      if (value === null || value === undefined) {
        return null;
      }

      const date = new Date(value);
      if (Number.isNaN(date.getTime())) {
        ctx.addIssue({ code: z.ZodIssueCode.invalid_date, message: `Invalid timestamp: ${value}` });
        return z.NEVER;
      }

      return date;
    });
}

/** Optional list, frozen; absent and `null` read as `[]`. */
export function list<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((value): readonly z.output<T>[] => Object.freeze(value ?? []));
}

/** Optional nested object; absent and `null` read as `null`. */
export function nested<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? null);
}

/** Object whose own absence decodes as `{}`. Unknown keys are dropped. */
export function entity<Shape extends z.ZodRawShape>(shape: Shape) {
  return z.preprocess((value) => value ?? {}, z.object(shape));
}

/**
 * Freezes `data` and makes it stringify to `label`, or `''` without one.
 */
export function labelled<T extends object>(data: T, label: string | null): Entity<T> {
  const record: T & Labelled = { ...data, toString: () => label ?? '' };
  return Object.freeze(record);
}

/** Freezes a record that has no label. */
export function frozen<T extends object>(data: T): Readonly<T> {
  return Object.freeze({ ...data });
}
