/**
 * @fileoverview Record adapter
 * @description Field-descriptor tables that translate typed records to stored
 * field mappings and back, plus identifier access and collection naming.
 */

import type { DocumentData, DocumentSnapshot } from './adapters/store';
import { MapperError, MapperErrorCode } from './errors';

// ── Types ──────────────────────────────────────────────────────────────

/** Tag that keeps a property out of the stored document. */
export const IGNORE_TAG = '-';

export type ModelClass<T extends object> = new () => T;

/** Property → stored field name. Untagged properties are not stored. */
export type FieldTags<T> = { readonly [K in keyof T]?: string };

/** Properties that can hold a document identifier. */
export type IdKey<T> = Extract<
  { [K in keyof T]-?: T[K] extends string | undefined ? K : never }[keyof T],
  string
>;

export interface ModelOptions<T extends object> {
  fields: FieldTags<T>;
  /**
   * Identifier property. Defaults to `id` when a fresh instance owns one;
   * `null` declares a record type without identifier.
   */
  idField?: IdKey<T> | null;
  /** Type name used for default collection naming (defaults to the class name) */
  name?: string;
}

export interface FieldDescriptor {
  /** Property on the record */
  property: string;
  /** Field name in the stored document */
  name: string;
}

/**
 * Record types implement this to pick their own collection name.
 */
export interface HasCustomCollectionName {
  collectionName(): string;
}

export function hasCustomCollectionName(value: object): value is HasCustomCollectionName {
  return (
    'collectionName' in value &&
    typeof value.collectionName === 'function' &&
    value.collectionName.length === 0
  );
}

// ── Descriptor ─────────────────────────────────────────────────────────

function buildFieldTable(
  modelName: string,
  tags: Readonly<Record<string, string | undefined>>,
  idField: string | null,
): FieldDescriptor[] {
  const table: FieldDescriptor[] = [];
  const seen = new Set<string>();

  for (const [property, tag] of Object.entries(tags)) {
    if (property === idField) continue;
    if (typeof tag !== 'string' || tag === '' || tag === IGNORE_TAG) continue;
    if (seen.has(tag)) {
      throw new MapperError(
        MapperErrorCode.INVALID_MODEL,
        `field "${tag}" is tagged on more than one property of ${modelName}`,
        { model: modelName, field: tag },
      );
    }
    seen.add(tag);
    table.push({ property, name: tag });
  }
  return table;
}

export class ModelDescriptor<T extends object> {
  readonly name: string;
  readonly idField: string | null;
  readonly fields: readonly FieldDescriptor[];

  constructor(private readonly modelClass: ModelClass<T>, options: ModelOptions<T>) {
    this.name = options.name ?? modelClass.name;
    if (options.idField === undefined) {
      // Only a string-valued `id` counts; any other `id` leaves the model without one.
      this.idField = typeof Reflect.get(new modelClass(), 'id') === 'string' ? 'id' : null;
    } else {
      this.idField = options.idField;
    }
    this.fields = buildFieldTable(this.name, options.fields, this.idField);
  }

  /** Allocate an empty record. */
  create(): T {
    return new this.modelClass();
  }

  /** Identifier value, or '' when unset, absent or not a string. */
  getId(record: T): string {
    if (this.idField === null) return '';
    const value: unknown = Reflect.get(record, this.idField);
    return typeof value === 'string' ? value : '';
  }

  /** Set the identifier. No-op when the type has none or the property is read-only. */
  setId(record: T, id: string): void {
    if (this.idField === null) return;
    Reflect.set(record, this.idField, id);
  }

  toFieldMapping(record: T): DocumentData {
    const data: DocumentData = {};
    for (const field of this.fields) {
      data[field.name] = Reflect.get(record, field.property);
    }
    return data;
  }

  /**
   * Copy tagged fields present in the snapshot onto `dest`, then inject the
   * snapshot's identifier. Fields missing from the document keep their value.
   */
  fromDocument(snapshot: DocumentSnapshot, dest: T): T {
    for (const field of this.fields) {
      if (!Object.prototype.hasOwnProperty.call(snapshot.data, field.name)) continue;
      if (!Reflect.set(dest, field.property, snapshot.data[field.name])) {
        throw new MapperError(
          MapperErrorCode.DECODE_FAILED,
          `failed to decode field "${field.name}" into ${this.name}.${field.property}`,
          { model: this.name, field: field.name },
        );
      }
    }
    this.setId(dest, snapshot.id);
    return dest;
  }

  /**
   * Resolved on every call: a custom `collectionName()` wins, otherwise the
   * lowercased type name plus "s".
   */
  collectionName(): string {
    const instance = this.create();
    if (hasCustomCollectionName(instance)) {
      return instance.collectionName();
    }
    return `${this.name.toLowerCase()}s`;
  }
}

/**
 * Register a record class and its field tags.
 *
 * @example
 * ```typescript
 * class Item {
 *   id = '';
 *   name = '';
 *   price = 0;
 * }
 * const ItemModel = defineModel(Item, { fields: { name: 'name', price: 'price' } });
 * ItemModel.collectionName(); // 'items'
 * ```
 */
export function defineModel<T extends object>(
  modelClass: ModelClass<T>,
  options: ModelOptions<T>,
): ModelDescriptor<T> {
  return new ModelDescriptor(modelClass, options);
}
