/**
 * Fixed-shape record sections.
 *
 * A record section is declared once as a pair of functions over a
 * FieldReader / field list, and every read or write of it goes through
 * the same lookup, context-wrapping and omission rules below.
 */

import type { FieldCodec } from './field-codec';
import type { IniEntry, IniMap } from './ini';
import { MissingRequiredFieldError, withFieldContext } from './errors';

/** Anything that reads one section from a raw map and writes it back as entries. */
export interface SectionCodec<T> {
  readonly name: string;
  read(ini: IniMap): T;
  write(value: T): IniEntry[];
}

/**
 * Field lookups within one section. Required fields throw when missing;
 * optional ones yield undefined. Decode failures carry section and field.
 */
export class FieldReader {
  constructor(
    private readonly ini: IniMap,
    public readonly section: string,
  ) {}

  required<T>(field: string, codec: FieldCodec<T>): T {
    const raw = this.ini.get(this.section, field);
    if (raw === undefined) {
      throw new MissingRequiredFieldError(this.section, field);
    }
    return withFieldContext(this.section, field, () => codec.decode(raw));
  }

  optional<T>(field: string, codec: FieldCodec<T>): T | undefined {
    const raw = this.ini.get(this.section, field);
    if (raw === undefined) return undefined;
    return withFieldContext(this.section, field, () => codec.decode(raw));
  }
}

/** Pairs a field key with its codec and value, for writing. */
export interface FieldValue {
  readonly field: string;
  readonly encoded: string | undefined;
}

export function field<T>(name: string, codec: FieldCodec<T>, value: T | undefined): FieldValue {
  return { field: name, encoded: value === undefined ? undefined : codec.encode(value) };
}

export interface RecordSectionSpec<T> {
  name: string;
  read(fields: FieldReader): T;
  fields(value: T): FieldValue[];
}

export function recordSection<T>(spec: RecordSectionSpec<T>): SectionCodec<T> {
  return {
    name: spec.name,
    read: ini => spec.read(new FieldReader(ini, spec.name)),
    write(value) {
      const entries: IniEntry[] = [];
      for (const { field: key, encoded } of spec.fields(value)) {
        if (encoded !== undefined) {
          entries.push([key, encoded]);
        }
      }
      return entries;
    },
  };
}
