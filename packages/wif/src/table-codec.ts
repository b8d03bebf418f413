/**
 * Keyed table sections: `identifier = value` for an open-ended set of keys.
 *
 * Table sections are only read when CONTENTS says they exist, so a missing
 * section is an error here rather than an empty table.
 */

import type { FieldCodec } from './field-codec';
import type { IniEntry, IniMap } from './ini';
import type { SectionCodec } from './section-codec';
import { Table } from './identifiers';
import { MissingSectionError, TableKeyError, WifError, withFieldContext } from './errors';

export interface TableSectionSpec<K extends number, V> {
  name: string;
  key: FieldCodec<K>;
  value: FieldCodec<V>;
}

export function readTable<K extends number, V>(ini: IniMap, spec: TableSectionSpec<K, V>): Table<K, V> {
  const section = ini.section(spec.name);
  if (!section) {
    throw new MissingSectionError(spec.name);
  }

  const table = new Table<K, V>();
  for (const [rawKey, rawValue] of section) {
    if (rawValue === undefined) continue;

    const key = decodeKey(spec, rawKey);
    table.set(key, withFieldContext(spec.name, rawKey, () => spec.value.decode(rawValue)));
  }
  return table;
}

function decodeKey<K extends number, V>(spec: TableSectionSpec<K, V>, rawKey: string): K {
  try {
    return spec.key.decode(rawKey);
  } catch (err) {
    if (err instanceof WifError) {
      throw new TableKeyError(spec.name, rawKey);
    }
    throw err;
  }
}

export function writeTable<K extends number, V>(table: Table<K, V>, spec: TableSectionSpec<K, V>): IniEntry[] {
  const entries: IniEntry[] = [];
  for (const [key, value] of table) {
    const encoded = spec.value.encode(value);
    if (encoded !== undefined) {
      entries.push([spec.key.encode(key) ?? String(key), encoded]);
    }
  }
  return entries;
}

export function tableSection<K extends number, V>(spec: TableSectionSpec<K, V>): SectionCodec<Table<K, V>> {
  return {
    name: spec.name,
    read: ini => readTable(ini, spec),
    write: table => writeTable(table, spec),
  };
}
