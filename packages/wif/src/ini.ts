/**
 * INI tokenizer and emitter.
 *
 * Reading folds section and key names to lower case, so lookups are
 * case-insensitive. Writing keeps names exactly as given and emits sections
 * in the order they are supplied.
 */

// Matches `[SECTION NAME]`
const SECTION_HEADER_RE = /^\[(.*)\]$/;

export type IniSectionMap = ReadonlyMap<string, string | undefined>;

export class IniMap {
  private readonly sections = new Map<string, Map<string, string | undefined>>();

  /** Open (or reopen) a section. Returns the entry map for that section. */
  addSection(name: string): Map<string, string | undefined> {
    const key = name.trim().toLowerCase();
    let entries = this.sections.get(key);
    if (!entries) {
      entries = new Map();
      this.sections.set(key, entries);
    }
    return entries;
  }

  hasSection(name: string): boolean {
    return this.sections.has(name.toLowerCase());
  }

  section(name: string): IniSectionMap | undefined {
    return this.sections.get(name.toLowerCase());
  }

  /** Value of `key` in `section`; undefined when either is missing or the key has no value. */
  get(section: string, key: string): string | undefined {
    return this.sections.get(section.toLowerCase())?.get(key.toLowerCase());
  }

  sectionNames(): string[] {
    return [...this.sections.keys()];
  }
}

export function parseIni(input: string): IniMap {
  const ini = new IniMap();
  let current: Map<string, string | undefined> | null = null;

  for (const rawLine of input.replace(/\r\n?/g, '\n').split('\n')) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith(';') || line.startsWith('#')) continue;

    const headerMatch = SECTION_HEADER_RE.exec(line);
    if (headerMatch) {
      current = ini.addSection(headerMatch[1]);
      continue;
    }

    // Entries before the first section header belong to no section
    if (current === null) continue;

    const eq = line.indexOf('=');
    if (eq === -1) {
      current.set(line.toLowerCase(), undefined);
    } else {
      current.set(line.slice(0, eq).trim().toLowerCase(), line.slice(eq + 1).trim());
    }
  }

  return ini;
}

// ============================================================================
// Writing
// ============================================================================

export type IniEntry = [key: string, value: string];

export interface IniSection {
  name: string;
  entries: IniEntry[];
}

export function formatIni(sections: readonly IniSection[]): string {
  const blocks = sections.map(section => {
    const lines = [`[${section.name}]`];
    for (const [key, value] of section.entries) {
      lines.push(`${key}=${value}`);
    }
    return lines.join('\n');
  });
  return blocks.join('\n\n') + '\n';
}
