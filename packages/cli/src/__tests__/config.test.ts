import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../config';
import { CLIError } from '../index';

const tempDirs: string[] = [];

afterEach(() => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  }
});

function configDir(contents?: string): string {
  const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'drafthouse-config-test-'));
  tempDirs.push(tmp);
  if (contents !== undefined) {
    fs.writeFileSync(path.join(tmp, 'config.json'), contents);
  }
  return tmp;
}

describe('loadConfig', () => {
  it('returns defaults when no config file exists', () => {
    expect(loadConfig(configDir())).toEqual({
      format: 'text',
      colorRange: [0, 999],
      preview: { warpGlyph: '#', weftGlyph: '.', maxWarps: 60, maxWefts: 30 },
    });
  });

  it('fills keys the file leaves out', () => {
    const config = loadConfig(configDir(JSON.stringify({ format: 'json', preview: { maxWefts: 8 } })));
    expect(config.format).toBe('json');
    expect(config.colorRange).toEqual([0, 999]);
    expect(config.preview).toEqual({ ...DEFAULT_CONFIG.preview, maxWefts: 8 });
  });

  it('rejects unknown keys', () => {
    expect(() => loadConfig(configDir(JSON.stringify({ colour: 'red' })))).toThrow(
      "Unrecognized key(s) in object: 'colour'",
    );
  });

  it('names the path of an invalid value', () => {
    expect(() => loadConfig(configDir(JSON.stringify({ preview: { maxWarps: -1 } })))).toThrow(
      'preview.maxWarps: Number must be greater than 0',
    );
  });

  it('rejects an inverted color range', () => {
    expect(() => loadConfig(configDir(JSON.stringify({ colorRange: [10, 5] })))).toThrow(
      'colorRange: colorRange low must be below high',
    );
  });

  it('throws CLIError for malformed JSON', () => {
    const dir = configDir('{ not json');
    expect(() => loadConfig(dir)).toThrow(CLIError);
    expect(() => loadConfig(dir)).toThrow(`Could not read ${path.join(dir, 'config.json')}`);
  });
});
