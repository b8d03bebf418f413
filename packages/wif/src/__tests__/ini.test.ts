import { describe, it, expect } from 'vitest';
import { formatIni, parseIni } from '../ini';

describe('parseIni', () => {
  it('folds section and key names to lower case', () => {
    const ini = parseIni('[Color Palette]\nEntries = 4\n');
    expect(ini.sectionNames()).toEqual(['color palette']);
    expect(ini.get('COLOR PALETTE', 'ENTRIES')).toBe('4');
  });

  it('trims keys and values but keeps inner spaces', () => {
    const ini = parseIni('[WIF]\n  Source Program  =  Loom Studio 2  \n');
    expect(ini.get('wif', 'source program')).toBe('Loom Studio 2');
  });

  it('splits on the first equals sign only', () => {
    const ini = parseIni('[NOTES]\n1=a=b\n');
    expect(ini.get('NOTES', '1')).toBe('a=b');
  });

  it('records keys without a value as present but empty-valued', () => {
    const ini = parseIni('[NOTES]\n1\n2=\n');
    const section = ini.section('NOTES');
    expect(section?.has('1')).toBe(true);
    expect(section?.get('1')).toBeUndefined();
    expect(section?.get('2')).toBe('');
  });

  it('skips comments, blank lines and entries outside any section', () => {
    const ini = parseIni('orphan=1\n; comment\n# another\n\n[WEAVING]\nShafts=8\n');
    expect(ini.sectionNames()).toEqual(['weaving']);
    expect(ini.get('WEAVING', 'Shafts')).toBe('8');
    expect(ini.get('WEAVING', 'orphan')).toBeUndefined();
  });

  it('keeps a value that starts with a hash', () => {
    const ini = parseIni('[WARP SYMBOL TABLE]\n1=#35\n');
    expect(ini.get('WARP SYMBOL TABLE', '1')).toBe('#35');
  });

  it('lets a later duplicate key win and merges reopened sections', () => {
    const ini = parseIni('[TEXT]\nTitle=First\n[WEAVING]\nShafts=4\n[text]\ntitle=Second\nAuthor=Me\n');
    expect(ini.get('TEXT', 'Title')).toBe('Second');
    expect(ini.get('TEXT', 'Author')).toBe('Me');
  });

  it('handles CRLF line endings', () => {
    const ini = parseIni('[WEAVING]\r\nShafts=4\r\nTreadles=6\r\n');
    expect(ini.get('WEAVING', 'Treadles')).toBe('6');
  });

  it('registers a section that has a header but no entries', () => {
    const ini = parseIni('[TIEUP]\n');
    expect(ini.hasSection('TIEUP')).toBe(true);
    expect(ini.section('TIEUP')?.size).toBe(0);
  });
});

describe('formatIni', () => {
  it('writes sections in order separated by blank lines', () => {
    const out = formatIni([
      { name: 'WIF', entries: [['Version', '1.1']] },
      { name: 'CONTENTS', entries: [['WEAVING', 'true']] },
      { name: 'WEAVING', entries: [['Shafts', '4'], ['Treadles', '4']] },
    ]);
    expect(out).toBe('[WIF]\nVersion=1.1\n\n[CONTENTS]\nWEAVING=true\n\n[WEAVING]\nShafts=4\nTreadles=4\n');
  });

  it('writes a header for a section with no entries', () => {
    expect(formatIni([{ name: 'TIEUP', entries: [] }])).toBe('[TIEUP]\n');
  });
});
