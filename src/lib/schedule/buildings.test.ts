/**
 * Building directory tests
 */

import fs from 'fs';
import path from 'path';
import { describeBuilding, loadBuildingDirectory } from './buildings';
import { ConfigError } from './errors';
import { makeTempDir, removeDir } from '../../test-utils/workbook';

describe('Building directory', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = makeTempDir();
    file = path.join(dir, 'buildings.json');
  });

  afterEach(() => removeDir(dir));

  const writeJson = (content: string) => fs.writeFileSync(file, content, 'utf-8');

  describe('Loading', () => {
    test('1. Reads entries keyed by abbreviation', () => {
      writeJson(
        JSON.stringify([
          { abbreviation: ' SH ', name: 'Science Hall', address: '100 College Rd' },
          { abbreviation: 'AC', name: 'Arts Centre', address: '' },
        ])
      );

      const directory = loadBuildingDirectory(file);

      expect([...directory.keys()]).toEqual(['SH', 'AC']);
      expect(directory.get('SH')).toEqual({ abbreviation: 'SH', name: 'Science Hall', address: '100 College Rd' });
    });

    test('2. A missing file gives an empty directory', () => {
      expect(loadBuildingDirectory(path.join(dir, 'absent.json')).size).toBe(0);
    });

    test('3. No file configured', () => {
      expect(loadBuildingDirectory(null).size).toBe(0);
    });

    test('4. Invalid JSON', () => {
      writeJson('[{ "abbreviation": ');
      expect(() => loadBuildingDirectory(file)).toThrow(ConfigError);
    });

    test('5. Not an array', () => {
      writeJson('{"SH": "Science Hall"}');
      expect(() => loadBuildingDirectory(file)).toThrow(`Building directory ${file} must contain a JSON array`);
    });

    test('6. Entry with a missing field', () => {
      writeJson(JSON.stringify([{ abbreviation: 'SH', name: 'Science Hall', address: '100 College Rd' }, { abbreviation: 'AC' }]));
      expect(() => loadBuildingDirectory(file)).toThrow(
        `Building directory ${file}: entry 1 needs string "abbreviation", "name" and "address" fields`
      );
    });
  });

  describe('describeBuilding', () => {
    const directory = new Map([
      ['SH', { abbreviation: 'SH', name: 'Science Hall', address: '100 College Rd' }],
      ['AC', { abbreviation: 'AC', name: 'Arts Centre', address: '' }],
    ]);

    test('7. Expands the code before the dash', () => {
      expect(describeBuilding('SH-2355', directory)).toBe('Science Hall: 100 College Rd');
      expect(describeBuilding('AC-101', directory)).toBe('Arts Centre');
    });

    test('8. Unknown or missing locations', () => {
      expect(describeBuilding('XY-1', directory)).toBeNull();
      expect(describeBuilding('Gym', directory)).toBeNull();
      expect(describeBuilding(null, directory)).toBeNull();
    });
  });
});
