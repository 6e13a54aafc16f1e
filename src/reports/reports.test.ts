import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { classifyCatalog } from '@classifier';
import { parseInventory } from '@inventory';

import { buildListing, entriesOf, formatAnalysisSummary, formatListingLine, formatSelectionSummary } from './format';
import { buildAnalysisReport, saveAnalysisReport } from './report';

const createCatalog = () => parseInventory({
  msInfo: { serverName: 'Home', swVersion: '14.5' },
  rooms: {
    r1: { name: 'Kitchen', type: 1 },
    r2: { name: 'Living room' }
  },
  cats: { c1: { name: 'Lighting' } },
  controls: {
    a: { name: 'Ceiling light', type: 'Dimmer', room: 'r1', cat: 'c1', states: { value: 'a-v' } },
    b: { name: 'Blind', type: 'Jalousie', room: 'r2' },
    c: { name: 'Spot', type: 'Dimmer', room: 'r2' },
    d: { name: 'Pump', type: 'Future' }
  }
});

const GENERATED_AT = new Date(Date.UTC(2026, 9, 19, 9, 30, 0));

describe('reports', () => {
  describe('buildAnalysisReport', () => {
    it('should summarise the controller and totals', () => {
      const catalog = createCatalog();
      const report = buildAnalysisReport(catalog, classifyCatalog(catalog), GENERATED_AT);

      expect(report.generatedAt).toBe('2026-10-19T09:30:00.000Z');
      expect(report.controller).toEqual({
        serverName: 'Home',
        softwareVersion: '14.5',
        lastModified: null,
        totalControls: 4,
        totalRooms: 2,
        totalTypes: 3,
        totalCategories: 1
      });
      expect(report.rooms).toEqual({
        r1: { name: 'Kitchen', type: 1 },
        r2: { name: 'Living room', type: null }
      });
    });

    it('should describe every control', () => {
      const catalog = createCatalog();
      const report = buildAnalysisReport(catalog, classifyCatalog(catalog), GENERATED_AT);

      expect(report.allControls[0]).toEqual({
        uuid: 'a',
        name: 'Ceiling light',
        type: 'Dimmer',
        typeReadable: 'Dimmer',
        room: 'Kitchen',
        category: 'Lighting',
        states: { value: 'a-v' },
        details: {}
      });
      expect(report.allControls[3].room).toBeNull();
    });

    it('should group by readable type and by room', () => {
      const catalog = createCatalog();
      const report = buildAnalysisReport(catalog, classifyCatalog(catalog), GENERATED_AT);

      const ids = (groups: Record<string, Array<{ uuid: string }>>) =>
        Object.fromEntries(Object.entries(groups).map(([key, controls]) => [key, controls.map((c) => c.uuid)]));

      expect(ids(report.controlsByType)).toEqual({ Dimmer: ['a', 'c'], 'Blind / shade': ['b'], Future: ['d'] });
      expect(ids(report.controlsByRoom)).toEqual({ Kitchen: ['a'], 'Living room': ['b', 'c'], 'No room': ['d'] });
    });

    it('should keep a room whose name is an object key of the prototype', () => {
      const catalog = parseInventory({
        rooms: { r9: { name: '__proto__' } },
        controls: { x: { name: 'Odd', type: 'Switch', room: 'r9' } }
      });
      const report = buildAnalysisReport(catalog, classifyCatalog(catalog), GENERATED_AT);
      const saved = JSON.parse(JSON.stringify(report));

      expect(Object.keys(report.controlsByRoom)).toEqual(['__proto__']);
      expect(Object.prototype.hasOwnProperty.call(saved.controlsByRoom, '__proto__')).toBe(true);
      expect(Object.getOwnPropertyDescriptor(saved.controlsByRoom, '__proto__')?.value).toHaveLength(1);
    });

    it('should survive a JSON round trip unchanged', () => {
      const catalog = createCatalog();
      const report = buildAnalysisReport(catalog, classifyCatalog(catalog), GENERATED_AT);

      expect(JSON.parse(JSON.stringify(report))).toEqual(report);
    });
  });

  describe('saveAnalysisReport', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'reports-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should write indented JSON, creating the directory', async () => {
      const catalog = createCatalog();
      const report = buildAnalysisReport(catalog, classifyCatalog(catalog), GENERATED_AT);
      const file = path.join(dir, 'out', 'analysis.json');

      await saveAnalysisReport(report, file);

      const text = fs.readFileSync(file, 'utf8');
      expect(text.startsWith('{\n  "generatedAt": "2026-10-19T09:30:00.000Z",\n')).toBe(true);
      expect(JSON.parse(text)).toEqual(report);
    });
  });

  describe('buildListing / formatListingLine', () => {
    it('should number controls from 1 in catalog order', () => {
      const listing = buildListing(createCatalog(), 'No room');

      expect(listing.map((row) => [row.index, row.entry.id, row.roomName, row.typeLabel])).toEqual([
        [1, 'a', 'Kitchen', 'Dimmer'],
        [2, 'b', 'Living room', 'Blind / shade'],
        [3, 'c', 'Living room', 'Dimmer'],
        [4, 'd', 'No room', 'Future']
      ]);
      expect(entriesOf(listing.slice(1, 3)).map((entry) => entry.id)).toEqual(['b', 'c']);
    });

    it('should format fixed-width columns', () => {
      const listing = buildListing(createCatalog(), 'No room');
      expect(formatListingLine(listing[2])).toBe('   3. [Living room]        Dimmer                    Spot');
    });
  });

  describe('formatAnalysisSummary', () => {
    it('should list sorted groups truncated to the limits', () => {
      const catalog = createCatalog();
      const report = buildAnalysisReport(catalog, classifyCatalog(catalog), GENERATED_AT);

      expect(formatAnalysisSummary(report, { perType: 1, perRoom: 1 })).toEqual([
        'Summary',
        '  Controller: Home (14.5)',
        '  Controls: 4',
        '  Rooms: 2',
        '  Categories: 1',
        '  Types: 3',
        '',
        'Rooms (2)',
        '  1. Kitchen',
        '  2. Living room',
        '',
        'Controls by type',
        '  Blind / shade (1)',
        '    - Blind [Living room]',
        '  Dimmer (2)',
        '    - Ceiling light [Kitchen]',
        '    ... and 1 more',
        '  Future (1)',
        '    - Pump',
        '',
        'Controls by room',
        '  Kitchen (1 controls)',
        '    - Ceiling light (Dimmer)',
        '  Living room (2 controls)',
        '    - Blind (Blind / shade)',
        '    ... and 1 more',
        '  No room (1 controls)',
        '    - Pump (Future)'
      ]);
    });
  });

  describe('formatSelectionSummary', () => {
    it('should preview the first ten selected controls', () => {
      const catalog = parseInventory({
        rooms: {},
        controls: Object.fromEntries(
          Array.from({ length: 12 }, (_, i) => ['id' + i, { name: 'Control ' + (i + 1), type: 'Switch' }])
        )
      });
      const lines = formatSelectionSummary(buildListing(catalog, 'No room'));

      expect(lines).toHaveLength(12);
      expect(lines[0]).toBe('Selected 12 controls');
      expect(lines[1]).toBe('  1. Control 1 [No room]');
      expect(lines[10]).toBe('  10. Control 10 [No room]');
      expect(lines[11]).toBe('  ... and 2 more');
    });
  });
});
