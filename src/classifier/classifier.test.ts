import { parseInventory } from '@inventory';

import { classifyCatalog } from './classifier';
import { categoryNameOf, describeType, roomNameOf } from './helpers';

const createCatalog = () => parseInventory({
  rooms: {
    r1: { name: 'Kitchen' },
    r2: { name: 'Office' },
    r3: { name: 'Kitchen' },
    r4: { name: 'Attic' }
  },
  cats: { c1: { name: 'Lighting' } },
  controls: {
    a: { name: 'Light A', type: 'Dimmer', room: 'r1', cat: 'c1' },
    b: { name: 'Blind B', type: 'Jalousie', room: 'r2' },
    c: { name: 'Light C', type: 'Dimmer', room: 'r2' },
    d: { name: 'Meter D', type: 'Meter' },
    e: { name: 'Light E', type: 'Dimmer', room: 'r3' },
    f: { name: 'Mystery', type: 'Quantum', room: 'missing' }
  }
});

describe('classifier', () => {
  describe('classifyCatalog', () => {
    it('should group by type in first-seen order', () => {
      const result = classifyCatalog(createCatalog());
      expect([...result.byType.keys()]).toEqual(['Dimmer', 'Jalousie', 'Meter', 'Quantum']);
      expect(result.byType.get('Dimmer')?.map((c) => c.id)).toEqual(['a', 'c', 'e']);
    });

    it('should group by room name with an unassigned bucket', () => {
      const result = classifyCatalog(createCatalog());
      expect([...result.byRoom.keys()]).toEqual(['Kitchen', 'Office', 'No room']);
      expect(result.byRoom.get('No room')?.map((c) => c.id)).toEqual(['d', 'f']);
    });

    it('should merge rooms that share a display name', () => {
      const result = classifyCatalog(createCatalog());
      expect(result.byRoom.get('Kitchen')?.map((c) => c.id)).toEqual(['a', 'e']);
    });

    it('should use the configured unassigned label', () => {
      const result = classifyCatalog(createCatalog(), { unassignedRoomLabel: 'Sin habitación' });
      expect(result.byRoom.get('Sin habitación')?.length).toBe(2);
    });

    it('should report totals', () => {
      const result = classifyCatalog(createCatalog());
      expect(result.totals).toEqual({ controls: 6, rooms: 4, types: 4, categories: 1 });
    });

    it('should sum both groupings to the control count', () => {
      const result = classifyCatalog(createCatalog());
      const typeSum = [...result.byType.values()].reduce((sum, group) => sum + group.length, 0);
      const roomSum = [...result.byRoom.values()].reduce((sum, group) => sum + group.length, 0);
      expect(typeSum).toBe(result.totals.controls);
      expect(roomSum).toBe(result.totals.controls);
    });

    it('should handle an empty catalog', () => {
      const result = classifyCatalog(parseInventory({ controls: {}, rooms: {} }));
      expect(result.totals).toEqual({ controls: 0, rooms: 0, types: 0, categories: 0 });
      expect(result.byRoom.size).toBe(0);
    });

    it('should return the same grouping for the same catalog', () => {
      const catalog = createCatalog();
      const first = classifyCatalog(catalog);
      const second = classifyCatalog(catalog);
      expect([...second.byRoom.entries()]).toEqual([...first.byRoom.entries()]);
    });
  });

  describe('describeType', () => {
    it('should label known types', () => {
      expect(describeType('Jalousie')).toBe('Blind / shade');
      expect(describeType('IRoomControllerV2')).toBe('Room climate controller V2');
    });

    it('should pass unknown tags through', () => {
      expect(describeType('Quantum')).toBe('Quantum');
      expect(describeType('toString')).toBe('toString');
    });
  });

  describe('roomNameOf / categoryNameOf', () => {
    it('should resolve names and fall back for unassigned', () => {
      const catalog = createCatalog();
      const a = catalog.controlsById.get('a');
      const d = catalog.controlsById.get('d');
      if (!a || !d) throw new Error('fixture missing');

      expect(roomNameOf(catalog, a, 'none')).toBe('Kitchen');
      expect(roomNameOf(catalog, d, 'none')).toBe('none');
      expect(categoryNameOf(catalog, a)).toBe('Lighting');
      expect(categoryNameOf(catalog, d)).toBeNull();
    });
  });
});
