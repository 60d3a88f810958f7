import { beforeEach, describe, expect, test } from 'vitest';
import { getNamingManager, NamingManager, resetNamingManager } from '../manager.js';

describe('NamingManager', () => {
  let manager: NamingManager;

  beforeEach(() => {
    resetNamingManager();
    manager = new NamingManager();
  });

  describe('getElementName', () => {
    test('converts structure and field names', () => {
      expect(manager.getElementName('MyPlaylist')).toBe('myPlaylist');
      expect(manager.getElementName('field_name')).toBe('fieldName');
    });

    test('prefixes tuple indices', () => {
      expect(manager.getElementName('1')).toBe('_1');
    });
  });

  describe('resolveElementName', () => {
    test('reports reused input', () => {
      expect(manager.resolveElementName('fieldName')).toEqual({
        kind: 'borrowed',
        value: 'fieldName',
      });
      expect(manager.resolveElementName('field_name')).toEqual({
        kind: 'owned',
        value: 'fieldName',
      });
    });

    test('caches results', () => {
      const first = manager.resolveElementName('field_name');
      const second = manager.resolveElementName('field_name');

      expect(second).toBe(first);
      expect(manager.cacheSize).toBe(1);
    });
  });

  describe('getFieldKey', () => {
    test('converts fields without rename', () => {
      expect(manager.getFieldKey({ name: 'field_name' })).toEqual({
        name: 'field_name',
        key: 'fieldName',
        source: 'convention',
      });
    });

    test('uses rename verbatim', () => {
      expect(manager.getFieldKey({ name: 'field_name', rename: 'custom' })).toEqual({
        name: 'field_name',
        rename: 'custom',
        key: 'custom',
        source: 'rename',
      });
    });

    test('does not convert renamed fields', () => {
      manager.getFieldKey({ name: 'field_name', rename: 'Field-Name' });
      expect(manager.cacheSize).toBe(0);
    });

    test('returns immutable objects', () => {
      const key = manager.getFieldKey({ name: 'field_name' });
      expect(Object.isFrozen(key)).toBe(true);
    });
  });

  describe('getStructureNames', () => {
    test('resolves structure and field names', () => {
      const names = manager.getStructureNames({
        name: 'MyPlaylist',
        fields: [{ name: 'track_list', rename: 'tracks' }, { name: 'created_at' }, { name: '0' }],
      });

      expect(names.name).toBe('MyPlaylist');
      expect(names.element).toBe('myPlaylist');
      expect(names.fields.map((field) => field.key)).toEqual(['tracks', 'createdAt', '_0']);
      expect(names.fields.map((field) => field.source)).toEqual([
        'rename',
        'convention',
        'convention',
      ]);
      expect(manager.cacheSize).toBe(3);
    });

    test('handles structures without fields', () => {
      const names = manager.getStructureNames({ name: 'Unit', fields: [] });
      expect(names.element).toBe('unit');
      expect(names.fields).toEqual([]);
    });

    test('throws on conflicting keys', () => {
      expect(() =>
        manager.getStructureNames({
          name: 'Row',
          fields: [{ name: 'field_name' }, { name: 'fieldName' }],
        }),
      ).toThrow(
        "Conflicting field keys in 'Row': Duplicate key 'fieldName' for fields: field_name, fieldName",
      );
    });
  });

  describe('caching', () => {
    test('clearCache empties the cache', () => {
      manager.getElementName('MyPlaylist');
      manager.getElementName('Banana');
      expect(manager.cacheSize).toBe(2);

      manager.clearCache();
      expect(manager.cacheSize).toBe(0);
    });
  });

  describe('global instance', () => {
    test('returns the same instance', () => {
      expect(getNamingManager()).toBe(getNamingManager());
    });

    test('resetNamingManager creates a new instance', () => {
      const first = getNamingManager();
      resetNamingManager();
      expect(getNamingManager()).not.toBe(first);
    });
  });
});
