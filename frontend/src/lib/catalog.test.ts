import { describe, expect, it } from 'vitest';
import { CATALOG, CatalogValidationError, createCatalog } from './catalog';

describe('CATALOG', () => {
  it('holds every layer of the turbine graph', () => {
    expect(CATALOG.nodes).toHaveLength(33);
    expect(CATALOG.edges).toHaveLength(49);
    expect(CATALOG.byCategory('raw')).toHaveLength(5);
    expect(CATALOG.byCategory('physics')).toHaveLength(9);
    expect(CATALOG.byCategory('statistical')).toHaveLength(12);
    expect(CATALOG.byCategory('anomaly')).toHaveLength(3);
    expect(CATALOG.byCategory('outcome')).toHaveLength(4);
  });

  it('indexes nodes by id', () => {
    expect(CATALOG.byId.get('main_bearing_temperature')).toEqual({
      id: 'main_bearing_temperature',
      label: 'Main Bearing Temp',
      category: 'raw',
    });
    expect(CATALOG.has('failure_risk')).toBe(true);
    expect(CATALOG.has('nope')).toBe(false);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(CATALOG.nodes)).toBe(true);
    expect(Object.isFrozen(CATALOG.nodes[0])).toBe(true);
    expect(Object.isFrozen(CATALOG.edges[0])).toBe(true);
  });
});

describe('createCatalog', () => {
  const nodes = [
    { id: 'a', label: 'A', category: 'raw' },
    { id: 'b', label: 'B', category: 'outcome' },
  ];

  it('accepts a consistent definition', () => {
    const catalog = createCatalog({ nodes, edges: [{ source: 'a', target: 'b', weight: 0.5 }] });
    expect(catalog.byCategory('outcome').map((n) => n.id)).toEqual(['b']);
    expect(catalog.byCategory('physics')).toEqual([]);
  });

  it('rejects duplicate ids', () => {
    expect(() =>
      createCatalog({ nodes: [...nodes, { id: 'a', label: 'Again', category: 'physics' }], edges: [] })
    ).toThrow('Duplicate node id "a"');
  });

  it('rejects empty ids', () => {
    expect(() =>
      createCatalog({ nodes: [{ id: '', label: 'Blank', category: 'raw' }], edges: [] })
    ).toThrow(CatalogValidationError);
  });

  it('rejects unknown categories', () => {
    expect(() =>
      createCatalog({ nodes: [{ id: 'x', label: 'X', category: 'weather' }], edges: [] })
    ).toThrow('Node "x" has unknown category "weather"');
  });

  it('rejects edges to unknown nodes', () => {
    expect(() =>
      createCatalog({ nodes, edges: [{ source: 'a', target: 'missing', weight: 0.5 }] })
    ).toThrow('Edge a -> missing references unknown target "missing"');
    expect(() =>
      createCatalog({ nodes, edges: [{ source: 'ghost', target: 'b', weight: 0.5 }] })
    ).toThrow('Edge ghost -> b references unknown source "ghost"');
  });

  it('rejects weights outside [0, 1]', () => {
    expect(() =>
      createCatalog({ nodes, edges: [{ source: 'a', target: 'b', weight: 1.2 }] })
    ).toThrow('Edge a -> b has weight 1.2 outside [0, 1]');
    expect(() =>
      createCatalog({ nodes, edges: [{ source: 'a', target: 'b', weight: Number.NaN }] })
    ).toThrow(CatalogValidationError);
  });
});
