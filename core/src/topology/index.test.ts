import { describe, expect, it } from 'vitest';
import { computeTopologyLayers } from './index.js';
import { ConfigurationErrorCode } from '../errors/index.js';

describe('topology', () => {
  describe('computeTopologyLayers', () => {
    it('returns empty result for empty graph', () => {
      const result = computeTopologyLayers([], []);
      expect(result.layerCount).toBe(0);
      expect(result.layerAssignments.size).toBe(0);
    });

    it('assigns parallel nodes to same layer', () => {
      const nodes = [{ id: 'A' }, { id: 'B' }, { id: 'C' }];
      const result = computeTopologyLayers(nodes, []);
      expect(result.layerCount).toBe(1);
      expect([...result.layerAssignments.values()]).toEqual([0, 0, 0]);
    });

    it('places a node after its deepest dependency', () => {
      // A -> B -> C -> D
      // A ---------> D
      const nodes = [{ id: 'A' }, { id: 'B' }, { id: 'C' }, { id: 'D' }];
      const edges = [
        { from: 'A', to: 'B' },
        { from: 'B', to: 'C' },
        { from: 'C', to: 'D' },
        { from: 'A', to: 'D' },
      ];
      const result = computeTopologyLayers(nodes, edges);
      expect(result.layerCount).toBe(4);
      expect(result.layerAssignments.get('D')).toBe(3);
    });

    it('handles diamond dependency correctly', () => {
      const nodes = [{ id: 'A' }, { id: 'B' }, { id: 'C' }, { id: 'D' }];
      const edges = [
        { from: 'A', to: 'B' },
        { from: 'A', to: 'C' },
        { from: 'B', to: 'D' },
        { from: 'C', to: 'D' },
      ];
      const result = computeTopologyLayers(nodes, edges);
      expect(result.layerCount).toBe(3);
      expect(result.layerAssignments.get('B')).toBe(1);
      expect(result.layerAssignments.get('C')).toBe(1);
      expect(result.layerAssignments.get('D')).toBe(2);
    });

    it('ignores edges to unknown nodes and duplicate edges', () => {
      const nodes = [{ id: 'A' }, { id: 'B' }];
      const edges = [
        { from: 'A', to: 'B' },
        { from: 'A', to: 'B' },
        { from: 'A', to: 'Z' },
      ];
      const result = computeTopologyLayers(nodes, edges);
      expect(result.layerAssignments.get('B')).toBe(1);
    });

    it('throws on a two-node cycle', () => {
      const nodes = [{ id: 'A' }, { id: 'B' }, { id: 'C' }];
      const edges = [
        { from: 'A', to: 'B' },
        { from: 'B', to: 'A' },
      ];
      expect(() => computeTopologyLayers(nodes, edges)).toThrowError(
        expect.objectContaining({
          code: ConfigurationErrorCode.CYCLIC_DEPENDENCY,
          message: 'Step graph contains a cycle through: A, B.',
        }),
      );
    });

    it('throws on a self-loop', () => {
      expect(() => computeTopologyLayers([{ id: 'A' }], [{ from: 'A', to: 'A' }])).toThrowError(
        expect.objectContaining({ code: ConfigurationErrorCode.CYCLIC_DEPENDENCY }),
      );
    });
  });
});
