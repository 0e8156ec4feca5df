import _ from 'lodash';
import { describe, expect, it, vi } from 'vitest';
import { type GraphLogger, VertexRegistry, WeightedGraph } from '../../src/index';

type Item = { id: number; name: string };

describe('VertexRegistry', () => {
	describe('Linear scan', () => {
		it('should find vertices by index', () => {
			const registry = new VertexRegistry<string>((a, b) => a === b);
			registry.add('A');
			registry.add('B');
			expect(registry.indexOf('B')).toBe(1);
			expect(registry.indexOf('Z')).toBe(-1);
			expect(registry.at(0)).toBe('A');
			expect(registry.size).toBe(2);
		});
		it('should compare every vertex on a miss', () => {
			const equals = vi.fn((a: string, b: string) => a === b);
			const registry = new VertexRegistry<string>(equals);
			registry.add('A');
			registry.add('B');
			registry.add('C');
			equals.mockClear();
			expect(registry.has('Z')).toBe(false);
			expect(equals).toHaveBeenCalledTimes(3);
		});
	});

	describe('Hashed index', () => {
		it('should skip the scan when a key is given', () => {
			const equals = vi.fn((a: string, b: string) => a === b);
			const registry = new VertexRegistry<string>(equals, (v) => v);
			registry.add('A');
			registry.add('B');
			registry.add('C');
			equals.mockClear();
			expect(registry.has('Z')).toBe(false);
			expect(equals).not.toHaveBeenCalled();
			expect(registry.indexOf('C')).toBe(2);
			expect(equals).toHaveBeenCalledTimes(1);
		});
		it('should fall back to the scan on a key collision', () => {
			const logger: GraphLogger = { debug: vi.fn(), warn: vi.fn() };
			const registry = new VertexRegistry<Item>(_.isEqual, (v) => v.id, logger);
			expect(registry.add({ id: 1, name: 'a' })).toBe(true);
			expect(registry.add({ id: 1, name: 'b' })).toBe(true);
			expect(registry.add({ id: 1, name: 'b' })).toBe(false);
			expect(registry.indexOf({ id: 1, name: 'b' })).toBe(1);
			expect(registry.indexOf({ id: 1, name: 'c' })).toBe(-1);
			expect(registry.size).toBe(2);
			expect(logger.warn).toHaveBeenCalledTimes(1);
			expect(logger.warn).toHaveBeenCalledWith('vertex key collision, falling back to linear scan', {
				vertex: '{"id":1,"name":"b"}'
			});
		});
		it('should not warn when a lookup misses on a taken key', () => {
			const logger: GraphLogger = { debug: vi.fn(), warn: vi.fn() };
			const registry = new VertexRegistry<Item>(_.isEqual, (v) => v.id, logger);
			registry.add({ id: 1, name: 'a' });
			expect(registry.has({ id: 1, name: 'z' })).toBe(false);
			expect(registry.indexOf({ id: 1, name: 'z' })).toBe(-1);
			expect(logger.warn).not.toHaveBeenCalled();
		});
		it('should store copies of added vertices', () => {
			const registry = new VertexRegistry<Item>(_.isEqual);
			const item = { id: 1, name: 'a' };
			registry.add(item);
			item.name = 'b';
			registry.toArray()[0].name = 'c';
			registry.at(0).name = 'd';
			expect(registry.toArray()).toEqual([{ id: 1, name: 'a' }]);
			expect(registry.has({ id: 1, name: 'b' })).toBe(false);
		});
		it('should give the same graph results as the linear scan', () => {
			const plain = new WeightedGraph<Item, number>();
			const hashed = new WeightedGraph<Item, number>({ key: (v) => v.id });
			const items: Item[] = [
				{ id: 3, name: 'c' },
				{ id: 1, name: 'a' },
				{ id: 1, name: 'x' },
				{ id: 2, name: 'b' },
				{ id: 3, name: 'c' }
			];
			for (const graph of [plain, hashed]) {
				for (const item of items) {
					graph.addVertex(item);
				}
				graph.addEdge(items[0], items[1], 1);
				graph.addEdge(items[0], items[2], 2);
				graph.addEdge(items[0], items[1], 3);
				graph.addEdge(items[3], { id: 9, name: 'z' }, 4);
			}
			expect(hashed.getVertices()).toEqual(plain.getVertices());
			expect(hashed.numVertices()).toBe(4);
			expect(hashed.numEdges()).toBe(plain.numEdges());
			expect(hashed.getWeight(items[0], items[1])).toEqual(plain.getWeight(items[0], items[1]));
			expect([...hashed.neighbors(items[0])]).toEqual([...plain.neighbors(items[0])]);
			expect(hashed.dumpToString()).toBe(plain.dumpToString());
		});
	});
});
