import { formatDumpLine, formatDumpValue, writeToSink } from './dump';
import { type GraphOptions, parseGraphOptions, type ResolvedGraphOptions } from './options';
import { VertexRegistry } from './registry';
import type { DumpSink, EdgeRecord, IWeightedGraph, WeightLookup } from './types';

type _EdgeRecord<W> = { toIndex: number; weight: W };

/**
 * Directed weighted graph over arbitrary vertex and weight values.
 *
 * Vertices and edges can only be added. Expected failures (duplicate vertex, unknown endpoint,
 * missing edge) are reported through return values; no operation throws for a well-typed input.
 */
export class WeightedGraph<V, W> implements IWeightedGraph<V, W> {
	readonly #options: ResolvedGraphOptions<V>;
	readonly #registry: VertexRegistry<V>;
	// source vertex index -> outgoing edges, only for sources with at least one edge
	readonly #adjacency = new Map<number, _EdgeRecord<W>[]>();

	constructor(options?: GraphOptions<V>) {
		this.#options = parseGraphOptions(options);
		this.#registry = new VertexRegistry(
			this.#options.equals,
			this.#options.key,
			this.#options.logger
		);
	}

	public addVertex(vertex: V): boolean {
		const added = this.#registry.add(vertex);
		if (!added) {
			this.#options.logger.debug('duplicate vertex rejected', {
				vertex: formatDumpValue(vertex)
			});
		}
		return added;
	}

	public hasVertex(vertex: V): boolean {
		return this.#registry.has(vertex);
	}

	public numVertices(): number {
		return this.#registry.size;
	}

	public getVertices(): V[] {
		return this.#registry.toArray();
	}

	public addEdge(from: V, to: V, weight: W): boolean {
		const fromIndex = this.#registry.indexOf(from);
		const toIndex = this.#registry.indexOf(to);
		if (fromIndex < 0 || toIndex < 0) {
			this.#options.logger.debug('edge rejected: unknown vertex', {
				from: formatDumpValue(from),
				to: formatDumpValue(to)
			});
			return false;
		}
		let edges = this.#adjacency.get(fromIndex);
		if (!edges) {
			edges = [];
			this.#adjacency.set(fromIndex, edges);
		}
		const existing = edges.find((edge) => edge.toIndex === toIndex);
		if (existing) {
			existing.weight = weight;
		} else {
			edges.push({ toIndex, weight });
		}
		return true;
	}

	public hasEdge(from: V, to: V): boolean {
		return this.getWeight(from, to).found;
	}

	public numEdges(): number {
		let count = 0;
		for (const edges of this.#adjacency.values()) {
			count += edges.length;
		}
		return count;
	}

	public getWeight(from: V, to: V): WeightLookup<W> {
		const fromIndex = this.#registry.indexOf(from);
		const toIndex = this.#registry.indexOf(to);
		if (fromIndex < 0 || toIndex < 0) {
			return { found: false };
		}
		const edge = this.#adjacency.get(fromIndex)?.find((record) => record.toIndex === toIndex);
		return edge ? { found: true, weight: edge.weight } : { found: false };
	}

	public getEdges(vertex: V): EdgeRecord<V, W>[] {
		const index = this.#registry.indexOf(vertex);
		if (index < 0) {
			return [];
		}
		return this.resolveEdges(this.#adjacency.get(index) ?? []);
	}

	public neighbors(vertex: V): Set<V> {
		const index = this.#registry.indexOf(vertex);
		if (index < 0) {
			return new Set<V>();
		}
		const distinct = new Set((this.#adjacency.get(index) ?? []).map((edge) => edge.toIndex));
		const neighbors = [...distinct].map((toIndex) => this.#registry.at(toIndex));
		return new Set(neighbors.sort(this.#options.compare));
	}

	public dump(sink: DumpSink): void {
		for (const [sourceIndex, edges] of this.#adjacency.entries()) {
			if (edges.length === 0) {
				continue;
			}
			const line = formatDumpLine(this.#registry.at(sourceIndex), this.resolveEdges(edges));
			writeToSink(sink, `${line}\n`);
		}
	}

	public dumpToString(): string {
		const chunks: string[] = [];
		this.dump((chunk) => chunks.push(chunk));
		return chunks.join('');
	}

	private resolveEdges(edges: _EdgeRecord<W>[]): EdgeRecord<V, W>[] {
		return edges.map((edge) => ({ to: this.#registry.at(edge.toIndex), weight: edge.weight }));
	}
}
