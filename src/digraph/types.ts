export type VertexEquals<V> = (a: V, b: V) => boolean;
export type VertexCompare<V> = (a: V, b: V) => number;
export type VertexKey<V> = (vertex: V) => string | number;

export type EdgeRecord<V, W> = {
	readonly to: V;
	readonly weight: W;
};

export type WeightLookup<W> = { found: true; weight: W } | { found: false };

/**
 * Anything text can be written to: a plain callback, `process.stdout`,
 * or any other Node writable stream.
 */
export type DumpSink = ((chunk: string) => unknown) | { write(chunk: string): unknown };

export interface IWeightedGraph<V, W> {
	addVertex(vertex: V): boolean;
	hasVertex(vertex: V): boolean;
	numVertices(): number;
	getVertices(): V[];

	addEdge(from: V, to: V, weight: W): boolean;
	hasEdge(from: V, to: V): boolean;
	numEdges(): number;
	getWeight(from: V, to: V): WeightLookup<W>;
	getEdges(vertex: V): EdgeRecord<V, W>[];

	neighbors(vertex: V): Set<V>;

	dump(sink: DumpSink): void;
	dumpToString(): string;
}
