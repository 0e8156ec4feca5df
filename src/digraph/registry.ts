import _ from 'lodash';
import { formatDumpValue } from './dump';
import { type GraphLogger, noopLogger } from './logger';
import type { VertexEquals, VertexKey } from './types';

/**
 * Ordered, duplicate-free list of vertices. A vertex's position is its index, which never
 * changes since vertices are never removed.
 *
 * Lookup is a linear `equals` scan, so vertices need nothing beyond an equality function.
 * When a `key` function is supplied a `Map` from key to index short-cuts the scan; a hit is
 * still confirmed with `equals`, and a collision between unequal vertices falls back to the scan.
 *
 * Vertices are deep-cloned on the way in and on the way out, so callers cannot change a
 * registered vertex through a reference they hold.
 */
export class VertexRegistry<V> {
	readonly #vertices: V[] = [];
	readonly #index = new Map<string | number, number>();
	readonly #equals: VertexEquals<V>;
	readonly #key: VertexKey<V> | undefined;
	readonly #logger: GraphLogger;
	#collisionReported = false;

	constructor(equals: VertexEquals<V>, key?: VertexKey<V>, logger: GraphLogger = noopLogger) {
		this.#equals = equals;
		this.#key = key;
		this.#logger = logger;
	}

	get size(): number {
		return this.#vertices.length;
	}

	public indexOf(vertex: V): number {
		if (!this.#key) {
			return this.scan(vertex);
		}
		const index = this.#index.get(this.#key(vertex));
		if (index === undefined) {
			return -1;
		}
		if (this.#equals(this.#vertices[index], vertex)) {
			return index;
		}
		return this.scan(vertex);
	}

	public has(vertex: V): boolean {
		return this.indexOf(vertex) >= 0;
	}

	public add(vertex: V): boolean {
		if (this.has(vertex)) {
			return false;
		}
		const stored = _.cloneDeep(vertex);
		const index = this.#vertices.push(stored) - 1;
		if (this.#key) {
			const key = this.#key(stored);
			// on collision the first vertex keeps the slot, the others are found by scanning
			if (this.#index.has(key)) {
				this.reportCollision(stored);
			} else {
				this.#index.set(key, index);
			}
		}
		return true;
	}

	public at(index: number): V {
		return _.cloneDeep(this.#vertices[index]);
	}

	public toArray(): V[] {
		return _.cloneDeep(this.#vertices);
	}

	private scan(vertex: V): number {
		for (let i = 0; i < this.#vertices.length; i++) {
			if (this.#equals(this.#vertices[i], vertex)) {
				return i;
			}
		}
		return -1;
	}

	private reportCollision(vertex: V): void {
		if (this.#collisionReported) {
			return;
		}
		this.#collisionReported = true;
		this.#logger.warn('vertex key collision, falling back to linear scan', {
			vertex: formatDumpValue(vertex)
		});
	}
}
