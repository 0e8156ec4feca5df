import stringify from 'safe-stable-stringify';
import type { DumpSink, EdgeRecord } from './types';

export function formatDumpValue(value: unknown): string {
	switch (typeof value) {
		case 'string':
			return value;
		case 'number':
		case 'bigint':
		case 'boolean':
		case 'undefined':
			return String(value);
	}
	if (value === null) {
		return 'null';
	}
	return stringify(value) ?? String(value);
}

/**
 * Renders `<source>: (<source>,<dest>,<weight>) (<source>,<dest>,<weight>)`.
 * Diagnostic output only; the format is not meant to be parsed.
 */
export function formatDumpLine<V, W>(source: V, edges: readonly EdgeRecord<V, W>[]): string {
	const from = formatDumpValue(source);
	const records = edges.map(
		(edge) => `(${from},${formatDumpValue(edge.to)},${formatDumpValue(edge.weight)})`
	);
	return `${from}: ${records.join(' ')}`;
}

export function writeToSink(sink: DumpSink, chunk: string): void {
	if (typeof sink === 'function') {
		sink(chunk);
	} else {
		sink.write(chunk);
	}
}
