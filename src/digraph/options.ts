import _ from 'lodash';
import { z } from 'zod';
import { type GraphLogger, noopLogger } from './logger';
import { naturalOrder } from './order';
import type { VertexCompare, VertexEquals, VertexKey } from './types';

export type GraphOptions<V> = {
	/** Vertex identity. Defaults to structural equality (`_.isEqual`). */
	equals?: VertexEquals<V>;
	/** Order of `neighbors` results. Defaults to {@link naturalOrder}. */
	compare?: VertexCompare<V>;
	/**
	 * Enables a hashed vertex index. Must return the same key for vertices that `equals`
	 * considers equal; results are the same with or without it.
	 */
	key?: VertexKey<V>;
	logger?: GraphLogger;
};

export type ResolvedGraphOptions<V> = Readonly<{
	equals: VertexEquals<V>;
	compare: VertexCompare<V>;
	key: VertexKey<V> | undefined;
	logger: GraphLogger;
}>;

const functionSchema = z.custom<(...args: never[]) => unknown>(
	(value) => typeof value === 'function',
	{ message: 'Expected a function' }
);

export const graphOptionsSchema = z.object({
	equals: functionSchema.optional(),
	compare: functionSchema.optional(),
	key: functionSchema.optional(),
	logger: z
		.object({
			debug: functionSchema,
			warn: functionSchema
		})
		.optional()
});

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
		.join('; ');
}

export function parseGraphOptions<V>(options: GraphOptions<V> = {}): ResolvedGraphOptions<V> {
	const result = graphOptionsSchema.safeParse(options);
	if (!result.success) {
		throw new Error(`Invalid graph options: ${formatIssues(result.error)}`);
	}
	return Object.freeze({
		equals: options.equals ?? _.isEqual,
		compare: options.compare ?? naturalOrder,
		key: options.key,
		logger: options.logger ?? noopLogger
	});
}
