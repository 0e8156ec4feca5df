import stringify from 'safe-stable-stringify';

type Numeric = number | bigint;

enum Kind {
	Undefined,
	Null,
	Boolean,
	Numeric,
	String,
	Date,
	Other
}

function kindOf(value: unknown): Kind {
	if (value === undefined) {
		return Kind.Undefined;
	}
	if (value === null) {
		return Kind.Null;
	}
	switch (typeof value) {
		case 'boolean':
			return Kind.Boolean;
		case 'number':
		case 'bigint':
			return Kind.Numeric;
		case 'string':
			return Kind.String;
	}
	return value instanceof Date ? Kind.Date : Kind.Other;
}

function isNumeric(value: unknown): value is Numeric {
	return typeof value === 'number' || typeof value === 'bigint';
}

function compareNumeric(a: Numeric, b: Numeric): number {
	const aNaN = typeof a === 'number' && Number.isNaN(a);
	const bNaN = typeof b === 'number' && Number.isNaN(b);
	if (aNaN || bNaN) {
		// NaN sorts after every number
		return Number(aNaN) - Number(bNaN);
	}
	return a < b ? -1 : a > b ? 1 : 0;
}

function compareText(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

function textOf(value: unknown): string {
	return stringify(value) ?? String(value);
}

/**
 * Total order over arbitrary values, used to sort neighbor sets.
 *
 * Numbers and bigints compare numerically with each other (NaN last), strings by code unit,
 * booleans `false` before `true` and dates by timestamp. Values of different kinds are ordered
 * `undefined`, `null`, boolean, numeric, string, date, anything else; the rest compare by
 * their stable JSON text.
 */
export function naturalOrder(a: unknown, b: unknown): number {
	const kindA = kindOf(a);
	const kindB = kindOf(b);
	if (kindA !== kindB) {
		return kindA - kindB;
	}
	if (isNumeric(a) && isNumeric(b)) {
		return compareNumeric(a, b);
	}
	if (typeof a === 'string' && typeof b === 'string') {
		return compareText(a, b);
	}
	if (typeof a === 'boolean' && typeof b === 'boolean') {
		return Number(a) - Number(b);
	}
	if (a instanceof Date && b instanceof Date) {
		return compareNumeric(a.getTime(), b.getTime());
	}
	if (kindA === Kind.Other) {
		return compareText(textOf(a), textOf(b));
	}
	return 0;
}
