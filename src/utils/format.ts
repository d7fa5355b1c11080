/**
 * Formatting helpers for user-facing messages.
 */

/** `plural(1, "row")` → "1 row", `plural(3, "row")` → "3 rows". */
export function plural(n: number, noun: string): string {
	return `${n} ${noun}${n === 1 ? "" : "s"}`;
}

/**
 * Short printable form of an arbitrary value, used when reporting a selector
 * that could not be resolved.
 */
export function repr(value: unknown): string {
	switch (typeof value) {
		case "string":
			return JSON.stringify(value);
		case "number":
		case "boolean":
		case "bigint":
		case "undefined":
			return String(value);
		case "symbol":
			return value.toString();
		case "function":
			return value.name ? `<function ${value.name}>` : "<function>";
	}
	if (value === null) return "null";
	if (Array.isArray(value)) {
		const items = value.slice(0, 5).map(repr);
		return `[${items.join(", ")}${value.length > 5 ? ", ..." : ""}]`;
	}
	if (value instanceof Date) return value.toISOString();
	const proto: unknown = Object.getPrototypeOf(value);
	if (proto !== Object.prototype && proto !== null && hasOwnToString(value)) {
		return String(value);
	}
	const name = value.constructor?.name;
	return name && name !== "Object" ? `<${name}>` : "<object>";
}

function hasOwnToString(value: object): boolean {
	return value.toString !== Object.prototype.toString;
}
