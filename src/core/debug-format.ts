/**
 * Debug Formatting
 * =================
 *
 * Deterministic pretty-printer for decoded commitment structures.
 *
 * Values are first described as a small tree of DebugNodes, then printed
 * with 4-space indentation and a trailing comma after every field, item
 * and map entry:
 *
 *   Name {
 *       field: Variant(
 *           42,
 *       ),
 *   }
 */

// ============================================================================
// TYPES
// ============================================================================

export type DebugNode =
	| { type: "atom"; text: string }
	| { type: "struct"; name: string; fields: ReadonlyArray<readonly [string, DebugNode]> }
	| { type: "tuple"; name: string; items: readonly DebugNode[] }
	| { type: "list"; items: readonly DebugNode[] }
	| { type: "map"; entries: ReadonlyArray<readonly [DebugNode, DebugNode]> };

const INDENT = "    ";

// ============================================================================
// BUILDERS
// ============================================================================

export function atom(text: string | number | bigint): DebugNode {
	return { type: "atom", text: String(text) };
}

export function struct(name: string, fields: ReadonlyArray<readonly [string, DebugNode]>): DebugNode {
	return { type: "struct", name, fields };
}

/**
 * Tuple struct or tuple variant. With no items it prints as a bare name.
 */
export function tuple(name: string, ...items: DebugNode[]): DebugNode {
	return items.length === 0 ? atom(name) : { type: "tuple", name, items };
}

export function list(items: readonly DebugNode[]): DebugNode {
	return { type: "list", items };
}

export function map(entries: ReadonlyArray<readonly [DebugNode, DebugNode]>): DebugNode {
	return { type: "map", entries };
}

export function option<T>(value: T | null, describe: (value: T) => DebugNode): DebugNode {
	return value === null ? atom("None") : tuple("Some", describe(value));
}

export function str(value: string): DebugNode {
	return atom(`"${escapeText(value, '"')}"`);
}

export function char(value: string): DebugNode {
	return atom(`'${escapeText(value, "'")}'`);
}

// ============================================================================
// ESCAPING
// ============================================================================

/**
 * Controls, format characters, private-use and unassigned code points, line and
 * paragraph separators, and combining (grapheme-extending) marks print as
 * `\u{hex}`. Which code points are unassigned follows the runtime's Unicode
 * tables.
 */
const ESCAPED_CHAR = /[\p{Cc}\p{Cf}\p{Co}\p{Cn}\p{Zl}\p{Zp}\p{Grapheme_Extend}]/u;

function escapeText(value: string, quote: '"' | "'"): string {
	let out = "";
	for (const ch of value) {
		switch (ch) {
			case "\\":
				out += "\\\\";
				break;
			case "\n":
				out += "\\n";
				break;
			case "\r":
				out += "\\r";
				break;
			case "\t":
				out += "\\t";
				break;
			case "\0":
				out += "\\0";
				break;
			case quote:
				out += `\\${quote}`;
				break;
			default: {
				if (ESCAPED_CHAR.test(ch)) {
					out += `\\u{${(ch.codePointAt(0) ?? 0).toString(16)}}`;
				} else {
					out += ch;
				}
			}
		}
	}
	return out;
}

// ============================================================================
// PRINTING
// ============================================================================

/**
 * Print a node tree. The result has no trailing newline.
 */
export function formatDebug(node: DebugNode): string {
	return formatNode(node, 0);
}

function formatNode(node: DebugNode, depth: number): string {
	const inner = INDENT.repeat(depth + 1);
	const outer = INDENT.repeat(depth);

	switch (node.type) {
		case "atom":
			return node.text;
		case "struct": {
			const body = node.fields.map(([name, value]) => `${inner}${name}: ${formatNode(value, depth + 1)},\n`);
			return `${node.name} {\n${body.join("")}${outer}}`;
		}
		case "tuple": {
			const body = node.items.map((item) => `${inner}${formatNode(item, depth + 1)},\n`);
			return `${node.name}(\n${body.join("")}${outer})`;
		}
		case "list": {
			if (node.items.length === 0) return "[]";
			const body = node.items.map((item) => `${inner}${formatNode(item, depth + 1)},\n`);
			return `[\n${body.join("")}${outer}]`;
		}
		case "map": {
			if (node.entries.length === 0) return "{}";
			const body = node.entries.map(
				([key, value]) => `${inner}${formatNode(key, depth + 1)}: ${formatNode(value, depth + 1)},\n`,
			);
			return `{\n${body.join("")}${outer}}`;
		}
	}
}
