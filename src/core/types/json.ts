// CHANGE: Shared JSON value model and guards for untrusted file contents
// PURITY: CORE
// INVARIANT: Narrowing never casts; values are inspected structurally
// COMPLEXITY: O(1) per guard, O(n) for arrays

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

export type JSONObject = { readonly [key: string]: JSONValue };

export const isJSONObject = (
	value: JSONValue | undefined,
): value is JSONObject =>
	value !== undefined &&
	value !== null &&
	typeof value === "object" &&
	!Array.isArray(value);

export const isStringArray = (
	value: JSONValue | undefined,
): value is ReadonlyArray<string> =>
	Array.isArray(value) && value.every((item) => typeof item === "string");

/**
 * Parse JSON text without throwing.
 *
 * @returns undefined when the text is not valid JSON
 */
export function parseJSON(text: string): JSONValue | undefined {
	try {
		const parsed: JSONValue = JSON.parse(text);
		return parsed;
	} catch {
		return undefined;
	}
}
