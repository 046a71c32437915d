// Loads transform-utilities.config.json from the working directory
// PURITY: SHELL (file read + console diagnostics)
// INVARIANT: Never throws; any problem falls back to the defaults
// COMPLEXITY: O(n) where n = config size

import * as fs from "node:fs";
import * as path from "node:path";

export const CONFIG_FILE_NAME = "transform-utilities.config.json";

/**
 * Settings read from the config file.
 *
 * @property appRoot Default application root for the CLI
 * @property contextAttributes Attributes placed in the transformation context
 */
export interface UtilitiesConfig {
	readonly appRoot?: string;
	readonly contextAttributes: Readonly<Record<string, string>>;
}

/**
 * Type representing any valid JSON value.
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isString(value: JSONValue): value is string {
	return typeof value === "string";
}

const DEFAULT_CONFIG: UtilitiesConfig = { contextAttributes: {} };

/**
 * Keeps only string-valued attributes; the rest are reported and dropped.
 */
function validateAttributes(value: JSONValue): Record<string, string> {
	if (!isJSONObject(value)) {
		console.warn("⚠️  contextAttributes must be an object, ignoring it");
		return {};
	}
	const attributes: Record<string, string> = {};
	for (const [key, attribute] of Object.entries(value)) {
		if (isString(attribute)) {
			attributes[key] = attribute;
		} else {
			console.warn(`⚠️  contextAttributes.${key} must be a string, ignoring it`);
		}
	}
	return attributes;
}

/**
 * Validates a parsed config document.
 *
 * @pure false (console warnings for dropped keys)
 */
export function validateConfig(value: JSONValue): UtilitiesConfig {
	if (!isJSONObject(value)) {
		console.warn(`⚠️  ${CONFIG_FILE_NAME} must contain an object, using defaults`);
		return DEFAULT_CONFIG;
	}

	const appRoot = value["appRoot"];
	const contextAttributes = value["contextAttributes"];
	if (appRoot !== undefined && !isString(appRoot)) {
		console.warn("⚠️  appRoot must be a string, ignoring it");
	}
	return {
		...(appRoot !== undefined && isString(appRoot) ? { appRoot } : {}),
		contextAttributes:
			contextAttributes === undefined ? {} : validateAttributes(contextAttributes),
	};
}

/**
 * Loads the configuration from `cwd`.
 *
 * @returns Defaults when the file is missing or unreadable
 *
 * @example
 * ```ts
 * const config = loadUtilitiesConfig(process.cwd());
 * config.contextAttributes; // {} without a config file
 * ```
 */
export function loadUtilitiesConfig(cwd: string): UtilitiesConfig {
	const configPath = path.join(cwd, CONFIG_FILE_NAME);
	if (!fs.existsSync(configPath)) {
		return DEFAULT_CONFIG;
	}
	try {
		const parsed: JSONValue = JSON.parse(fs.readFileSync(configPath, "utf8"));
		return validateConfig(parsed);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		console.error(`❌ Unable to read ${configPath}: ${reason}`);
		return DEFAULT_CONFIG;
	}
}
