/**
 * Configuration file management for shiplog
 *
 * Reads the global ~/.shiplog/config.json and the project-level
 * .shiplog/config.json. Project config overrides global config, and CLI
 * flags override both.
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

const CONFIG_DIR = ".shiplog";
const JSON_CONFIG_FILE = "config.json";

export type DateFormat = "iso" | "long";

export interface ShiplogConfig {
	changelogFile: string;
	remote: string;
	/** Unset means "the branch currently checked out" */
	branch?: string;
	push: boolean;
	dateFormat: DateFormat;
}

export const DEFAULT_CONFIG: ShiplogConfig = {
	changelogFile: "CHANGELOG",
	remote: "origin",
	push: true,
	dateFormat: "iso",
};

export interface LoadConfigOptions {
	/** Repository root; project config is skipped when unset */
	repoRoot?: string;
	/** Defaults to the user's home directory */
	homeDir?: string;
	warn?: (message: string) => void;
}

function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDateFormat(value: unknown): value is DateFormat {
	return value === "iso" || value === "long";
}

/**
 * Pick the recognised fields out of parsed JSON.
 * Throws on a field of the wrong type; unknown keys are ignored.
 */
export function parseConfig(raw: unknown): Partial<ShiplogConfig> {
	if (!isObject(raw)) {
		throw new Error("config must be a JSON object");
	}

	const config: Partial<ShiplogConfig> = {};

	for (const key of ["changelogFile", "remote", "branch"] as const) {
		const value = raw[key];
		if (value === undefined) continue;
		if (typeof value !== "string" || !value.trim()) {
			throw new Error(`"${key}" must be a non-empty string`);
		}
		config[key] = value;
	}

	if (raw.push !== undefined) {
		if (typeof raw.push !== "boolean") {
			throw new Error(`"push" must be a boolean`);
		}
		config.push = raw.push;
	}

	if (raw.dateFormat !== undefined) {
		if (!isDateFormat(raw.dateFormat)) {
			throw new Error(`"dateFormat" must be "iso" or "long"`);
		}
		config.dateFormat = raw.dateFormat;
	}

	return config;
}

function readConfigFile(
	path: string,
	warn: (message: string) => void,
): Partial<ShiplogConfig> {
	if (!existsSync(path)) {
		return {};
	}

	try {
		return parseConfig(JSON.parse(readFileSync(path, "utf-8")));
	} catch (error) {
		warn(
			`[shiplog] Warning: Could not parse config at '${path}'. Ignoring it. Error: ${error instanceof Error ? error.message : String(error)}`,
		);
		return {};
	}
}

export function mergeConfig(
	base: ShiplogConfig,
	...overrides: Partial<ShiplogConfig>[]
): ShiplogConfig {
	const result = { ...base };
	for (const override of overrides) {
		if (override.changelogFile !== undefined) result.changelogFile = override.changelogFile;
		if (override.remote !== undefined) result.remote = override.remote;
		if (override.branch !== undefined) result.branch = override.branch;
		if (override.push !== undefined) result.push = override.push;
		if (override.dateFormat !== undefined) result.dateFormat = override.dateFormat;
	}
	return result;
}

/**
 * Get the config with layered loading:
 * 1. Start with defaults
 * 2. Merge global ~/.shiplog/config.json (if exists)
 * 3. Merge project .shiplog/config.json (if exists)
 */
export function getConfig(options: LoadConfigOptions = {}): ShiplogConfig {
	const warn = options.warn ?? console.warn;
	const home = options.homeDir ?? homedir();

	const globalConfig = readConfigFile(join(home, CONFIG_DIR, JSON_CONFIG_FILE), warn);
	const projectConfig = options.repoRoot
		? readConfigFile(join(options.repoRoot, CONFIG_DIR, JSON_CONFIG_FILE), warn)
		: {};

	return mergeConfig(DEFAULT_CONFIG, globalConfig, projectConfig);
}

const MONTHS = [
	"January",
	"February",
	"March",
	"April",
	"May",
	"June",
	"July",
	"August",
	"September",
	"October",
	"November",
	"December",
];

export function formatReleaseDate(date: Date, format: DateFormat): string {
	const day = date.getDate();
	const month = date.getMonth();
	const year = date.getFullYear();

	if (format === "long") {
		return `${day} ${MONTHS[month]} ${year}`;
	}

	const mm = String(month + 1).padStart(2, "0");
	const dd = String(day).padStart(2, "0");
	return `${year}-${mm}-${dd}`;
}
