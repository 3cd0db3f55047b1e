import { readFileSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import type { ReleaseDescriptor } from "../types/release";
import { type ShiplogConfig, formatReleaseDate, mergeConfig } from "./config";
import { ConfigError } from "./errors";

/** Flags shared by `release` and `prepend` */
export interface EntryOptions {
	notes?: string;
	notesFile?: string;
	date?: string;
	changelog?: string;
	repo?: string;
}

export interface PublishFlags {
	remote?: string;
	branch?: string;
	/** Overrides a configured `push: true` */
	skipPush?: boolean;
}

export function resolveNotes(options: Pick<EntryOptions, "notes" | "notesFile">): string {
	const { notes, notesFile } = options;

	if (notes !== undefined && notesFile !== undefined) {
		throw new ConfigError("Pass either --notes or --notes-file, not both");
	}

	if (notesFile !== undefined) {
		try {
			// A trailing newline in the file would otherwise double the blank separator
			return readFileSync(notesFile, "utf-8").replace(/(\r?\n)+$/, "");
		} catch (error) {
			throw new ConfigError(
				`Could not read notes file ${notesFile}: ${error instanceof Error ? error.message : String(error)}`,
			);
		}
	}

	if (notes === undefined) {
		throw new ConfigError("Release notes are required (--notes or --notes-file)");
	}

	return notes;
}

export function buildDescriptor(
	version: string,
	options: EntryOptions,
	config: ShiplogConfig,
	now: Date,
): ReleaseDescriptor {
	if (!version.trim()) {
		throw new ConfigError("Version label must not be empty");
	}

	return {
		version,
		date: options.date ?? formatReleaseDate(now, config.dateFormat),
		notes: resolveNotes(options),
	};
}

/**
 * A --changelog path is taken relative to the working directory,
 * a configured changelogFile relative to the repository root.
 */
export function resolveChangelogPath(
	options: EntryOptions,
	config: ShiplogConfig,
	repoRoot: string,
): string {
	if (options.changelog !== undefined) {
		return resolve(options.changelog);
	}
	return isAbsolute(config.changelogFile)
		? config.changelogFile
		: resolve(repoRoot, config.changelogFile);
}

export function applyFlags(config: ShiplogConfig, flags: PublishFlags): ShiplogConfig {
	return mergeConfig(config, {
		remote: flags.remote,
		branch: flags.branch,
		push: flags.skipPush ? false : undefined,
	});
}
