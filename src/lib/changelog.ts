/**
 * Changelog rewriting
 *
 * The changelog is a flat text file of entries, newest first:
 *
 *   v0.01.001
 *   Date: 2024-02-02
 *   * NEW: feature X
 *   <blank>
 *   ...older entries verbatim
 */

import { randomBytes } from "node:crypto";
import * as fsp from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { ReleaseDescriptor } from "../types/release";
import { ChangelogNotFoundError, ChangelogWriteError } from "./errors";

const DATE_PREFIX = "Date:";

export interface ChangelogFs {
	readFile(path: string, encoding: "utf-8"): Promise<string>;
	writeFile(path: string, data: string, encoding: "utf-8"): Promise<void>;
	rename(from: string, to: string): Promise<void>;
	unlink(path: string): Promise<void>;
}

const nodeFs: ChangelogFs = {
	readFile: (path, encoding) => fsp.readFile(path, encoding),
	writeFile: (path, data, encoding) => fsp.writeFile(path, data, encoding),
	rename: (from, to) => fsp.rename(from, to),
	unlink: (path) => fsp.unlink(path),
};

export interface RewriteOptions {
	fs?: ChangelogFs;
	/** Compute the new content without touching the file */
	dryRun?: boolean;
	/** Called when a leftover temp file could not be removed */
	onCleanupError?: (tempPath: string, error: unknown) => void;
}

export interface LatestEntry {
	version: string;
	dateLine: string;
}

export function formatDateLine(date: string): string {
	return date.startsWith(DATE_PREFIX) ? date : `${DATE_PREFIX} ${date}`;
}

export function formatEntry(descriptor: ReleaseDescriptor): string {
	const { version, date, notes } = descriptor;
	return `${version}\n${formatDateLine(date)}\n${notes}\n\n`;
}

export function prependEntry(
	existing: string,
	descriptor: ReleaseDescriptor,
): string {
	return formatEntry(descriptor) + existing;
}

export function readLatestEntry(content: string): LatestEntry | null {
	if (!content.trim()) return null;

	const [version = "", dateLine = ""] = content.split("\n", 2);
	return { version, dateLine };
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function tempPathFor(path: string): string {
	const suffix = randomBytes(6).toString("hex");
	return join(dirname(path), `.${basename(path)}.${suffix}.tmp`);
}

/**
 * Read the changelog at `path`, prepend the entry and replace the file.
 *
 * The new content goes to a sibling temp file that is then renamed over
 * the original, so the old content stays on disk until the rename lands.
 */
export async function rewriteChangelog(
	path: string,
	descriptor: ReleaseDescriptor,
	options: RewriteOptions = {},
): Promise<string> {
	const fs = options.fs ?? nodeFs;

	let existing: string;
	try {
		existing = await fs.readFile(path, "utf-8");
	} catch (error) {
		throw new ChangelogNotFoundError(path, error);
	}

	const updated = prependEntry(existing, descriptor);
	if (options.dryRun) {
		return updated;
	}

	const tempPath = tempPathFor(path);
	try {
		await fs.writeFile(tempPath, updated, "utf-8");
		await fs.rename(tempPath, path);
	} catch (error) {
		try {
			await fs.unlink(tempPath);
		} catch (cleanupError) {
			if (!isNotFound(cleanupError)) {
				options.onCleanupError?.(tempPath, cleanupError);
			}
		}
		throw new ChangelogWriteError(path, error);
	}

	return updated;
}
