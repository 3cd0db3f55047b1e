import { resolve } from "node:path";
import color from "picocolors";
import { formatEntry, rewriteChangelog } from "../lib/changelog";
import { getConfig } from "../lib/config";
import { type EntryOptions, buildDescriptor, resolveChangelogPath } from "../lib/release-input";
import { createGitClient } from "../utils/git";
import { createSpinner, say } from "../utils/ui";
import type { CommandDeps } from "./release";

export interface PrependOptions extends EntryOptions {
	dryRun?: boolean;
}

/**
 * Prepend an entry to the changelog without touching git history.
 * Outside a git repository only the global config applies and the
 * changelog path is taken relative to --repo.
 */
export async function prependCommand(
	version: string,
	options: PrependOptions,
	deps: CommandDeps = {},
): Promise<void> {
	say.intro(color.bgYellow(color.black(" prepend ")));

	const repoPath = resolve(options.repo ?? process.cwd());
	const client = (deps.createClient ?? createGitClient)(repoPath);
	const repoRoot = (await client.isGitRepo()) ? await client.getRepoRoot() : repoPath;

	const config = getConfig({ repoRoot, homeDir: deps.homeDir });
	const descriptor = buildDescriptor(
		version,
		options,
		config,
		(deps.now ?? (() => new Date()))(),
	);
	const changelogPath = resolveChangelogPath(options, config, repoRoot);

	const s = createSpinner();
	s.start(`Updating ${changelogPath}`);
	try {
		await rewriteChangelog(changelogPath, descriptor, {
			fs: deps.fs,
			dryRun: options.dryRun,
			onCleanupError: (tempPath) =>
				say.warn(`Could not remove temporary file ${tempPath}`),
		});
	} catch (error) {
		s.stop("Failed to update changelog", 2);
		throw error;
	}
	s.stop(options.dryRun ? `Would update ${changelogPath}` : `Updated ${changelogPath}`);

	say.info(color.dim(formatEntry(descriptor).trimEnd()));
	say.outro(color.green("Done!"));
}
