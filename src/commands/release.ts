import { resolve } from "node:path";
import * as p from "@clack/prompts";
import color from "picocolors";
import {
	type ChangelogFs,
	formatEntry,
	readLatestEntry,
	rewriteChangelog,
} from "../lib/changelog";
import { getConfig } from "../lib/config";
import { PreconditionError } from "../lib/errors";
import {
	type PlannedStep,
	assertPublished,
	planRelease,
	publishRelease,
	stepsRemaining,
} from "../lib/publisher";
import {
	type EntryOptions,
	type PublishFlags,
	applyFlags,
	buildDescriptor,
	resolveChangelogPath,
} from "../lib/release-input";
import type { PublishTarget } from "../types/release";
import { confirmAction } from "../utils/confirm";
import { type GitClient, createGitClient } from "../utils/git";
import { createSpinner, say } from "../utils/ui";

export interface ReleaseOptions extends EntryOptions, PublishFlags {
	yes?: boolean;
	dryRun?: boolean;
}

/** Seams for tests; every field defaults to the real thing */
export interface CommandDeps {
	createClient?: (cwd: string) => GitClient;
	fs?: ChangelogFs;
	now?: () => Date;
	homeDir?: string;
}

function formatPlan(steps: PlannedStep[]): string {
	return steps.map((s) => `  ${color.cyan(s.command)}`).join("\n");
}

async function checkPreconditions(
	client: GitClient,
	target: PublishTarget,
	push: boolean,
	changelogPath: string,
): Promise<void> {
	if (push && !(await client.hasRemote(target.remote))) {
		throw new PreconditionError(`Remote "${target.remote}" is not configured`);
	}

	if (await client.tagExists(target.version)) {
		throw new PreconditionError(`Tag ${target.version} already exists`);
	}

	// `git add --update` only picks up tracked files
	if (!(await client.isTracked(changelogPath))) {
		throw new PreconditionError(
			`Changelog ${changelogPath} is not tracked in ${client.cwd}; add and commit it first`,
		);
	}
}

/**
 * Release command
 * Flow: changelog -> stage -> commit -> tag -> push branch -> push tag
 *
 * Every check runs before the changelog is touched. Once the rewrite has
 * happened, a failing git step stops the run and leaves the repository as
 * it is; the remaining commands are printed for finishing by hand.
 */
export async function releaseCommand(
	version: string,
	options: ReleaseOptions,
	deps: CommandDeps = {},
): Promise<void> {
	say.intro(color.bgMagenta(color.white(" release ")));

	const repoPath = resolve(options.repo ?? process.cwd());
	const client = (deps.createClient ?? createGitClient)(repoPath);

	if (!(await client.isGitRepo())) {
		throw new PreconditionError(`Not a git repository: ${repoPath}`);
	}

	const repoRoot = await client.getRepoRoot();
	const config = applyFlags(getConfig({ repoRoot, homeDir: deps.homeDir }), options);
	const descriptor = buildDescriptor(
		version,
		options,
		config,
		(deps.now ?? (() => new Date()))(),
	);
	const changelogPath = resolveChangelogPath(options, config, repoRoot);

	let branch = config.branch ?? (await client.getCurrentBranch());
	if (!branch) {
		if (config.push) {
			throw new PreconditionError("HEAD is detached; pass --branch to choose what to push");
		}
		branch = "HEAD";
	}

	const target: PublishTarget = {
		version: descriptor.version,
		notes: descriptor.notes,
		remote: config.remote,
		branch,
	};

	await checkPreconditions(client, target, config.push, changelogPath);

	// Dry pass first: fails on a missing changelog before anything is written
	const preview = await rewriteChangelog(changelogPath, descriptor, {
		fs: deps.fs,
		dryRun: true,
	});
	const entry = formatEntry(descriptor);
	const previous = readLatestEntry(preview.slice(entry.length));

	say.step(`Release ${color.cyan(descriptor.version)} on ${color.cyan(branch)}`);
	say.info(`New entry in ${color.dim(changelogPath)}:\n${color.dim(entry.trimEnd())}`);
	if (previous) {
		say.info(color.dim(`Previous entry: ${previous.version} (${previous.dateLine})`));
	}

	const plan = planRelease(target).filter(
		(s) => config.push || !s.step.startsWith("push-"),
	);

	if (options.dryRun) {
		say.info(`Would run:\n${formatPlan(plan)}`);
		say.outro(color.yellow("Dry run, nothing changed"));
		return;
	}

	if (!options.yes && !process.stdin.isTTY) {
		throw new PreconditionError("No terminal to confirm the release on; pass --yes");
	}

	if (!(await confirmAction(`Release ${descriptor.version}?`, { yes: options.yes }))) {
		p.cancel("Aborted");
		return;
	}

	const writeSpinner = createSpinner();
	writeSpinner.start(`Updating ${changelogPath}`);
	try {
		await rewriteChangelog(changelogPath, descriptor, {
			fs: deps.fs,
			onCleanupError: (tempPath) =>
				say.warn(`Could not remove temporary file ${tempPath}`),
		});
	} catch (error) {
		writeSpinner.stop("Failed to update changelog", 2);
		throw error;
	}
	writeSpinner.stop(`Updated ${changelogPath}`);

	const stepSpinner = createSpinner();
	const result = await publishRelease(client, target, {
		skipPush: !config.push,
		onStepStart: (planned) => stepSpinner.start(planned.label),
		onStepEnd: (planned, stepResult) =>
			stepSpinner.stop(
				stepResult.ok ? planned.label : `${planned.label} failed`,
				stepResult.ok ? 0 : 2,
			),
	});

	if (result.failed) {
		const failedStep = result.failed.step;
		const left = plan.filter(
			(s) => s.step === failedStep || stepsRemaining(failedStep).includes(s.step),
		);
		if (result.completed.length > 0) {
			p.log.warn(`Already done locally: ${result.completed.join(", ")}`);
		}
		p.log.info(`Finish manually:\n${formatPlan(left)}`);
		assertPublished(result);
	}

	if (!config.push) {
		const pushSteps = planRelease(target).filter((s) => s.step.startsWith("push-"));
		say.info(`Push when ready:\n${formatPlan(pushSteps)}`);
	}

	say.success(`Released ${color.cyan(descriptor.version)}`);
	say.outro(color.green("Done!"));
}
