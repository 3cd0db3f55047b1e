/**
 * Release publishing
 *
 * Runs the git side of a release in a fixed order:
 * stage -> commit -> tag -> push branch -> push tag.
 * The first failing step ends the run; nothing after it is attempted.
 */

import {
	RELEASE_STEPS,
	type PublishTarget,
	type ReleaseStep,
	type StepResult,
} from "../types/release";
import {
	commitArgs,
	type GitClient,
	pushBranchArgs,
	pushTagArgs,
	tagArgs,
} from "../utils/git";
import { ReleaseStepError } from "./errors";

export interface PlannedStep {
	step: ReleaseStep;
	label: string;
	/** Equivalent shell command, for dry runs and manual recovery */
	command: string;
}

export interface PublishHooks {
	onStepStart?: (planned: PlannedStep) => void;
	onStepEnd?: (planned: PlannedStep, result: StepResult) => void;
}

export interface PublishOptions extends PublishHooks {
	/** Stop after the local tag is created */
	skipPush?: boolean;
}

export interface PublishResult {
	completed: ReleaseStep[];
	failed?: Extract<StepResult, { ok: false }>;
}

function shellQuote(arg: string): string {
	if (/^[\w./:@=-]+$/.test(arg)) return arg;
	return `'${arg.replace(/'/g, `'\\''`)}'`;
}

function toCommand(args: string[]): string {
	return ["git", ...args].map(shellQuote).join(" ");
}

export function planRelease(target: PublishTarget): PlannedStep[] {
	const { version, notes, remote, branch } = target;

	const commands: Record<ReleaseStep, { label: string; args: string[] }> = {
		stage: { label: "Staging tracked changes", args: ["add", "--update"] },
		commit: { label: "Committing release", args: commitArgs(notes) },
		tag: { label: `Creating tag ${version}`, args: tagArgs(version, notes) },
		"push-branch": {
			label: `Pushing ${branch} to ${remote}`,
			args: pushBranchArgs(remote, branch),
		},
		"push-tag": {
			label: `Pushing tag ${version} to ${remote}`,
			args: pushTagArgs(remote, version),
		},
	};

	return RELEASE_STEPS.map((step) => ({
		step,
		label: commands[step].label,
		command: toCommand(commands[step].args),
	}));
}

export function stepsRemaining(step: ReleaseStep): ReleaseStep[] {
	return RELEASE_STEPS.slice(RELEASE_STEPS.indexOf(step) + 1);
}

function runStep(
	client: GitClient,
	target: PublishTarget,
	step: ReleaseStep,
): Promise<string> {
	switch (step) {
		case "stage":
			return client.stageTracked();
		case "commit":
			return client.commit(target.notes);
		case "tag":
			return client.createAnnotatedTag(target.version, target.notes);
		case "push-branch":
			return client.pushBranch(target.remote, target.branch);
		case "push-tag":
			return client.pushTag(target.remote, target.version);
	}
}

export async function publishRelease(
	client: GitClient,
	target: PublishTarget,
	options: PublishOptions = {},
): Promise<PublishResult> {
	const completed: ReleaseStep[] = [];
	const plan = options.skipPush
		? planRelease(target).filter((p) => !p.step.startsWith("push-"))
		: planRelease(target);

	for (const planned of plan) {
		options.onStepStart?.(planned);

		let result: StepResult;
		try {
			const output = await runStep(client, target, planned.step);
			result = { step: planned.step, ok: true, output };
		} catch (error) {
			result = { step: planned.step, ok: false, error };
		}

		options.onStepEnd?.(planned, result);

		if (!result.ok) {
			return { completed, failed: result };
		}
		completed.push(planned.step);
	}

	return { completed };
}

export function assertPublished(result: PublishResult): void {
	if (result.failed) {
		throw new ReleaseStepError(result.failed.step, result.failed.error);
	}
}
