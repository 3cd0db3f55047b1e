import type { ReleaseStep } from "../types/release";

/**
 * Base class for every failure the CLI knows how to report.
 * `exitCode` is what the process exits with.
 */
export class ReleaseError extends Error {
	readonly exitCode: number;

	constructor(message: string, exitCode: number) {
		super(message);
		this.name = "ReleaseError";
		this.exitCode = exitCode;
	}
}

export class ConfigError extends ReleaseError {
	constructor(message: string) {
		super(message, 2);
		this.name = "ConfigError";
	}
}

export class PreconditionError extends ReleaseError {
	constructor(message: string) {
		super(message, 3);
		this.name = "PreconditionError";
	}
}

export class ChangelogNotFoundError extends ReleaseError {
	readonly path: string;

	constructor(path: string, cause?: unknown) {
		super(`Changelog not found or unreadable: ${path}${describeCause(cause)}`, 4);
		this.name = "ChangelogNotFoundError";
		this.path = path;
	}
}

export class ChangelogWriteError extends ReleaseError {
	readonly path: string;

	constructor(path: string, cause?: unknown) {
		super(
			`Could not write changelog ${path}; original left intact${describeCause(cause)}`,
			5,
		);
		this.name = "ChangelogWriteError";
		this.path = path;
	}
}

export class GitCommandError extends Error {
	readonly args: string[];
	readonly code: number | null;
	readonly stderr: string;

	constructor(args: string[], code: number | null, stderr: string) {
		const detail = stderr.trim() || `exit code ${code ?? "unknown"}`;
		super(`git ${args.join(" ")} failed: ${detail}`);
		this.name = "GitCommandError";
		this.args = args;
		this.code = code;
		this.stderr = stderr;
	}
}

export const STEP_EXIT_CODES: Record<ReleaseStep, number> = {
	stage: 10,
	commit: 11,
	tag: 12,
	"push-branch": 13,
	"push-tag": 14,
};

export class ReleaseStepError extends ReleaseError {
	readonly step: ReleaseStep;

	constructor(step: ReleaseStep, cause: unknown) {
		super(`Release step "${step}" failed${describeCause(cause)}`, STEP_EXIT_CODES[step]);
		this.name = "ReleaseStepError";
		this.step = step;
	}
}

function describeCause(cause: unknown): string {
	if (cause === undefined) return "";
	return `: ${cause instanceof Error ? cause.message : String(cause)}`;
}
