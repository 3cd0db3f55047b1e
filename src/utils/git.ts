import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { GitCommandError } from "../lib/errors";

const execFileAsync = promisify(execFile);

export interface GitOptions {
	cwd: string;
}

/**
 * Runs a git command as an argument vector, so notes and tag names
 * reach git unquoted and unexpanded.
 */
export type GitRunner = (args: string[], options: GitOptions) => Promise<string>;

function errorField(error: unknown, field: "stderr" | "code"): unknown {
	if (typeof error === "object" && error !== null && field in error) {
		return Reflect.get(error, field);
	}
	return undefined;
}

export const git: GitRunner = async (args, options) => {
	try {
		const { stdout } = await execFileAsync("git", args, {
			cwd: options.cwd,
			maxBuffer: 10 * 1024 * 1024,
		});
		return stdout.trim();
	} catch (error) {
		const stderr = errorField(error, "stderr");
		const code = errorField(error, "code");
		throw new GitCommandError(
			args,
			typeof code === "number" ? code : null,
			typeof stderr === "string"
				? stderr
				: error instanceof Error
					? error.message
					: String(error),
		);
	}
};

export interface GitClient {
	readonly cwd: string;
	isGitRepo(): Promise<boolean>;
	getRepoRoot(): Promise<string>;
	getCurrentBranch(): Promise<string | null>;
	tagExists(tag: string): Promise<boolean>;
	hasRemote(remote: string): Promise<boolean>;
	isTracked(path: string): Promise<boolean>;
	stageTracked(): Promise<string>;
	commit(message: string): Promise<string>;
	createAnnotatedTag(tag: string, message: string): Promise<string>;
	pushBranch(remote: string, branch: string): Promise<string>;
	pushTag(remote: string, tag: string): Promise<string>;
}

/** git strips whitespace-only messages to empty, so the flag is always on */
export function commitArgs(message: string): string[] {
	return ["commit", "--allow-empty-message", "-m", message];
}

export function tagArgs(tag: string, message: string): string[] {
	return ["tag", "-a", tag, "-m", message];
}

export function pushBranchArgs(remote: string, branch: string): string[] {
	return ["push", remote, branch];
}

export function pushTagArgs(remote: string, tag: string): string[] {
	return ["push", remote, `refs/tags/${tag}`];
}

export function createGitClient(cwd: string, run: GitRunner = git): GitClient {
	const exec = (args: string[]) => run(args, { cwd });

	return {
		cwd,

		async isGitRepo() {
			try {
				return (await exec(["rev-parse", "--is-inside-work-tree"])) === "true";
			} catch {
				return false;
			}
		},

		getRepoRoot() {
			return exec(["rev-parse", "--show-toplevel"]);
		},

		async getCurrentBranch() {
			try {
				const branch = await exec(["rev-parse", "--abbrev-ref", "HEAD"]);
				// Detached HEAD reports the literal "HEAD"
				return branch && branch !== "HEAD" ? branch : null;
			} catch {
				return null;
			}
		},

		async tagExists(tag) {
			try {
				await exec(["show-ref", "--verify", "--quiet", `refs/tags/${tag}`]);
				return true;
			} catch {
				return false;
			}
		},

		async hasRemote(remote) {
			const output = await exec(["remote"]);
			return output.split("\n").some((name) => name.trim() === remote);
		},

		async isTracked(path) {
			try {
				await exec(["ls-files", "--error-unmatch", "--", path]);
				return true;
			} catch {
				return false;
			}
		},

		stageTracked() {
			return exec(["add", "--update"]);
		},

		commit(message) {
			return exec(commitArgs(message));
		},

		createAnnotatedTag(tag, message) {
			return exec(tagArgs(tag, message));
		},

		pushBranch(remote, branch) {
			return exec(pushBranchArgs(remote, branch));
		},

		pushTag(remote, tag) {
			return exec(pushTagArgs(remote, tag));
		},
	};
}
