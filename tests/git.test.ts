import { describe, expect, it } from "vitest";
import { GitCommandError } from "../src/lib/errors";
import { type GitOptions, type GitRunner, createGitClient } from "../src/utils/git";

function recordingRunner(responses: Record<string, string | Error> = {}) {
	const calls: Array<{ args: string[]; options: GitOptions }> = [];
	const run: GitRunner = async (args, options) => {
		calls.push({ args, options });
		const response = responses[args.join(" ")];
		if (response instanceof Error) throw response;
		return response ?? "";
	};
	return { calls, run };
}

describe("createGitClient", () => {
	it("runs every command in the given repository", async () => {
		const { calls, run } = recordingRunner();
		const client = createGitClient("/work/repo", run);

		await client.stageTracked();

		expect(calls).toEqual([{ args: ["add", "--update"], options: { cwd: "/work/repo" } }]);
	});

	it("passes notes as a single argument", async () => {
		const { calls, run } = recordingRunner();
		const client = createGitClient("/r", run);

		await client.commit('* fix "quoted" $HOME');
		await client.createAnnotatedTag("v1.0.0", "line one\nline two");

		expect(calls.map((c) => c.args)).toEqual([
			["commit", "--allow-empty-message", "-m", '* fix "quoted" $HOME'],
			["tag", "-a", "v1.0.0", "-m", "line one\nline two"],
		]);
	});

	it("allows an empty commit message", async () => {
		const { calls, run } = recordingRunner();

		await createGitClient("/r", run).commit("");

		expect(calls[0].args).toEqual(["commit", "--allow-empty-message", "-m", ""]);
	});

	it("allows a whitespace-only commit message", async () => {
		const { calls, run } = recordingRunner();

		await createGitClient("/r", run).commit("   ");

		expect(calls[0].args).toEqual(["commit", "--allow-empty-message", "-m", "   "]);
	});

	it("checks that a path is tracked with ls-files", async () => {
		const { calls, run } = recordingRunner({
			"ls-files --error-unmatch -- /r/NOTES": new GitCommandError(
				["ls-files"],
				1,
				"error: pathspec '/r/NOTES' did not match any file(s) known to git",
			),
		});
		const client = createGitClient("/r", run);

		expect(await client.isTracked("/r/CHANGELOG")).toBe(true);
		expect(await client.isTracked("/r/NOTES")).toBe(false);
		expect(calls[0]).toEqual({
			args: ["ls-files", "--error-unmatch", "--", "/r/CHANGELOG"],
			options: { cwd: "/r" },
		});
	});

	it("pushes the branch and the tag ref to the named remote", async () => {
		const { calls, run } = recordingRunner();
		const client = createGitClient("/r", run);

		await client.pushBranch("upstream", "release/1.x");
		await client.pushTag("upstream", "v1.0.0");

		expect(calls.map((c) => c.args)).toEqual([
			["push", "upstream", "release/1.x"],
			["push", "upstream", "refs/tags/v1.0.0"],
		]);
	});

	it("treats a detached HEAD as no branch", async () => {
		const { run } = recordingRunner({ "rev-parse --abbrev-ref HEAD": "HEAD" });

		expect(await createGitClient("/r", run).getCurrentBranch()).toBeNull();
	});

	it("returns the checked out branch", async () => {
		const { run } = recordingRunner({ "rev-parse --abbrev-ref HEAD": "main" });

		expect(await createGitClient("/r", run).getCurrentBranch()).toBe("main");
	});

	it("checks for a local tag with show-ref", async () => {
		const { run } = recordingRunner({
			"show-ref --verify --quiet refs/tags/v2.0.0": new GitCommandError(
				["show-ref"],
				1,
				"",
			),
		});
		const client = createGitClient("/r", run);

		expect(await client.tagExists("v1.0.0")).toBe(true);
		expect(await client.tagExists("v2.0.0")).toBe(false);
	});

	it("matches remotes by exact name", async () => {
		const { run } = recordingRunner({ remote: "origin\nupstream" });
		const client = createGitClient("/r", run);

		expect(await client.hasRemote("upstream")).toBe(true);
		expect(await client.hasRemote("up")).toBe(false);
	});

	it("is not a repository when rev-parse fails", async () => {
		const { run } = recordingRunner({
			"rev-parse --is-inside-work-tree": new GitCommandError(
				["rev-parse"],
				128,
				"fatal: not a git repository",
			),
		});

		expect(await createGitClient("/tmp", run).isGitRepo()).toBe(false);
	});

	it("propagates a failing mutation", async () => {
		const failure = new GitCommandError(["push", "origin", "main"], 1, "rejected");
		const { run } = recordingRunner({ "push origin main": failure });

		await expect(createGitClient("/r", run).pushBranch("origin", "main")).rejects.toBe(
			failure,
		);
	});
});

describe("GitCommandError", () => {
	it("names the command and includes stderr", () => {
		const error = new GitCommandError(["push", "origin", "main"], 1, "  ! [rejected]\n");
		expect(error.message).toBe("git push origin main failed: ! [rejected]");
	});

	it("falls back to the exit code when stderr is empty", () => {
		expect(new GitCommandError(["tag"], 128, "").message).toBe(
			"git tag failed: exit code 128",
		);
	});
});
