import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	DEFAULT_CONFIG,
	formatReleaseDate,
	getConfig,
	parseConfig,
} from "../src/lib/config";

async function writeConfig(root: string, content: string): Promise<void> {
	await fs.mkdir(join(root, ".shiplog"), { recursive: true });
	await fs.writeFile(join(root, ".shiplog", "config.json"), content, "utf-8");
}

describe("parseConfig", () => {
	it("keeps known fields and drops unknown ones", () => {
		expect(parseConfig({ remote: "upstream", push: false, colour: "red" })).toEqual({
			remote: "upstream",
			push: false,
		});
	});

	it("rejects a field of the wrong type", () => {
		expect(() => parseConfig({ push: "yes" })).toThrow('"push" must be a boolean');
		expect(() => parseConfig({ remote: "" })).toThrow('"remote" must be a non-empty string');
		expect(() => parseConfig({ dateFormat: "us" })).toThrow(
			'"dateFormat" must be "iso" or "long"',
		);
	});

	it("rejects a non-object", () => {
		expect(() => parseConfig([])).toThrow("config must be a JSON object");
	});
});

describe("getConfig", () => {
	let home: string;
	let repo: string;

	beforeEach(async () => {
		home = await fs.mkdtemp(join(tmpdir(), "shiplog-home-"));
		repo = await fs.mkdtemp(join(tmpdir(), "shiplog-repo-"));
	});

	afterEach(async () => {
		await fs.rm(home, { recursive: true, force: true });
		await fs.rm(repo, { recursive: true, force: true });
	});

	it("returns the defaults when no config files exist", () => {
		expect(getConfig({ homeDir: home, repoRoot: repo })).toEqual(DEFAULT_CONFIG);
	});

	it("lets project config override global config", async () => {
		await writeConfig(home, JSON.stringify({ remote: "fork", dateFormat: "long" }));
		await writeConfig(repo, JSON.stringify({ remote: "upstream", branch: "trunk" }));

		expect(getConfig({ homeDir: home, repoRoot: repo })).toEqual({
			changelogFile: "CHANGELOG",
			remote: "upstream",
			branch: "trunk",
			push: true,
			dateFormat: "long",
		});
	});

	it("warns about and skips an unparsable file", async () => {
		await writeConfig(repo, "{ not json");
		const warn = vi.fn();

		expect(getConfig({ homeDir: home, repoRoot: repo, warn })).toEqual(DEFAULT_CONFIG);
		expect(warn).toHaveBeenCalledTimes(1);
		expect(warn.mock.calls[0][0]).toMatch(/^\[shiplog\] Warning: Could not parse config at/);
	});

	it("does not create a global config file", () => {
		getConfig({ homeDir: home });
		return expect(fs.readdir(home)).resolves.toEqual([]);
	});
});

describe("formatReleaseDate", () => {
	const date = new Date(2024, 1, 2);

	it("formats ISO dates with zero padding", () => {
		expect(formatReleaseDate(date, "iso")).toBe("2024-02-02");
	});

	it("formats long dates", () => {
		expect(formatReleaseDate(date, "long")).toBe("2 February 2024");
	});
});
