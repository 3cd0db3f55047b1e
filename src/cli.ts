#!/usr/bin/env node

import * as p from "@clack/prompts";
import { Command } from "commander";
import { type PrependOptions, prependCommand } from "./commands/prepend";
import { type ReleaseOptions, releaseCommand } from "./commands/release";
import { ReleaseError } from "./lib/errors";
import { setSilentMode } from "./utils/ui";

const program = new Command();

function withEntryOptions(command: Command): Command {
	return command
		.option("-n, --notes <text>", "Release notes for the entry, commit and tag")
		.option("-F, --notes-file <path>", "Read release notes from a file")
		.option("-d, --date <value>", "Date for the entry (default: today)")
		.option("-c, --changelog <path>", "Changelog file (default: CHANGELOG in the repo root)")
		.option("-r, --repo <path>", "Repository path (default: current directory)")
		.option("--dry-run", "Show what would change without writing anything");
}

program
	.name("shiplog")
	.description("Prepend a release entry to the changelog, then commit, tag and push it")
	.version("1.0.0")
	.option("-s, --silent", "Suppress all CLI updates and animations")
	.hook("preAction", (thisCommand) => {
		if (thisCommand.opts().silent) {
			setSilentMode(true);
		}
	});

withEntryOptions(
	program
		.command("release")
		.alias("rel")
		.description("Update the changelog, commit, tag and push a release")
		.argument("<version>", "Version label, also used as the tag name"),
)
	.option("--remote <name>", "Remote to push to (default: origin)")
	.option("-b, --branch <name>", "Branch to push (default: current branch)")
	.option("--skip-push", "Stop after creating the local tag")
	.option("-y, --yes", "Skip confirmation prompts")
	.action(async (version: string, options: ReleaseOptions) => {
		await releaseCommand(version, options);
	});

withEntryOptions(
	program
		.command("prepend")
		.description("Prepend a release entry to the changelog only")
		.argument("<version>", "Version label for the entry"),
).action(async (version: string, options: PrependOptions) => {
	await prependCommand(version, options);
});

program.parseAsync().catch((error: unknown) => {
	if (error instanceof ReleaseError) {
		p.log.error(error.message);
		process.exit(error.exitCode);
	}
	p.log.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
	process.exit(1);
});
