/**
 * One release event. Built once per run from CLI flags and consumed
 * immediately by the changelog rewriter and the publisher.
 */
export interface ReleaseDescriptor {
	version: string;
	/** Either a bare value ("2024-02-02") or the full "Date: ..." line */
	date: string;
	notes: string;
}

export interface PublishTarget {
	version: string;
	notes: string;
	remote: string;
	branch: string;
}

export type ReleaseStep = "stage" | "commit" | "tag" | "push-branch" | "push-tag";

export const RELEASE_STEPS: readonly ReleaseStep[] = [
	"stage",
	"commit",
	"tag",
	"push-branch",
	"push-tag",
];

export type StepResult =
	| { step: ReleaseStep; ok: true; output: string }
	| { step: ReleaseStep; ok: false; error: unknown };
