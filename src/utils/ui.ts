import * as p from "@clack/prompts";

let silentMode = false;

export function setSilentMode(silent: boolean) {
	silentMode = silent;
}

export function createSpinner() {
	const s = p.spinner();

	return {
		start: (msg?: string) => {
			if (!silentMode) s.start(msg);
		},
		stop: (msg?: string, code?: number) => {
			if (!silentMode) s.stop(msg, code);
		},
		message: (msg?: string) => {
			if (!silentMode) s.message(msg);
		},
	};
}

/** Informational output; dropped in silent mode. Errors always go through p.log.error. */
export const say = {
	intro: (title: string) => {
		if (!silentMode) p.intro(title);
	},
	outro: (msg: string) => {
		if (!silentMode) p.outro(msg);
	},
	info: (msg: string) => {
		if (!silentMode) p.log.info(msg);
	},
	step: (msg: string) => {
		if (!silentMode) p.log.step(msg);
	},
	success: (msg: string) => {
		if (!silentMode) p.log.success(msg);
	},
	warn: (msg: string) => {
		if (!silentMode) p.log.warn(msg);
	},
};
