import * as p from "@clack/prompts";

/**
 * Yes/no confirmation. `--yes` takes the default without prompting;
 * without a terminal to ask on, the answer is no.
 */
export async function confirmAction(
	message: string,
	options: { yes?: boolean; defaultValue?: boolean } = {},
): Promise<boolean> {
	const { yes, defaultValue = true } = options;

	if (yes) {
		return defaultValue;
	}

	if (!process.stdin.isTTY) {
		return false;
	}

	const result = await p.confirm({
		message,
		initialValue: defaultValue,
	});

	if (p.isCancel(result)) {
		return false;
	}

	return result;
}
