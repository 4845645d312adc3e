import ora, { type Ora } from "ora";

export function createSpinner(text: string): Ora {
	return ora({
		text,
		color: "cyan",
	});
}

/**
 * Run `fn` behind a spinner, marking it succeeded or failed with the outcome.
 * Errors are rethrown after the spinner is stopped.
 */
export async function withSpinner<T>(
	text: string,
	fn: () => Promise<T>,
	successText?: string,
): Promise<T> {
	const spinner = createSpinner(text).start();
	try {
		const result = await fn();
		spinner.succeed(successText);
		return result;
	} catch (error) {
		spinner.fail();
		throw error;
	}
}
