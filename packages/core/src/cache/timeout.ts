/**
 * @title Timeout Module
 * @description Race an abortable operation against a timer.
 *
 * @module cache
 */

import { LoadTimeoutError } from "../errors.js";

/**
 * Run an operation, rejecting with LoadTimeoutError if it does not settle
 * within `timeout` milliseconds.
 *
 * The operation and the timer start together; the first to settle decides the
 * outcome. When the timer wins, `controller` is aborted with the timeout error
 * so a cooperative operation can stop. Aborting `controller` from outside ends
 * the wait the same way, rejecting with the abort reason. A late settlement of
 * the operation is ignored.
 *
 * @param operation - Operation to run, receiving the controller's signal
 * @param timeout - Timeout in milliseconds
 * @param controller - Controller whose signal is handed to the operation
 * @returns The operation's result
 */
export async function raceWithTimeout<T>(
	operation: (signal: AbortSignal) => Promise<T>,
	timeout: number,
	controller: AbortController = new AbortController(),
): Promise<T> {
	const { signal } = controller;
	let timeoutId: ReturnType<typeof setTimeout> | undefined;
	let onAbort = (): void => undefined;

	const stopped = new Promise<never>((_, reject) => {
		onAbort = () => reject(signal.reason);
	});

	if (signal.aborted) {
		onAbort();
	} else {
		signal.addEventListener("abort", onAbort, { once: true });
		timeoutId = setTimeout(() => controller.abort(new LoadTimeoutError(timeout)), timeout);
	}

	let work: Promise<T>;
	try {
		work = operation(signal);
	} catch (error) {
		work = Promise.reject(error);
	}

	try {
		return await Promise.race([stopped, work]);
	} finally {
		clearTimeout(timeoutId);
		signal.removeEventListener("abort", onAbort);
	}
}
