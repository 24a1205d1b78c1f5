import { TimeoutError } from "../errors";

/**
 * Races `task` against a timer. The task itself is not cancelled; its late
 * result is ignored.
 */
export const withTimeout = <T>(
	task: Promise<T>,
	timeoutMs: number,
	label: string
): Promise<T> => {
	if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
		return task;
	}

	let timer: ReturnType<typeof setTimeout> | null = null;
	const timeout = new Promise<never>((_resolve, reject) => {
		timer = setTimeout(
			() => reject(new TimeoutError(label, timeoutMs)),
			timeoutMs
		);
	});

	return Promise.race([task, timeout]).finally(() => {
		if (timer) {
			clearTimeout(timer);
		}
	});
};

export const sleep = (ms: number): Promise<void> =>
	new Promise((resolve) => setTimeout(resolve, Math.max(ms, 0)));
