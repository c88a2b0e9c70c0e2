import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Aggregator } from "../watch/aggregator.js";
import { createMatcher } from "../watch/patterns.js";
import { FlushScheduler } from "../watch/scheduler.js";
import type { Incident } from "../watch/types.js";

const matcher = createMatcher({ match: "error" });

function setup() {
	const deliver = vi.fn(async (_batch: Incident[], _errorCount: number) => {});
	const aggregator = new Aggregator({
		matcher,
		notifier: { deliver },
		contextLines: 1,
		gracePeriodMs: 0,
	});
	const flush = vi.spyOn(aggregator, "flush");
	const scheduler = new FlushScheduler(aggregator, { intervalMs: 30_000 });
	return { aggregator, deliver, flush, scheduler };
}

beforeEach(() => {
	vi.useFakeTimers();
});

afterEach(() => {
	vi.useRealTimers();
});

describe("FlushScheduler", () => {
	it("flushes on start and then every interval", async () => {
		const { flush, scheduler } = setup();

		scheduler.start();
		expect(flush).toHaveBeenCalledTimes(1);

		await vi.advanceTimersByTimeAsync(30_000);
		expect(flush).toHaveBeenCalledTimes(2);

		await vi.advanceTimersByTimeAsync(60_000);
		expect(flush).toHaveBeenCalledTimes(4);

		scheduler.stop();
		expect(scheduler.isRunning()).toBe(false);
	});

	it("skips ticks while a delivery is still in flight", async () => {
		let release: () => void = () => {};
		const { aggregator, deliver, flush, scheduler } = setup();
		deliver.mockImplementationOnce(
			() =>
				new Promise<void>((resolve) => {
					release = resolve;
				}),
		);
		aggregator.ingest("x error");
		aggregator.ingest("n");

		scheduler.start();
		await vi.advanceTimersByTimeAsync(30_000);
		expect(deliver).toHaveBeenCalledTimes(1);
		expect(flush).toHaveBeenCalledTimes(1);

		release();
		await vi.advanceTimersByTimeAsync(30_000);
		expect(flush).toHaveBeenCalledTimes(2);

		scheduler.stop();
	});

	it("runs one final flush when finished", async () => {
		const { aggregator, deliver, flush, scheduler } = setup();

		scheduler.start();
		aggregator.ingest("x error");
		const final = scheduler.finish();

		expect(scheduler.finish()).toBe(final);
		await expect(final).resolves.toEqual({ status: "delivered", incidents: 1, errorCount: 1 });
		expect(deliver.mock.calls[0][0][0].reason).toBe("final");
		expect(flush).toHaveBeenLastCalledWith({ final: true });

		await vi.advanceTimersByTimeAsync(90_000);
		expect(flush).toHaveBeenCalledTimes(2);
		expect(scheduler.isRunning()).toBe(false);
	});

	it("does not restart after finishing", async () => {
		const { flush, scheduler } = setup();

		await scheduler.finish();
		scheduler.start();

		expect(scheduler.isRunning()).toBe(false);
		expect(flush).toHaveBeenCalledTimes(1);
	});
});
