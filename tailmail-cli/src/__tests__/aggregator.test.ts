import { describe, it, expect, vi } from "vitest";
import { Aggregator, countErrors } from "../watch/aggregator.js";
import { createMatcher } from "../watch/patterns.js";
import { HOUR_MS } from "../watch/rate-limiter.js";
import type { AggregatorOptions, Incident } from "../watch/types.js";

const matcher = createMatcher({ match: "error" });

function setup(options: Partial<AggregatorOptions> = {}) {
	const clock = { now: 100_000 };
	const deliver = vi.fn(async (_batch: Incident[], _errorCount: number) => {});
	const log = vi.fn((_message: string) => {});
	const aggregator = new Aggregator({
		matcher,
		notifier: { deliver },
		gracePeriodMs: 0,
		now: () => clock.now,
		log,
		...options,
	});
	return { aggregator, deliver, log, clock };
}

function ingestAll(aggregator: Aggregator, lines: string[]): void {
	for (const line of lines) aggregator.ingest(line);
}

const ROUND_TRIP = ["ok1", "ok2", "boom error", "ok3", "ok4", "ok5", "ok6", "ok7", "ok8", "ok9"];

describe("Aggregator.ingest", () => {
	it("queues one incident for a lone error", () => {
		const { aggregator } = setup({ contextLines: 3 });

		ingestAll(aggregator, ROUND_TRIP);

		expect(aggregator.getStats()).toEqual({
			linesSeen: 10,
			errorLines: 1,
			incidentsSealed: 1,
			incidentsDropped: 0,
			queued: 1,
			open: false,
		});
		expect(aggregator.queuedIncidents()[0].lines).toEqual(["ok1", "ok2", "boom error", "ok3", "ok4", "ok5"]);
	});

	it("skips blank lines entirely", () => {
		const { aggregator } = setup({ contextLines: 2 });

		ingestAll(aggregator, ["a", "   ", "b error", "", "c", "d"]);

		expect(aggregator.getStats().linesSeen).toBe(4);
		expect(aggregator.queuedIncidents()[0].lines).toEqual(["a", "b error", "c", "d"]);
	});

	it("stops opening incidents while the queue is full", () => {
		const { aggregator } = setup({ contextLines: 1, queueSize: 2 });

		ingestAll(aggregator, ["e1 error", "n1", "e2 error", "n2", "e3 error", "n3"]);

		const stats = aggregator.getStats();
		expect(stats.queued).toBe(2);
		expect(stats.open).toBe(false);
		expect(stats.errorLines).toBe(3);
		expect(aggregator.queuedIncidents().map((i) => i.lines)).toEqual([
			["e1 error", "n1"],
			["n1", "e2 error", "n2"],
		]);
	});

	it("resumes once a flush empties the queue", async () => {
		const { aggregator } = setup({ contextLines: 1, queueSize: 1 });

		ingestAll(aggregator, ["e1 error", "n1", "e2 error"]);
		expect(aggregator.getStats().open).toBe(false);

		await aggregator.flush();
		aggregator.ingest("e3 error");

		expect(aggregator.getStats().open).toBe(true);
	});
});

describe("Aggregator.flush", () => {
	it("does nothing with an empty queue", async () => {
		const { aggregator, deliver } = setup();

		await expect(aggregator.flush()).resolves.toEqual({ status: "empty" });
		expect(deliver).not.toHaveBeenCalled();
	});

	it("delivers the queued batch with its error count", async () => {
		const { aggregator, deliver, clock } = setup({ contextLines: 3 });
		ingestAll(aggregator, ROUND_TRIP);

		const result = await aggregator.flush();

		expect(result).toEqual({ status: "delivered", incidents: 1, errorCount: 1 });
		expect(deliver).toHaveBeenCalledTimes(1);
		expect(deliver.mock.calls[0][0].map((i) => i.lines)).toEqual([
			["ok1", "ok2", "boom error", "ok3", "ok4", "ok5"],
		]);
		expect(deliver.mock.calls[0][1]).toBe(1);
		expect(aggregator.getStats().queued).toBe(0);
		expect(aggregator.sentInLastHour()).toEqual([clock.now]);
	});

	it("drops the batch once the hourly limit is reached", async () => {
		const { aggregator, deliver } = setup({ contextLines: 1, maxPerHour: 1 });

		ingestAll(aggregator, ["a error", "n"]);
		await aggregator.flush();
		ingestAll(aggregator, ["b error", "n", "c error", "n"]);

		await expect(aggregator.flush()).resolves.toEqual({ status: "rate-limited", dropped: 2 });
		expect(deliver).toHaveBeenCalledTimes(1);
		expect(aggregator.getStats().queued).toBe(0);
	});

	it("sends again after the oldest send ages out", async () => {
		const { aggregator, deliver, clock } = setup({ contextLines: 1, maxPerHour: 1 });

		ingestAll(aggregator, ["a error", "n"]);
		await aggregator.flush();
		clock.now += HOUR_MS;
		ingestAll(aggregator, ["b error", "n"]);

		await expect(aggregator.flush()).resolves.toMatchObject({ status: "delivered" });
		expect(deliver).toHaveBeenCalledTimes(2);
	});

	it("seals an incident that has been open too long", async () => {
		const { aggregator, deliver, clock } = setup({ staleAfterMs: 1_000 });
		aggregator.ingest("x error");

		clock.now += 500;
		await expect(aggregator.flush()).resolves.toEqual({ status: "empty" });
		expect(aggregator.getStats().open).toBe(true);

		clock.now += 501;
		await expect(aggregator.flush()).resolves.toMatchObject({ status: "delivered", incidents: 1 });
		expect(deliver.mock.calls[0][0][0].reason).toBe("stale");
	});

	it("force-seals the open incident on the final flush", async () => {
		const { aggregator, deliver } = setup();
		ingestAll(aggregator, ["ok", "x error", "after"]);

		await expect(aggregator.flush({ final: true })).resolves.toEqual({
			status: "delivered",
			incidents: 1,
			errorCount: 1,
		});
		expect(deliver.mock.calls[0][0][0]).toMatchObject({ lines: ["ok", "x error", "after"], reason: "final" });
	});

	it("holds back the final flush during the startup grace period", async () => {
		const { aggregator, deliver, clock } = setup({ gracePeriodMs: 60_000 });
		aggregator.ingest("x error");
		clock.now += 30_000;

		await expect(aggregator.flush({ final: true })).resolves.toEqual({ status: "suppressed", dropped: 1 });
		expect(deliver).not.toHaveBeenCalled();
	});

	it("sends the final flush during the grace period in debug mode", async () => {
		const { aggregator, deliver } = setup({ gracePeriodMs: 60_000, debug: true });
		aggregator.ingest("x error");

		await expect(aggregator.flush({ final: true })).resolves.toMatchObject({ status: "delivered" });
		expect(deliver).toHaveBeenCalledTimes(1);
	});

	it("leaves periodic flushes alone during the grace period", async () => {
		const { aggregator, deliver } = setup({ gracePeriodMs: 60_000, contextLines: 1 });
		ingestAll(aggregator, ["x error", "n"]);

		await expect(aggregator.flush()).resolves.toMatchObject({ status: "delivered" });
		expect(deliver).toHaveBeenCalledTimes(1);
	});

	it("drops the batch and keeps going when delivery fails", async () => {
		const { aggregator, deliver, log } = setup({ contextLines: 1 });
		deliver.mockRejectedValueOnce(new Error("smtp down"));
		ingestAll(aggregator, ["x error", "n"]);

		const result = await aggregator.flush();

		expect(result).toMatchObject({ status: "failed", dropped: 1 });
		expect(result.status === "failed" && result.error.message).toBe("smtp down");
		expect(log).toHaveBeenCalledWith("delivery failed, dropping 1 incident(s): smtp down");
		expect(aggregator.sentInLastHour()).toEqual([]);

		ingestAll(aggregator, ["y error", "n"]);
		expect(aggregator.getStats().queued).toBe(1);
	});

	it("keeps ingesting while a delivery is in flight", async () => {
		let release: () => void = () => {};
		const { aggregator, deliver } = setup({ contextLines: 1 });
		deliver.mockImplementationOnce(
			() =>
				new Promise<void>((resolve) => {
					release = resolve;
				}),
		);
		ingestAll(aggregator, ["a error", "n"]);

		const first = aggregator.flush();
		const second = aggregator.flush();
		await vi.waitFor(() => expect(deliver).toHaveBeenCalledTimes(1));

		expect(aggregator.isFlushing()).toBe(true);
		ingestAll(aggregator, ["b error", "n"]);
		expect(aggregator.getStats().queued).toBe(1);

		release();
		await expect(first).resolves.toMatchObject({ status: "delivered", incidents: 1 });
		await expect(second).resolves.toMatchObject({ status: "delivered", incidents: 1 });
		expect(deliver).toHaveBeenCalledTimes(2);
		expect(aggregator.isFlushing()).toBe(false);
	});
});

describe("countErrors", () => {
	it("counts error lines across every incident, context included", () => {
		const batch: Incident[] = [
			{ lines: ["a error", "b"], openedAt: 0, sealedAt: 0, reason: "window" },
			{ lines: ["a error", "c error"], openedAt: 0, sealedAt: 0, reason: "window" },
		];

		expect(countErrors(batch, matcher)).toBe(3);
	});
});
