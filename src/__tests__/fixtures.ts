import { vi } from "vitest";
import type { SimulatedPeripheral } from "../adapter/simulated";
import type { Capability, Characteristic, Service } from "../types";

/**
 * Builds resolved services without a connection, for selector tests.
 */
export function buildTestServices(
	layout: ReadonlyArray<{
		id: string;
		characteristics: ReadonlyArray<readonly [string, readonly Capability[]]>;
	}>,
): Service[] {
	return layout.map(({ id, characteristics: entries }) => {
		const characteristics: Characteristic[] = [];
		const service: Service = { id, characteristics };
		for (const [charId, capabilities] of entries) {
			characteristics.push({
				id: charId,
				capabilities: new Set(capabilities),
				service,
			});
		}
		return service;
	});
}

export const ECHO_SERVICE = "0000fff0-0000-1000-8000-00805f9b34fb";
export const ECHO_CHAR = "0000fff1-0000-1000-8000-00805f9b34fb";
export const STATUS_CHAR = "0000fff2-0000-1000-8000-00805f9b34fb";

/**
 * A peripheral with one echoing read/write/notify characteristic and a
 * read-only status characteristic listed first.
 */
export function echoPeripheral(
	address: string,
	overrides: Partial<SimulatedPeripheral> = {},
): SimulatedPeripheral {
	return {
		address,
		name: "Echo",
		services: [
			{
				id: ECHO_SERVICE,
				characteristics: [
					{
						id: STATUS_CHAR,
						capabilities: ["read"],
						value: new TextEncoder().encode("OK"),
					},
					{
						id: ECHO_CHAR,
						capabilities: ["read", "write", "notify"],
						echo: true,
					},
				],
			},
		],
		...overrides,
	};
}

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Runs fake timers forward by `ms`, then returns what `promise` settled with.
 * The rejection handler is attached before any timer fires.
 */
export async function settle<T>(promise: Promise<T>, ms: number): Promise<T> {
	const outcome = promise.then(
		(value): Outcome<T> => ({ ok: true, value }),
		(error: unknown): Outcome<T> => ({ ok: false, error }),
	);
	await vi.advanceTimersByTimeAsync(ms);
	const result = await outcome;
	if (!result.ok) throw result.error;
	return result.value;
}
