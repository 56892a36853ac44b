import { NoCapableCharacteristicError } from "../errors/errors";
import type { Capability, Characteristic, Service } from "../types";
import { uuidMatches } from "../utils/uuid";

/** Capabilities that make a characteristic a write target */
export const WRITABLE: readonly Capability[] = ["write", "writeWithoutResponse"];

/**
 * All characteristics offering a capability, in service order then
 * characteristic order.
 */
export function select(
	services: readonly Service[],
	capability: Capability,
): Characteristic[] {
	return services.flatMap((service) =>
		service.characteristics.filter((c) => c.capabilities.has(capability)),
	);
}

/**
 * The first characteristic, in enumeration order, offering any of
 * `capabilities`. No capability ranks above another.
 *
 * @example First write target, acknowledged or not
 * ```typescript
 * const target = selectFirst(services, WRITABLE);
 * ```
 *
 * @throws NoCapableCharacteristicError when none offers any of them
 */
export function selectFirst(
	services: readonly Service[],
	capabilities: readonly Capability[],
): Characteristic {
	for (const service of services) {
		const match = service.characteristics.find((c) =>
			capabilities.some((cap) => c.capabilities.has(cap)),
		);
		if (match) return match;
	}
	throw new NoCapableCharacteristicError(capabilities);
}

/**
 * Picks one characteristic by a caller-ranked preference: the first
 * candidate for the first capability in `preference` that any
 * characteristic offers.
 *
 * @example
 * ```typescript
 * const target = selectOne(services, ["write", "writeWithoutResponse"]);
 * const notifier = selectOne(services, "notify");
 * ```
 *
 * @throws NoCapableCharacteristicError when no characteristic offers any of them
 */
export function selectOne(
	services: readonly Service[],
	preference: Capability | readonly Capability[],
): Characteristic {
	const order: readonly Capability[] =
		typeof preference === "string" ? [preference] : preference;

	for (const capability of order) {
		const [first] = select(services, capability);
		if (first) {
			return first;
		}
	}
	throw new NoCapableCharacteristicError(order);
}

/**
 * Looks a characteristic up by UUID, short or full form.
 * Pass `serviceId` when the same characteristic UUID appears in several services.
 */
export function findCharacteristic(
	services: readonly Service[],
	characteristicId: string,
	serviceId?: string,
): Characteristic | undefined {
	for (const service of services) {
		if (serviceId !== undefined && !uuidMatches(service.id, serviceId)) {
			continue;
		}
		const match = service.characteristics.find((c) =>
			uuidMatches(c.id, characteristicId),
		);
		if (match) return match;
	}
	return undefined;
}

export interface ServiceSummary {
	readonly serviceId: string;
	readonly characteristics: readonly {
		readonly id: string;
		readonly capabilities: readonly Capability[];
	}[];
}

const CAPABILITY_ORDER: readonly Capability[] = [
	"read",
	"write",
	"writeWithoutResponse",
	"notify",
	"indicate",
];

/**
 * Flattens resolved services into plain data for presentation layers.
 * Capabilities are listed in a fixed order.
 *
 * @example
 * ```typescript
 * for (const { serviceId, characteristics } of describeServices(services)) {
 *   console.log(serviceId);
 *   for (const c of characteristics) console.log(`  ${c.id} [${c.capabilities.join(", ")}]`);
 * }
 * ```
 */
export function describeServices(
	services: readonly Service[],
): ServiceSummary[] {
	return services.map((service) => ({
		serviceId: service.id,
		characteristics: service.characteristics.map((c) => ({
			id: c.id,
			capabilities: CAPABILITY_ORDER.filter((cap) => c.capabilities.has(cap)),
		})),
	}));
}
