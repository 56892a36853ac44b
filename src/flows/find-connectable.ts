import type { ProbeReport } from "../ble/prober";
import type { Central } from "../central";

export interface FindConnectableOptions {
	/** Discovery window; the central's default when unset */
	windowMs?: number | undefined;
	perDeviceTimeoutMs?: number | undefined;
	namePrefix?: string | undefined;
	serviceIds?: readonly string[] | undefined;
	/** Ends discovery early and stops probing */
	signal?: AbortSignal | undefined;
}

/**
 * Discovers nearby devices, then keeps the ones that accept a connection.
 * Devices are probed in snapshot order.
 *
 * @example
 * ```typescript
 * const { connectable } = await findConnectable(central, { perDeviceTimeoutMs: 2000 });
 * ```
 */
export async function findConnectable(
	central: Central,
	options: FindConnectableOptions = {},
): Promise<ProbeReport> {
	const { windowMs, perDeviceTimeoutMs, namePrefix, serviceIds, signal } =
		options;

	const devices = await central.discover(windowMs, {
		namePrefix,
		serviceIds,
		signal,
	});
	return central.probeConnectable(devices, { perDeviceTimeoutMs, signal });
}
