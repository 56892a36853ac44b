export {
	compareDevices,
	createDeviceRegistry,
	DEFAULT_DISCOVERY_WINDOW_MS,
	type DeviceRegistry,
	type DeviceRegistryOptions,
	type DiscoveryOptions,
	toDevice,
} from "./device-registry";
