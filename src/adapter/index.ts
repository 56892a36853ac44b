export {
	addressOf,
	capabilitiesOf,
	releaseAbandonedConnect,
	splitManufacturerData,
	toConnectFailure,
	toGattFailure,
	toNobleUuid,
	toSighting,
} from "./noble-mapping";
export {
	createSimulatedRadio,
	GATT_ATTRIBUTE_NOT_FOUND,
	GATT_READ_NOT_PERMITTED,
	GATT_WRITE_NOT_PERMITTED,
	type RecordedWrite,
	type SimulatedCharacteristic,
	type SimulatedPeripheral,
	type SimulatedRadio,
	type SimulatedRadioOptions,
	type SimulatedRadioStats,
	type SimulatedService,
} from "./simulated";
