/**
 * Noble-backed radio adapter, published as `gatt-central-kit/noble`.
 * Importing it loads the native Bluetooth binding.
 */
export { createNobleAdapter, type NobleAdapterOptions } from "./adapter/noble";
