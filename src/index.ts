export type { Device, DeviceApi, DeviceState, RemoteDevicePayload } from "./devices/types.js";
export {
  createDevice,
  describeDevice,
  deviceFromRemote,
  deviceToRemotePayload,
  devicesEqual,
  DeviceParseError,
} from "./devices/device.js";
export { DeviceApiClient, resolveDeviceUrl } from "./devices/client.js";
export type { DeviceApiClientOptions, FetchLike } from "./devices/client.js";
export { ArchiveConnectionError, ArchiveHttpError } from "./devices/errors.js";
export { reconcileDevice } from "./devices/reconcile.js";
export type { DesiredDevice, ReconcileAction, ReconcileResult } from "./devices/reconcile.js";
export { parseModuleParams, ModuleParamError } from "./module/params.js";
export type { DeviceModuleParams } from "./module/params.js";
export { runDeviceModule } from "./module/run.js";
export { createSubsystemLogger } from "./logging/subsystem.js";
export type { SubsystemLogger } from "./logging/subsystem.js";
