// ---------------------------------------------------------------------------
// Device reconciliation – converge one archive device to a desired state
// ---------------------------------------------------------------------------
// fetch -> compare -> act. At most one read and one write; any error from the
// client propagates untouched and nothing is rolled back.
// ---------------------------------------------------------------------------

import type { Device, DeviceApi, DeviceState } from "./types.js";
import { describeDevice, devicesEqual } from "./device.js";
import { silentLogger, type SubsystemLogger } from "../logging/subsystem.js";

export type DesiredDevice = {
  state: DeviceState;
  device: Device;
};

export type ReconcileAction = "created" | "updated" | "deleted" | "none";

export type ReconcileResult = {
  name: string;
  state: DeviceState;
  changed: boolean;
  action: ReconcileAction;
};

export async function reconcileDevice(
  desired: DesiredDevice,
  api: DeviceApi,
  log: SubsystemLogger = silentLogger,
): Promise<ReconcileResult> {
  const { device, state } = desired;
  const result = (changed: boolean, action: ReconcileAction): ReconcileResult => ({
    name: device.name,
    state,
    changed,
    action: changed ? action : "none",
  });

  if (state === "absent") {
    const deleted = await api.delete();
    log.info(deleted ? `deleted ${device.name}` : `${device.name} already absent`);
    return result(deleted, "deleted");
  }

  const actual = await api.fetch();
  if (!actual) {
    const created = await api.create(device);
    log.info(
      created
        ? `created ${describeDevice(device)}`
        : `${device.name} appeared concurrently; leaving it as is`,
    );
    return result(created, "created");
  }

  if (devicesEqual(actual, device)) {
    log.debug(`${describeDevice(device)} already up to date`);
    return result(false, "none");
  }

  const updated = await api.update(device);
  log.info(
    updated
      ? `updated ${describeDevice(actual)} -> ${describeDevice(device)}`
      : `${device.name} vanished before update`,
  );
  return result(updated, "updated");
}
