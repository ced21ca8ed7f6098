// ---------------------------------------------------------------------------
// Device – value object and archive JSON mapping
// ---------------------------------------------------------------------------
// The mapping is asymmetric: serialization always marks the device installed
// and its AE as both initiator and acceptor over one "dicom" connection, while
// parsing only reads name, hostname, port and AE title back.
// ---------------------------------------------------------------------------

import { Value } from "@sinclair/typebox/value";
import type { Static, TSchema } from "@sinclair/typebox";
import {
  RemoteDeviceSchema,
  RemoteNetworkAESchema,
  RemoteNetworkConnectionSchema,
  type Device,
  type RemoteDevicePayload,
} from "./types.js";

export const CONNECTION_CN = "dicom";
export const CONNECTION_REFERENCE = "/dicomNetworkConnection/0";

export class DeviceParseError extends Error {
  readonly path: string;

  constructor(message: string, path = "", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeviceParseError";
    this.path = path;
  }
}

export function createDevice(fields: {
  name: string;
  host: string;
  port: number;
  aetitle: string;
}): Device {
  return Object.freeze({
    name: fields.name,
    host: fields.host,
    port: fields.port,
    aetitle: fields.aetitle,
  });
}

export function devicesEqual(a: Device, b: Device): boolean {
  return a.name === b.name && a.host === b.host && a.port === b.port && a.aetitle === b.aetitle;
}

export function deviceFromRemote(json: string): Device {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new DeviceParseError("archive returned a device document that is not JSON", "", {
      cause: err,
    });
  }

  const doc = checkShape(RemoteDeviceSchema, data, "");
  const connection = checkShape(
    RemoteNetworkConnectionSchema,
    doc.dicomNetworkConnection[0],
    "/dicomNetworkConnection/0",
  );
  const ae = checkShape(RemoteNetworkAESchema, doc.dicomNetworkAE[0], "/dicomNetworkAE/0");

  return createDevice({
    name: doc.dicomDeviceName,
    host: connection.dicomHostname,
    port: connection.dicomPort,
    aetitle: ae.dicomAETitle,
  });
}

function checkShape<T extends TSchema>(schema: T, value: unknown, basePath: string): Static<T> {
  if (Value.Check(schema, value)) {
    return value;
  }
  const first = Value.Errors(schema, value).First();
  const path = `${basePath}${first?.path ?? ""}`;
  const reason = first?.message ?? "unexpected shape";
  throw new DeviceParseError(
    `archive returned an unexpected device document at '${path || "/"}': ${reason}`,
    path,
  );
}

export function toRemoteDocument(device: Device): RemoteDevicePayload {
  return {
    dicomDeviceName: device.name,
    dicomInstalled: true,
    dicomNetworkConnection: [
      {
        cn: CONNECTION_CN,
        dicomHostname: device.host,
        dicomPort: device.port,
      },
    ],
    dicomNetworkAE: [
      {
        dicomAETitle: device.aetitle,
        dicomAssociationInitiator: true,
        dicomAssociationAcceptor: true,
        dicomNetworkConnectionReference: [CONNECTION_REFERENCE],
      },
    ],
  };
}

export function deviceToRemotePayload(device: Device): string {
  return JSON.stringify(toRemoteDocument(device));
}

export function describeDevice(device: Device): string {
  return `${device.name} (${device.aetitle}@${device.host}:${device.port})`;
}
